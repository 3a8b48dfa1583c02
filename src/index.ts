#!/usr/bin/env node

/**
 * Discovery Engine MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    // Create and start MCP server
    mcpServer = new McpServer(config);
    await mcpServer.start();

    // Print statistics
    mcpServer.printStats();

    // Setup graceful shutdown
    let shuttingDown = false;
    const shutdown = async (signal: string, exitCode = 0) => {
      if (shuttingDown) return;
      shuttingDown = true;

      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      try {
        if (mcpServer) {
          await mcpServer.shutdown();
        }
      } catch (error) {
        console.error('💥 Error during shutdown:', error);
        exitCode = 1;
      }

      console.error('👋 Goodbye!\n');
      process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Also handle uncaught errors
    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    process.exit(1);
  }
}

// Start the server
void main();
