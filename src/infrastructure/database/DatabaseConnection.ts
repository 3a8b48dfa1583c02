import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { JobStatus } from '../../core/entities/Job.js';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Database connection manager for the job registry and idempotency ledger.
 * The default in-memory database lives exactly as long as the process.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = IN_MEMORY_DATABASE) {
    if (dbPath === IN_MEMORY_DATABASE) {
      this.dbPath = dbPath;
    } else {
      this.dbPath = path.resolve(process.cwd(), dbPath);

      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY_DATABASE) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        submitted_at TEXT NOT NULL,
        visibility TEXT,
        idempotency_token TEXT,
        cost_charged INTEGER,
        last_polled_at TEXT,
        poll_count INTEGER NOT NULL DEFAULT 0,
        failure_reason TEXT,
        result_ref TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_run_status ON runs(status);

      CREATE TABLE IF NOT EXISTS idempotency_keys (
        token TEXT PRIMARY KEY,
        run_id TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_idempotency_created ON idempotency_keys(created_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): { totalRuns: number; idempotencyKeys: number; byStatus: Partial<Record<JobStatus, number>> } {
    const totalRuns =
      this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM runs').get()?.count ?? 0;
    const idempotencyKeys =
      this.db
        .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM idempotency_keys')
        .get()?.count ?? 0;

    const byStatus: Partial<Record<JobStatus, number>> = {};
    const rows = this.db
      .prepare<[], { status: JobStatus; count: number }>(
        'SELECT status, COUNT(*) as count FROM runs GROUP BY status'
      )
      .all();
    for (const row of rows) {
      byStatus[row.status] = row.count;
    }

    return { totalRuns, idempotencyKeys, byStatus };
  }
}

// Global instance
let dbInstance: DatabaseConnection | null = null;

export function initializeDatabase(dbPath?: string): DatabaseConnection {
  if (!dbInstance) {
    dbInstance = new DatabaseConnection(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
