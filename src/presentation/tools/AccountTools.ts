import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AccountService } from '../../application/services/AccountService.js';
import type { IDiscoveryClient } from '../../core/interfaces/IDiscoveryClient.js';
import { PLAN_TIERS } from '../../core/entities/Account.js';
import { runTool } from '../toolResponse.js';

export const signupInputShape = {
  email: z.string().email().describe('Email address for the new account'),
  name: z.string().optional().describe('Display name (defaults to the local part of the email)'),
};

export const subscribeInputShape = {
  plan: z.enum(PLAN_TIERS).describe('Plan tier: "free_tier", "tier_1" or "tier_2"'),
};

export const purchaseCreditsInputShape = {
  packs: z.number().int().positive().default(1).describe('Number of 20-credit packs to buy'),
};

export const paymentMethodInputShape = {
  payment_method_id: z
    .string()
    .min(1)
    .describe('Tokenized payment method id (pm_...) created with the payment provider'),
};

type SignupArgs = z.infer<z.ZodObject<typeof signupInputShape>>;
type SubscribeArgs = z.infer<z.ZodObject<typeof subscribeInputShape>>;
type PurchaseCreditsArgs = z.infer<z.ZodObject<typeof purchaseCreditsInputShape>>;
type PaymentMethodArgs = z.infer<z.ZodObject<typeof paymentMethodInputShape>>;

export interface AccountToolHandlers {
  signup(args: SignupArgs): Promise<CallToolResult>;
  account(): Promise<CallToolResult>;
  listPlans(): Promise<CallToolResult>;
  subscribe(args: SubscribeArgs): Promise<CallToolResult>;
  purchaseCredits(args: PurchaseCreditsArgs): Promise<CallToolResult>;
  addPaymentMethod(args: PaymentMethodArgs): Promise<CallToolResult>;
}

export function createAccountToolHandlers(accounts: AccountService, client: IDiscoveryClient): AccountToolHandlers {
  return {
    signup: ({ email, name }) =>
      runTool(async () => {
        const hadKey = accounts.hasApiKey();
        const result = await accounts.signup(email, name || undefined);
        return {
          ...result.raw,
          session_api_key:
            !hadKey && result.apiKey
              ? 'This session now uses the new API key. Set DISCOVERY_API_KEY to keep it across restarts.'
              : 'The API key configured for this session is unchanged.',
        };
      }),

    account: () =>
      runTool(async () => {
        const snapshot = await accounts.snapshot();
        return {
          ...snapshot.raw,
          credits_available: snapshot.creditsAvailable,
          fetched_at: snapshot.fetchedAt,
        };
      }),

    listPlans: () => runTool(() => client.listPlans()),

    subscribe: ({ plan }) => runTool(() => accounts.subscribe(plan)),

    purchaseCredits: ({ packs }) => runTool(() => accounts.purchaseCredits(packs)),

    addPaymentMethod: ({ payment_method_id }) => runTool(() => accounts.addPaymentMethod(payment_method_id)),
  };
}

/**
 * Register the account tools: signup, account, list_plans, subscribe, purchase_credits, add_payment_method
 */
export function registerAccountTools(server: McpServer, accounts: AccountService, client: IDiscoveryClient) {
  const handlers = createAccountToolHandlers(accounts, client);

  server.tool(
    'discovery_signup',
    'Create a Discovery Engine account and get an API key. The free tier (monthly credits, unlimited ' +
      'public runs) is active immediately. Fails with 409 if the email is already registered.',
    signupInputShape,
    (args) => handlers.signup(args)
  );

  server.tool(
    'discovery_account',
    'Show the current plan, available credits (subscription plus purchased) and whether a payment ' +
      'method is on file. Check this before a private analysis.',
    () => handlers.account()
  );

  server.tool(
    'discovery_list_plans',
    'List the available plans with their credit allowances and pricing. No API key needed.',
    () => handlers.listPlans()
  );

  server.tool(
    'discovery_subscribe',
    'Subscribe to or change plan. Paid plans need a payment method on file.',
    subscribeInputShape,
    (args) => handlers.subscribe(args)
  );

  server.tool(
    'discovery_purchase_credits',
    'Buy credit packs (20 credits each) with the stored payment method. Credits pay for private analyses.',
    purchaseCreditsInputShape,
    (args) => handlers.purchaseCredits(args)
  );

  server.tool(
    'discovery_add_payment_method',
    'Attach a tokenized payment method (pm_...) to the account. Card details never pass through this ' +
      'server. Needed before buying credits or a paid plan.',
    paymentMethodInputShape,
    (args) => handlers.addPaymentMethod(args)
  );
}
