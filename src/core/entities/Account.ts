/**
 * Cached mirror of the remote account. Advisory only.
 */
export interface AccountSnapshot {
  plan: string;
  /** Subscription plus purchased credits */
  creditsAvailable: number;
  subscriptionCredits: number;
  purchasedCredits: number;
  usage: Record<string, number>;
  hasPaymentMethod: boolean;
  fetchedAt: Date;
  raw: Record<string, unknown>;
}

export type PlanTier = 'free_tier' | 'tier_1' | 'tier_2';

export const PLAN_TIERS: readonly [PlanTier, ...PlanTier[]] = ['free_tier', 'tier_1', 'tier_2'];

export interface SignupResult {
  apiKey: string | null;
  raw: Record<string, unknown>;
}
