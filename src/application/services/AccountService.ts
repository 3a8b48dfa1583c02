import { z } from 'zod';
import type { IDiscoveryClient } from '../../core/interfaces/IDiscoveryClient.js';
import type { AccountSnapshot, PlanTier, SignupResult } from '../../core/entities/Account.js';
import { RemoteServiceError } from '../../core/errors.js';
import { noopDebugLog, type DebugLog } from '../../utils/logger.js';

const AccountResponseSchema = z
  .object({
    plan: z.string().default('unknown'),
    credits: z
      .object({
        subscription: z.number().default(0),
        purchased: z.number().default(0),
        total: z.number().optional(),
      })
      .default({}),
    usage: z.record(z.number()).default({}),
    has_payment_method: z.boolean().default(false),
  })
  .passthrough();

/**
 * Whether a snapshot's balance pays for `credits`. A negative balance never does.
 */
export function balanceCovers(snapshot: AccountSnapshot, credits: number): boolean {
  return snapshot.creditsAvailable >= 0 && snapshot.creditsAvailable >= credits;
}

export interface AccountServiceOptions {
  /** Age after which a cached snapshot is refreshed before being read */
  stalenessMs: number;
  clock?: () => Date;
  debugLog?: DebugLog;
}

/**
 * Account/credit tracker.
 *
 * Holds the last known account snapshot and drops it whenever an operation
 * changes the remote account (invalidate-on-write). Invalidation wins over
 * a refresh that was already in flight: such a refresh is returned to its
 * caller but not cached.
 */
export class AccountService {
  private cached: AccountSnapshot | null = null;
  private generation = 0;
  private inFlight: { generation: number; promise: Promise<AccountSnapshot> } | null = null;
  private stalenessMs: number;
  private clock: () => Date;
  private debugLog: DebugLog;

  constructor(
    private client: IDiscoveryClient,
    options: AccountServiceOptions
  ) {
    this.stalenessMs = options.stalenessMs;
    this.clock = options.clock ?? (() => new Date());
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  /**
   * Cached snapshot while fresh, otherwise a refreshed one
   */
  async snapshot(): Promise<AccountSnapshot> {
    const fresh = this.freshSnapshot();
    if (fresh) return fresh;
    return this.refresh();
  }

  /**
   * Last snapshot without any refresh, fresh or not
   */
  peek(): AccountSnapshot | null {
    return this.cached;
  }

  /**
   * Whether the account can pay `credits`.
   * Reads the cache; a refresh happens only when there is no snapshot or it is stale.
   */
  async canAfford(credits: number): Promise<boolean> {
    return balanceCovers(await this.snapshot(), credits);
  }

  invalidate(): void {
    this.generation++;
    this.cached = null;
    this.debugLog(`Account snapshot invalidated (generation ${this.generation})`);
  }

  hasApiKey(): boolean {
    return this.client.hasApiKey();
  }

  async signup(email: string, name?: string): Promise<SignupResult> {
    const result = await this.client.signup(email, name);
    this.invalidate();

    if (result.apiKey && !this.client.hasApiKey()) {
      this.client.setApiKey(result.apiKey);
      this.debugLog('Adopted the API key returned by signup for this session');
    }
    return result;
  }

  async subscribe(plan: PlanTier): Promise<unknown> {
    try {
      return await this.client.subscribe(plan);
    } finally {
      this.invalidate();
    }
  }

  async purchaseCredits(packs: number): Promise<unknown> {
    try {
      return await this.client.purchaseCredits(packs);
    } finally {
      this.invalidate();
    }
  }

  async addPaymentMethod(paymentMethodId: string): Promise<unknown> {
    try {
      return await this.client.addPaymentMethod(paymentMethodId);
    } finally {
      this.invalidate();
    }
  }

  private freshSnapshot(): AccountSnapshot | null {
    if (!this.cached) return null;
    const age = this.clock().getTime() - this.cached.fetchedAt.getTime();
    return age <= this.stalenessMs ? this.cached : null;
  }

  private refresh(): Promise<AccountSnapshot> {
    if (this.inFlight && this.inFlight.generation === this.generation) {
      return this.inFlight.promise;
    }

    const generation = this.generation;
    const promise = this.fetchSnapshot().then(
      (snapshot) => {
        if (this.generation === generation) {
          this.cached = snapshot;
        }
        return snapshot;
      }
    );
    const entry = { generation, promise };
    this.inFlight = entry;

    const clear = () => {
      if (this.inFlight === entry) {
        this.inFlight = null;
      }
    };
    void promise.then(clear, clear);

    return promise;
  }

  private async fetchSnapshot(): Promise<AccountSnapshot> {
    const raw = await this.client.getAccount();
    const parsed = AccountResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RemoteServiceError(502, `Unexpected account response from API: ${parsed.error.message}`, raw);
    }

    const { plan, credits, usage, has_payment_method } = parsed.data;
    const snapshot: AccountSnapshot = {
      plan,
      creditsAvailable: credits.total ?? credits.subscription + credits.purchased,
      subscriptionCredits: credits.subscription,
      purchasedCredits: credits.purchased,
      usage,
      hasPaymentMethod: has_payment_method,
      fetchedAt: this.clock(),
      raw,
    };
    this.debugLog(`Account refreshed: plan=${snapshot.plan} credits=${snapshot.creditsAvailable}`);
    return snapshot;
  }
}
