import type { CredentialConfig, Provider } from "@gauntlet/schemas";

/** Epoch-seconds clock. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export const DEFAULT_MONTHLY_BUDGET_USD = 10.0;
export const DEFAULT_COST_PER_1K_INPUT = 0.015;
export const DEFAULT_COST_PER_1K_OUTPUT = 0.075;

/** Below this many dollars a credential counts as spent. */
export const BUDGET_FLOOR_USD = 0.001;

const RATE_LIMIT_BASE_COOLDOWN_S = 30;
const RATE_LIMIT_MAX_COOLDOWN_S = 300;
const SERVER_ERROR_COOLDOWN_S = 15;

/**
 * One API credential with its running usage, error counters and
 * cooldown. Cost is derived from token counts, never stored.
 */
export class KeyRecord {
  readonly key: string;
  readonly provider: Provider;
  readonly alias: string;
  readonly monthlyBudgetUsd: number;
  readonly costPer1kInput: number;
  readonly costPer1kOutput: number;

  tokensIn = 0;
  tokensOut = 0;
  errorsRateLimit = 0;
  errorsServer = 0;
  /** 0 until the first successful call. */
  lastUsedAt = 0;
  cooldownUntil = 0;
  active = true;

  private clock: Clock;

  constructor(config: CredentialConfig, clock: Clock = systemClock) {
    this.key = config.key;
    this.provider = config.provider;
    this.alias = config.alias;
    this.monthlyBudgetUsd = config.monthly_budget_usd;
    this.costPer1kInput = config.cost_per_1k_input;
    this.costPer1kOutput = config.cost_per_1k_output;
    this.clock = clock;
  }

  get estimatedCostUsd(): number {
    return (this.tokensIn / 1000) * this.costPer1kInput
      + (this.tokensOut / 1000) * this.costPer1kOutput;
  }

  get budgetRemaining(): number {
    return Math.max(0, this.monthlyBudgetUsd - this.estimatedCostUsd);
  }

  get cooldownRemaining(): number {
    return Math.max(0, this.cooldownUntil - this.clock());
  }

  isCoolingDown(): boolean {
    return this.cooldownUntil > this.clock();
  }

  isAvailable(): boolean {
    return this.active
      && this.clock() >= this.cooldownUntil
      && this.budgetRemaining > BUDGET_FLOOR_USD;
  }

  healthScore(): number {
    const errorPenalty = (this.errorsRateLimit * 2 + this.errorsServer) * 0.05;
    const budgetFactor = Math.min(1, this.budgetRemaining / Math.max(BUDGET_FLOOR_USD, this.monthlyBudgetUsd));
    const recencyBoost = this.lastUsedAt === 0
      ? 0
      : Math.min(0.05, 1 / Math.max(1, this.clock() - this.lastUsedAt));
    return Math.max(0, budgetFactor - errorPenalty + recencyBoost);
  }

  /** Adds a successful call's tokens and returns what it cost. */
  recordUsage(tokensIn: number, tokensOut: number): number {
    const before = this.estimatedCostUsd;
    this.tokensIn += tokensIn;
    this.tokensOut += tokensOut;
    this.lastUsedAt = this.clock();
    this.errorsRateLimit = Math.max(0, this.errorsRateLimit - 1);
    return this.estimatedCostUsd - before;
  }

  /** Applies the cooldown for a failed call and returns its length in seconds (0 when none). */
  recordError(status: number): number {
    if (status === 429 || status === 529) {
      this.errorsRateLimit++;
      const backoff = Math.min(
        RATE_LIMIT_MAX_COOLDOWN_S,
        RATE_LIMIT_BASE_COOLDOWN_S * 2 ** Math.min(this.errorsRateLimit, 4),
      );
      this.cooldownUntil = this.clock() + backoff;
      return backoff;
    }
    if (status >= 500) {
      this.errorsServer++;
      this.cooldownUntil = this.clock() + SERVER_ERROR_COOLDOWN_S;
      return SERVER_ERROR_COOLDOWN_S;
    }
    return 0;
  }
}
