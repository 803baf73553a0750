import {
  ConfigError,
  CredentialsExhaustedError,
  NoCredentialsAvailableError,
} from "@gauntlet/schemas";
import type { CredentialConfig, CredentialSummary } from "@gauntlet/schemas";
import {
  KeyRecord,
  systemClock,
  BUDGET_FLOOR_USD,
  DEFAULT_MONTHLY_BUDGET_USD,
  DEFAULT_COST_PER_1K_INPUT,
  DEFAULT_COST_PER_1K_OUTPUT,
} from "./key-record.js";
import type { Clock } from "./key-record.js";

/** Numbered rotation slots read from ANTHROPIC_API_KEY_1..8. */
export const MAX_NUMBERED_KEYS = 8;

export interface CredentialPoolOptions {
  clock?: Clock;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Shared pool of API credentials. Hands out the healthiest available
 * credential and takes usage and error reports back.
 *
 * Every method runs to completion without awaiting, so updates to a
 * credential never interleave with another caller's.
 */
export class CredentialPool {
  private records: KeyRecord[];
  private clock: Clock;

  constructor(configs: CredentialConfig[], options?: CredentialPoolOptions) {
    this.clock = options?.clock ?? systemClock;
    const seenAliases = new Set<string>();
    this.records = [];
    for (const config of configs) {
      if (seenAliases.has(config.alias)) {
        throw new ConfigError(`Duplicate credential alias: ${config.alias}`);
      }
      seenAliases.add(config.alias);
      this.records.push(new KeyRecord(config, this.clock));
    }
  }

  /**
   * Reads credentials from the environment. Keys already seen under an
   * earlier variable are skipped.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, options?: CredentialPoolOptions): CredentialPool {
    const costIn = readNumber(env, "COST_INPUT_PER_1K", DEFAULT_COST_PER_1K_INPUT);
    const costOut = readNumber(env, "COST_OUTPUT_PER_1K", DEFAULT_COST_PER_1K_OUTPUT);
    const seen = new Set<string>();
    const configs: CredentialConfig[] = [];

    const add = (key: string | undefined, config: Omit<CredentialConfig, "key">): void => {
      const trimmed = key?.trim();
      if (!trimmed || seen.has(trimmed)) return;
      seen.add(trimmed);
      configs.push({ key: trimmed, ...config });
    };

    add(env.ANTHROPIC_API_KEY, {
      provider: "anthropic",
      alias: "primary",
      monthly_budget_usd: readNumber(env, "KEY_BUDGET_USD", DEFAULT_MONTHLY_BUDGET_USD),
      cost_per_1k_input: costIn,
      cost_per_1k_output: costOut,
    });

    for (let i = 1; i <= MAX_NUMBERED_KEYS; i++) {
      add(env[`ANTHROPIC_API_KEY_${i}`], {
        provider: "anthropic",
        alias: `key_${i}`,
        monthly_budget_usd: readNumber(env, `KEY_${i}_BUDGET_USD`, DEFAULT_MONTHLY_BUDGET_USD),
        cost_per_1k_input: costIn,
        cost_per_1k_output: costOut,
      });
    }

    add(env.OPENAI_API_KEY, {
      provider: "openai",
      alias: "openai",
      monthly_budget_usd: readNumber(env, "OPENAI_KEY_BUDGET_USD", DEFAULT_MONTHLY_BUDGET_USD),
      cost_per_1k_input: costIn,
      cost_per_1k_output: costOut,
    });

    if (configs.length === 0) {
      throw new ConfigError(
        "No API keys found. Set ANTHROPIC_API_KEY in your .env file or environment. " +
        `ANTHROPIC_API_KEY_1 through ANTHROPIC_API_KEY_${MAX_NUMBERED_KEYS} add keys to the rotation.`
      );
    }
    return new CredentialPool(configs, options);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Returns the healthiest available credential. Fails fast, never
   * waits: the caller decides how to back off.
   */
  acquire(): KeyRecord {
    const available = this.records.filter((r) => r.isAvailable());
    if (available.length === 0) {
      const cooling = this.records.filter(
        (r) => r.active && r.isCoolingDown() && r.budgetRemaining > BUDGET_FLOOR_USD
      );
      if (cooling.length > 0) {
        const shortest = Math.min(...cooling.map((r) => r.cooldownRemaining));
        throw new CredentialsExhaustedError(shortest);
      }
      throw new NoCredentialsAvailableError();
    }

    return available.reduce((best, record) =>
      record.healthScore() > best.healthScore() ? record : best
    );
  }

  /** Records a successful call. Returns its cost in USD, 0 for an unknown alias. */
  reportUsage(alias: string, tokensIn: number, tokensOut: number): number {
    const record = this.find(alias);
    return record ? record.recordUsage(tokensIn, tokensOut) : 0;
  }

  /** Records a failed call. Returns the cooldown applied in seconds, 0 when none. */
  reportError(alias: string, status: number): number {
    const record = this.find(alias);
    return record ? record.recordError(status) : 0;
  }

  /** Takes a credential out of rotation for good (revoked or invalid key). */
  deactivate(alias: string): boolean {
    const record = this.find(alias);
    if (!record) return false;
    record.active = false;
    return true;
  }

  totalCostUsd(): number {
    return this.records.reduce((sum, r) => sum + r.estimatedCostUsd, 0);
  }

  summary(): CredentialSummary[] {
    return this.records.map((r) => ({
      alias: r.alias,
      provider: r.provider,
      available: r.isAvailable(),
      active: r.active,
      health: round(r.healthScore(), 3),
      cost_usd: round(r.estimatedCostUsd, 5),
      budget_remaining_usd: round(r.budgetRemaining, 5),
      tokens_in: r.tokensIn,
      tokens_out: r.tokensOut,
      errors_ratelimit: r.errorsRateLimit,
      errors_server: r.errorsServer,
      cooldown_remaining_s: Math.round(r.cooldownRemaining),
    }));
  }

  private find(alias: string): KeyRecord | undefined {
    return this.records.find((r) => r.alias === alias);
  }
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}
