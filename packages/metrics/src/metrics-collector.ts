import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { Journal } from "@gauntlet/journal";
import type { JournalEvent } from "@gauntlet/schemas";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

function readString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === "string" && value.length > 0 ? value : "unknown";
}

function readNumber(payload: Record<string, unknown>, key: string): number | undefined {
  const value = payload[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function readCount(payload: Record<string, unknown>, key: string): number {
  const value = payload[key];
  return Array.isArray(value) ? value.length : 0;
}

/**
 * Prometheus view of the journal: model calls, credential cooldowns,
 * prompt evolution and finished games.
 */
export class MetricsCollector {
  private readonly registry: Registry;
  private readonly prefix: string;
  private unsubscribe?: () => void;

  // ─── Model Call Metrics ────────────────────────────────────────────
  private readonly callsTotal: Counter;
  private readonly failuresTotal: Counter;
  private readonly retriesTotal: Counter;
  private readonly callLatencySeconds: Histogram;

  // ─── Token & Cost Metrics ──────────────────────────────────────────
  private readonly tokensTotal: Counter;
  private readonly costUsdTotal: Counter;

  // ─── Credential Metrics ────────────────────────────────────────────
  private readonly cooldownsTotal: Counter;

  // ─── Evolution Metrics ─────────────────────────────────────────────
  private readonly evolutionsTotal: Counter;
  private readonly variantsTotal: Counter;
  private readonly candidatesPrunedTotal: Counter;

  // ─── Game Metrics ──────────────────────────────────────────────────
  private readonly gamesTotal: Counter;
  private readonly reflectionFallbacksTotal: Counter;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "gauntlet_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.callsTotal = new Counter({
      name: `${this.prefix}llm_calls_total`,
      help: "Successful model calls by provider",
      labelNames: ["provider"] as const,
      registers: [this.registry],
    });

    this.failuresTotal = new Counter({
      name: `${this.prefix}llm_call_failures_total`,
      help: "Model calls that gave up, by error class",
      labelNames: ["error_type"] as const,
      registers: [this.registry],
    });

    this.retriesTotal = new Counter({
      name: `${this.prefix}llm_retries_total`,
      help: "Retried model call attempts by HTTP status",
      labelNames: ["status"] as const,
      registers: [this.registry],
    });

    this.callLatencySeconds = new Histogram({
      name: `${this.prefix}llm_call_duration_seconds`,
      help: "Latency of successful model calls in seconds",
      labelNames: ["provider"] as const,
      buckets: [0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers: [this.registry],
    });

    this.tokensTotal = new Counter({
      name: `${this.prefix}tokens_total`,
      help: "Tokens consumed by model and direction",
      labelNames: ["model", "type"] as const,
      registers: [this.registry],
    });

    this.costUsdTotal = new Counter({
      name: `${this.prefix}cost_usd_total`,
      help: "Estimated spend in USD by credential alias",
      labelNames: ["alias"] as const,
      registers: [this.registry],
    });

    this.cooldownsTotal = new Counter({
      name: `${this.prefix}credential_cooldowns_total`,
      help: "Credential cooldowns by alias and cause",
      labelNames: ["alias", "cause"] as const,
      registers: [this.registry],
    });

    this.evolutionsTotal = new Counter({
      name: `${this.prefix}prompt_evolutions_total`,
      help: "Prompt evolution rounds",
      registers: [this.registry],
    });

    this.variantsTotal = new Counter({
      name: `${this.prefix}prompt_variants_total`,
      help: "Requested prompt variants by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.candidatesPrunedTotal = new Counter({
      name: `${this.prefix}prompt_candidates_pruned_total`,
      help: "Candidates evicted from the active pool, and those also deleted from storage",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.gamesTotal = new Counter({
      name: `${this.prefix}games_total`,
      help: "Finished games by result",
      labelNames: ["result"] as const,
      registers: [this.registry],
    });

    this.reflectionFallbacksTotal = new Counter({
      name: `${this.prefix}reflection_fallbacks_total`,
      help: "Post-game reflections that used the fixed fallback line",
      registers: [this.registry],
    });
  }

  attach(journal: Pick<Journal, "on">): void {
    this.detach();
    this.unsubscribe = journal.on((event) => this.handleEvent(event));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = undefined;
    }
  }

  handleEvent(event: JournalEvent): void {
    const payload = event.payload;
    switch (event.type) {
      // ─── Model Calls ──────────────────────────────────────────────
      case "llm.call.succeeded": {
        const provider = readString(payload, "provider");
        const model = readString(payload, "model");
        this.callsTotal.inc({ provider });

        const tokensIn = readNumber(payload, "tokens_in");
        const tokensOut = readNumber(payload, "tokens_out");
        const costUsd = readNumber(payload, "cost_usd");
        const latencyMs = readNumber(payload, "latency_ms");
        if (tokensIn !== undefined) this.tokensTotal.inc({ model, type: "input" }, tokensIn);
        if (tokensOut !== undefined) this.tokensTotal.inc({ model, type: "output" }, tokensOut);
        if (costUsd !== undefined) this.costUsdTotal.inc({ alias: readString(payload, "alias") }, costUsd);
        if (latencyMs !== undefined) this.callLatencySeconds.observe({ provider }, latencyMs / 1000);
        break;
      }

      case "llm.call.retry": {
        const status = readNumber(payload, "status");
        this.retriesTotal.inc({ status: status === undefined ? "unknown" : String(status) });
        break;
      }

      case "llm.call.failed":
        this.failuresTotal.inc({ error_type: readString(payload, "error_type") });
        break;

      // ─── Credentials ──────────────────────────────────────────────
      case "credential.cooldown": {
        const status = readNumber(payload, "status");
        const cause = status === 429 || status === 529 ? "rate_limit" : "server_error";
        this.cooldownsTotal.inc({ alias: readString(payload, "alias"), cause });
        break;
      }

      // ─── Prompt Evolution ─────────────────────────────────────────
      case "prompt.evolved": {
        this.evolutionsTotal.inc();
        const requested = readNumber(payload, "requested") ?? 0;
        const accepted = readNumber(payload, "accepted") ?? 0;
        if (accepted > 0) this.variantsTotal.inc({ outcome: "accepted" }, accepted);
        if (requested > accepted) this.variantsTotal.inc({ outcome: "missing" }, requested - accepted);
        break;
      }

      case "prompt.pruned": {
        const evicted = readCount(payload, "evicted");
        const deleted = readCount(payload, "deleted");
        if (evicted > 0) this.candidatesPrunedTotal.inc({ outcome: "evicted" }, evicted);
        if (deleted > 0) this.candidatesPrunedTotal.inc({ outcome: "deleted" }, deleted);
        break;
      }

      // ─── Games ────────────────────────────────────────────────────
      case "game.reflected":
        this.gamesTotal.inc({ result: payload.won === true ? "won" : "lost" });
        if (payload.fallback === true) this.reflectionFallbacksTotal.inc();
        break;

      default:
        break;
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
