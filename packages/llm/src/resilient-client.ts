import {
  ConfigError,
  FatalApiError,
  RetriesExhaustedError,
  TimeoutError,
  TransientApiError,
  TransportError,
  sleep as defaultSleep,
  withTimeout,
} from "@gauntlet/schemas";
import type {
  ChatCompleter,
  CompletionRequest,
  CompletionResult,
  EventSink,
  JournalEventType,
  Logger,
  Provider,
} from "@gauntlet/schemas";
import type { CredentialPool } from "@gauntlet/keys";
import type { ChatTransport, TransportRequest } from "./transport.js";

export const MAX_ATTEMPTS = 4;
export const BASE_DELAY_MS = 1200;
export const MAX_JITTER_MS = 800;
export const CALL_TIMEOUT_MS = 60_000;
/** Status reported to the pool when a call never got an HTTP answer. */
export const TRANSPORT_FAILURE_STATUS = 503;
/** Output tokens always left for the answer in thinking mode. */
const THINKING_HEADROOM = 100;

export const DEFAULT_MODELS: Record<Provider, string> = {
  anthropic: "claude-sonnet-4-6",
  openai: "gpt-4o",
};

export interface ResilientClientOptions {
  pool: CredentialPool;
  transports: Partial<Record<Provider, ChatTransport>>;
  models?: Partial<Record<Provider, string>>;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxJitterMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source for backoff jitter. */
  random?: () => number;
  /** Millisecond clock for latency. */
  now?: () => number;
  events?: EventSink;
  logger?: Logger;
  /** Journal scope for call events. */
  scopeId?: string;
}

/** Wait before the retry that follows attempt `attempt` (0-based). */
export function backoffDelayMs(attempt: number, baseDelayMs: number, jitterMs: number): number {
  return baseDelayMs * 2 ** attempt + jitterMs;
}

/** Thinking budget clamped so the answer keeps some output tokens. */
export function clampThinkingBudget(budgetTokens: number, maxTokens: number): number {
  return Math.max(1, Math.min(budgetTokens, maxTokens - THINKING_HEADROOM));
}

/**
 * Chat completion with credential routing and classified retries.
 *
 * 429, 529 and 5xx answers, transport failures and timeouts are reported
 * to the pool and retried with exponential backoff. Any other status and
 * malformed payloads fail at once. Pool errors propagate immediately.
 */
export class ResilientClient implements ChatCompleter {
  private pool: CredentialPool;
  private transports: Partial<Record<Provider, ChatTransport>>;
  private models: Record<Provider, string>;
  private maxAttempts: number;
  private baseDelayMs: number;
  private maxJitterMs: number;
  private timeoutMs: number;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private now: () => number;
  private events?: EventSink;
  private logger?: Logger;
  private scopeId: string;

  constructor(options: ResilientClientOptions) {
    this.pool = options.pool;
    this.transports = options.transports;
    this.models = { ...DEFAULT_MODELS, ...options.models };
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
    this.maxJitterMs = options.maxJitterMs ?? MAX_JITTER_MS;
    this.timeoutMs = options.timeoutMs ?? CALL_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => performance.now());
    this.events = options.events;
    this.logger = options.logger;
    this.scopeId = options.scopeId ?? "system";
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const credential = this.pool.acquire();
      const transport = this.transports[credential.provider];
      if (!transport) {
        throw new ConfigError(`No transport configured for provider "${credential.provider}"`);
      }
      const model = this.models[credential.provider];
      const started = this.now();

      try {
        const response = await withTimeout(
          transport.send(credential, this.buildRequest(model, request)),
          this.timeoutMs,
          `${credential.provider} call`,
        );
        const latencyMs = this.now() - started;
        const costUsd = this.pool.reportUsage(credential.alias, response.tokensIn, response.tokensOut);
        await this.emit("llm.call.succeeded", {
          alias: credential.alias,
          provider: credential.provider,
          model: response.modelId,
          tokens_in: response.tokensIn,
          tokens_out: response.tokensOut,
          cost_usd: costUsd,
          latency_ms: latencyMs,
          attempt,
        });
        return {
          text: response.text,
          tokensIn: response.tokensIn,
          tokensOut: response.tokensOut,
          modelId: response.modelId,
          credentialAlias: credential.alias,
          latencyMs,
        };
      } catch (err) {
        const status = transientStatus(err);
        if (status === undefined) {
          if (err instanceof FatalApiError) {
            this.pool.reportError(credential.alias, err.status);
          }
          await this.fail(credential.alias, attempt + 1, err);
          throw err;
        }

        lastError = err;
        const cooldownS = this.pool.reportError(credential.alias, status);
        if (cooldownS > 0) {
          await this.emit("credential.cooldown", { alias: credential.alias, status, cooldown_s: cooldownS });
        }

        // No wait after the final attempt
        if (attempt + 1 < this.maxAttempts) {
          const delayMs = backoffDelayMs(attempt, this.baseDelayMs, this.random() * this.maxJitterMs);
          this.logger?.warn("transient failure, retrying", {
            alias: credential.alias,
            status,
            attempt: attempt + 1,
            delay_ms: Math.round(delayMs),
            error: errorMessage(err),
          });
          await this.emit("llm.call.retry", {
            alias: credential.alias,
            status,
            attempt: attempt + 1,
            delay_ms: delayMs,
            error: errorMessage(err),
          });
          await this.sleep(delayMs);
        }
      }
    }

    const exhausted = new RetriesExhaustedError(this.maxAttempts, lastError);
    await this.fail(undefined, this.maxAttempts, exhausted);
    throw exhausted;
  }

  private buildRequest(model: string, request: CompletionRequest): TransportRequest {
    const base = {
      model,
      system: request.system,
      messages: request.messages,
      maxTokens: request.maxTokens,
    };
    if (request.thinking) {
      return {
        ...base,
        thinking: { budgetTokens: clampThinkingBudget(request.thinking.budgetTokens, request.maxTokens) },
      };
    }
    return { ...base, temperature: request.temperature };
  }

  private async fail(alias: string | undefined, attempts: number, err: unknown): Promise<void> {
    this.logger?.error("call failed", { ...(alias ? { alias } : {}), attempts, error: errorMessage(err) });
    await this.emit("llm.call.failed", {
      ...(alias ? { alias } : {}),
      attempts,
      error_type: err instanceof Error ? err.name : "unknown",
      error: errorMessage(err),
    });
  }

  private async emit(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.events?.tryEmit(this.scopeId, type, payload);
  }
}

/** The status to report for a retryable failure, or undefined when the failure is final. */
function transientStatus(err: unknown): number | undefined {
  if (err instanceof TransientApiError) return err.status;
  if (err instanceof TransportError || err instanceof TimeoutError) return TRANSPORT_FAILURE_STATUS;
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
