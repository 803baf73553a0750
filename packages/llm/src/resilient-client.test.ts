import { describe, it, expect } from "vitest";
import {
  ConfigError,
  CredentialsExhaustedError,
  FatalApiError,
  MalformedResponseError,
  RetriesExhaustedError,
  TransientApiError,
  TransportError,
} from "@gauntlet/schemas";
import type { CompletionRequest, CredentialConfig, EventSink, JournalEvent, JournalEventType } from "@gauntlet/schemas";
import { CredentialPool } from "@gauntlet/keys";
import { ResilientClient, backoffDelayMs, clampThinkingBudget } from "./resilient-client.js";
import type { ResilientClientOptions } from "./resilient-client.js";
import type { ChatTransport, TransportCredential, TransportRequest, TransportResponse } from "./transport.js";

type Step = TransportResponse | Error | "hang";

class ScriptedTransport implements ChatTransport {
  readonly requests: Array<{ alias: string; request: TransportRequest }> = [];
  private steps: Step[];

  constructor(steps: Step[]) {
    this.steps = [...steps];
  }

  async send(credential: TransportCredential, request: TransportRequest): Promise<TransportResponse> {
    this.requests.push({ alias: credential.alias, request });
    const step = this.steps.shift();
    if (step === undefined) throw new Error("script exhausted");
    if (step === "hang") return new Promise<TransportResponse>(() => {});
    if (step instanceof Error) throw step;
    return step;
  }
}

class RecordingSink implements EventSink {
  readonly events: Array<{ type: JournalEventType; payload: Record<string, unknown> }> = [];

  async tryEmit(_scopeId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null> {
    this.events.push({ type, payload });
    return null;
  }
}

function credential(alias: string): CredentialConfig {
  return {
    key: `test-secret-${alias}`,
    provider: "anthropic",
    alias,
    monthly_budget_usd: 10,
    cost_per_1k_input: 0.015,
    cost_per_1k_output: 0.075,
  };
}

const OK: TransportResponse = { text: "ACTION: attack", tokensIn: 1000, tokensOut: 200, modelId: "claude-test" };

const REQUEST: CompletionRequest = {
  system: "You are Kira.",
  messages: [{ role: "user", content: "Your move." }],
  maxTokens: 350,
  temperature: 0.87,
};

function setup(aliases: string[], steps: Step[], overrides: Partial<ResilientClientOptions> = {}) {
  const pool = new CredentialPool(aliases.map(credential), { clock: () => 1_000 });
  const transport = new ScriptedTransport(steps);
  const sleeps: number[] = [];
  const sink = new RecordingSink();
  let tick = 0;
  const client = new ResilientClient({
    pool,
    transports: { anthropic: transport },
    sleep: async (ms) => { sleeps.push(ms); },
    random: () => 0.5,
    now: () => (tick++) * 250,
    events: sink,
    ...overrides,
  });
  return { pool, transport, sleeps, sink, client };
}

describe("ResilientClient", () => {
  it("returns the first successful answer and reports usage to the pool", async () => {
    const { pool, client, sleeps } = setup(["a"], [OK]);
    const result = await client.complete(REQUEST);

    expect(result).toEqual({
      text: "ACTION: attack",
      tokensIn: 1000,
      tokensOut: 200,
      modelId: "claude-test",
      credentialAlias: "a",
      latencyMs: 250,
    });
    expect(sleeps).toEqual([]);
    expect(pool.totalCostUsd()).toBeCloseTo(0.03, 10);
  });

  it("journals the success with its cost", async () => {
    const { client, sink } = setup(["a"], [OK]);
    await client.complete(REQUEST);
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]?.type).toBe("llm.call.succeeded");
    expect(sink.events[0]?.payload.cost_usd).toBeCloseTo(0.03, 10);
    expect(sink.events[0]?.payload.attempt).toBe(0);
  });

  it("retries rate limits and server errors on the next healthiest credential", async () => {
    const { pool, client, sleeps, transport } = setup(["a", "b", "c"], [
      new TransientApiError(429, "rate limited"),
      new TransientApiError(503, "overloaded"),
      OK,
    ]);
    const result = await client.complete(REQUEST);

    expect(result.credentialAlias).toBe("c");
    expect(transport.requests.map((r) => r.alias)).toEqual(["a", "b", "c"]);
    expect(sleeps).toEqual([1600, 2800]);
    const [a, b] = pool.summary();
    expect(a?.errors_ratelimit).toBe(1);
    expect(a?.cooldown_remaining_s).toBe(60);
    expect(b?.errors_server).toBe(1);
    expect(b?.cooldown_remaining_s).toBe(15);
  });

  it("reports transport failures to the pool as 503", async () => {
    const { pool, client } = setup(["a", "b"], [new TransportError("socket hang up"), OK]);
    await client.complete(REQUEST);
    expect(pool.summary()[0]?.errors_server).toBe(1);
  });

  it("treats a timeout as a transport failure", async () => {
    const { pool, client } = setup(["a", "b"], ["hang", OK], { timeoutMs: 10 });
    const result = await client.complete(REQUEST);
    expect(result.credentialAlias).toBe("b");
    expect(pool.summary()[0]?.errors_server).toBe(1);
  });

  it("fails at once on a non-retryable status", async () => {
    const { client, sleeps, transport, sink } = setup(["a", "b"], [new FatalApiError(400, "bad request"), OK]);
    await expect(client.complete(REQUEST)).rejects.toThrow("API error 400: bad request");
    expect(transport.requests).toHaveLength(1);
    expect(sleeps).toEqual([]);
    expect(sink.events.map((e) => e.type)).toEqual(["llm.call.failed"]);
  });

  it("does not retry a malformed payload", async () => {
    const { client, transport } = setup(["a", "b"], [new MalformedResponseError("/: must have required property 'usage'"), OK]);
    await expect(client.complete(REQUEST)).rejects.toBeInstanceOf(MalformedResponseError);
    expect(transport.requests).toHaveLength(1);
  });

  it("gives up after four attempts without waiting after the last", async () => {
    const { client, sleeps, transport } = setup(["a", "b", "c", "d"], [
      new TransientApiError(429, "rate limited"),
      new TransientApiError(429, "rate limited"),
      new TransientApiError(500, "internal"),
      new TransientApiError(529, "overloaded"),
    ], { random: () => 0 });

    let caught: unknown;
    try {
      await client.complete(REQUEST);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RetriesExhaustedError);
    if (caught instanceof RetriesExhaustedError) {
      expect(caught.attempts).toBe(4);
      expect(caught.message).toBe("API call failed after 4 attempts. Last error: overloaded");
      expect(caught.lastError).toBeInstanceOf(TransientApiError);
    }
    expect(transport.requests).toHaveLength(4);
    expect(sleeps).toEqual([1200, 2400, 4800]);
  });

  it("propagates pool exhaustion between attempts", async () => {
    const { client, sleeps } = setup(["a"], [new TransientApiError(429, "rate limited"), OK]);
    await expect(client.complete(REQUEST)).rejects.toBeInstanceOf(CredentialsExhaustedError);
    expect(sleeps).toHaveLength(1);
  });

  it("journals cooldowns and retries", async () => {
    const { client, sink } = setup(["a", "b"], [new TransientApiError(429, "rate limited"), OK]);
    await client.complete(REQUEST);
    expect(sink.events.map((e) => e.type)).toEqual(["credential.cooldown", "llm.call.retry", "llm.call.succeeded"]);
    expect(sink.events[0]?.payload).toEqual({ alias: "a", status: 429, cooldown_s: 60 });
  });

  it("sends a temperature in normal mode", async () => {
    const { client, transport } = setup(["a"], [OK], { models: { anthropic: "claude-custom" } });
    await client.complete(REQUEST);
    expect(transport.requests[0]?.request).toEqual({
      model: "claude-custom",
      system: "You are Kira.",
      messages: [{ role: "user", content: "Your move." }],
      maxTokens: 350,
      temperature: 0.87,
    });
  });

  it("sends a clamped thinking budget and no temperature in thinking mode", async () => {
    const { client, transport } = setup(["a"], [OK]);
    await client.complete({ ...REQUEST, maxTokens: 550, thinking: { budgetTokens: 500 } });
    const sent = transport.requests[0]?.request;
    expect(sent?.thinking).toEqual({ budgetTokens: 450 });
    expect(sent?.temperature).toBeUndefined();
  });

  it("refuses a credential whose provider has no transport", async () => {
    const pool = new CredentialPool([{ ...credential("o"), provider: "openai" }]);
    const client = new ResilientClient({ pool, transports: { anthropic: new ScriptedTransport([OK]) } });
    await expect(client.complete(REQUEST)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("backoffDelayMs", () => {
  it("doubles per attempt and adds the jitter", () => {
    expect([0, 1, 2].map((attempt) => backoffDelayMs(attempt, 1200, 0))).toEqual([1200, 2400, 4800]);
    expect(backoffDelayMs(1, 1200, 800)).toBe(3200);
  });
});

describe("clampThinkingBudget", () => {
  it("leaves 100 tokens of headroom and never drops below 1", () => {
    expect(clampThinkingBudget(500, 700)).toBe(500);
    expect(clampThinkingBudget(800, 512)).toBe(412);
    expect(clampThinkingBudget(500, 50)).toBe(1);
  });
});
