import type { Provider } from "@gauntlet/schemas";
import type { CredentialPool } from "@gauntlet/keys";
import { AnthropicTransport } from "./anthropic-transport.js";
import { OpenAITransport } from "./openai-transport.js";
import { CALL_TIMEOUT_MS, DEFAULT_MODELS, ResilientClient } from "./resilient-client.js";
import type { ResilientClientOptions } from "./resilient-client.js";
import type { ChatTransport } from "./transport.js";

/** Model per provider from GAUNTLET_MODEL and GAUNTLET_OPENAI_MODEL. */
export function resolveModels(env: NodeJS.ProcessEnv = process.env): Record<Provider, string> {
  return {
    anthropic: env.GAUNTLET_MODEL?.trim() || DEFAULT_MODELS.anthropic,
    openai: env.GAUNTLET_OPENAI_MODEL?.trim() || DEFAULT_MODELS.openai,
  };
}

/** One SDK-backed transport per provider. */
export function createTransports(
  env: NodeJS.ProcessEnv = process.env,
  timeoutMs: number = CALL_TIMEOUT_MS,
): Record<Provider, ChatTransport> {
  const openaiBaseURL = env.GAUNTLET_OPENAI_BASE_URL?.trim();
  return {
    anthropic: new AnthropicTransport({ timeoutMs }),
    openai: new OpenAITransport({ timeoutMs, ...(openaiBaseURL ? { baseURL: openaiBaseURL } : {}) }),
  };
}

export type ClientFactoryOptions = Omit<ResilientClientOptions, "pool" | "transports" | "models">;

/** A ResilientClient over the SDK transports, with models and endpoint taken from `env`. */
export function createClient(
  pool: CredentialPool,
  env: NodeJS.ProcessEnv = process.env,
  options: ClientFactoryOptions = {},
): ResilientClient {
  return new ResilientClient({
    ...options,
    pool,
    transports: createTransports(env, options.timeoutMs),
    models: resolveModels(env),
  });
}
