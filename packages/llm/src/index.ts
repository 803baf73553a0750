export {
  ResilientClient,
  backoffDelayMs,
  clampThinkingBudget,
  MAX_ATTEMPTS,
  BASE_DELAY_MS,
  MAX_JITTER_MS,
  CALL_TIMEOUT_MS,
  TRANSPORT_FAILURE_STATUS,
  DEFAULT_MODELS,
} from "./resilient-client.js";
export type { ResilientClientOptions } from "./resilient-client.js";
export { toCallError, isRetryableStatus } from "./transport.js";
export type { ChatTransport, TransportCredential, TransportRequest, TransportResponse } from "./transport.js";
export { AnthropicTransport } from "./anthropic-transport.js";
export type { AnthropicTransportOptions } from "./anthropic-transport.js";
export { OpenAITransport } from "./openai-transport.js";
export type { OpenAITransportOptions } from "./openai-transport.js";
export { resolveModels, createTransports, createClient } from "./config.js";
export type { ClientFactoryOptions } from "./config.js";
