export * from "./types.js";
export * from "./errors.js";
export { TimeoutError, withTimeout, sleep } from "./timeout.js";
export { Mutex } from "./mutex.js";
export {
  validateJournalEventData,
  parseActionPreferences,
  parseBanditStats,
  parseOpponentModels,
  parseEmbedding,
  parseAnthropicMessage,
  parseOpenAIChatCompletion,
  parseJson,
} from "./validator.js";
export type {
  ValidationResult,
  Parsed,
  AnthropicMessageShape,
  OpenAIChatCompletionShape,
} from "./validator.js";
