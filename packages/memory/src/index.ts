export { embedText, cosineSimilarity, EMBEDDING_DIM } from "./embedding.js";
export { PolicyMemory, NEUTRAL_PREFERENCE, PREFERENCE_SMOOTHING } from "./policy-memory.js";
export {
  EpisodeMemory,
  MAX_SITUATION_CHARS,
  RECALL_WINDOW,
  DEFAULT_TOP_K,
  DEFAULT_MIN_SIMILARITY,
} from "./episode-memory.js";
export type { EpisodeStore, EpisodeMemoryOptions, EpisodeInput } from "./episode-memory.js";
export { loadPolicy, savePolicy } from "./persistence.js";
export type { PolicyStore } from "./persistence.js";
