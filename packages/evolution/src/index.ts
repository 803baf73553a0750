export {
  PromptEvolutionEngine,
  EVOLVE_EVERY,
  VARIANTS_PER_ROUND,
  MIN_POOL_GAMES,
  MAX_POOL_SIZE,
} from "./engine.js";
export type { PromptEvolutionEngineOptions, CandidateStore } from "./engine.js";
export {
  selectActive,
  candidateScore,
  winRate,
  evaluations,
  totalEvaluations,
  ema,
  EMA_ALPHA,
  MAX_DAMAGE_BONUS,
} from "./scoring.js";
export {
  buildVariantPrompt,
  parseVariants,
  VARIANT_SYSTEM_PROMPT,
  VARIANT_MAX_TOKENS,
  VARIANT_TEMPERATURE,
  MIN_VARIANT_CHARS,
  MAX_SEED_CHARS,
} from "./variants.js";
export type { VariantPromptInput } from "./variants.js";
