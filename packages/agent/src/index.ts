export { CombatAgent } from "./combat-agent.js";
export type { CombatAgentOptions, AgentStore, Decision } from "./combat-agent.js";
export { RateLimiter } from "./rate-limiter.js";
export type { RateCheck } from "./rate-limiter.js";
export { sanitizeModelText, UnsafeContentError } from "./sanitize.js";
export { parseAction, parseNarration } from "./parse.js";
export {
  buildBaseSystemPrompt,
  buildSituation,
  buildReflectionPrompt,
  selfCondition,
  opponentCondition,
  recallQuery,
} from "./prompts.js";
export type { SituationInput } from "./prompts.js";
export { hpFraction, recentLog } from "./game.js";
export type { Combatant, GameView, InventoryItem } from "./game.js";
