/**
 * Gauntlet Core Types
 *
 * Canonical data models shared by every package. Persisted records use
 * snake_case field names so rows and in-memory copies line up.
 */

// ─── Actions ────────────────────────────────────────────────────────

export const ACTION_TYPES = [
  "attack",
  "defend",
  "cast_spell",
  "use_item",
  "negotiate",
  "flee",
  "taunt",
  "observe",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export function isActionType(value: string): value is ActionType {
  return (ACTION_TYPES as readonly string[]).includes(value);
}

/** Per-action map; actions the agent has never touched are simply absent. */
export type ActionMap<T> = Partial<Record<ActionType, T>>;

// ─── Prompt Evolution ───────────────────────────────────────────────

export interface PromptCandidate {
  prompt_id: string;
  agent_id: string;
  text: string;
  wins: number;
  losses: number;
  /** Exponential moving average of damage dealt per game. */
  avg_damage: number;
  /** Exponential moving average of rounds survived per game. */
  avg_rounds: number;
  generation: number;
  /** Unix epoch seconds. */
  created_at: number;
}

// ─── Policy Memory ──────────────────────────────────────────────────

export interface BanditArm {
  total_reward: number;
  plays: number;
}

export interface AgentPolicyState {
  agent_id: string;
  name: string;
  agent_class: string;
  level: number;
  wins: number;
  losses: number;
  damage_dealt: number;
  damage_taken: number;
  /** EMA success score per action, always within [0, 1]. */
  action_preferences: ActionMap<number>;
  bandit_stats: ActionMap<BanditArm>;
  /** opponent id → signed tally of how well each action worked against them. */
  opponent_models: Record<string, ActionMap<number>>;
}

export interface Episode {
  agent_id: string;
  situation: string;
  embedding: number[];
  action: ActionType;
  outcome: number;
  opponent_class: string;
  environment: string;
  /** Unix epoch seconds. */
  created_at: number;
}

export interface RecalledEpisode {
  situation: string;
  action: ActionType;
  outcome: number;
  similarity: number;
}

// ─── Games ──────────────────────────────────────────────────────────

export interface BattleLogEntry {
  round: number;
  agent: string;
  action: string;
  narration: string;
  damage: number;
}

export interface GameRecord {
  game_id: string;
  agent1_id: string;
  agent2_id: string;
  winner_id: string | null;
  rounds: number;
  environment: string;
  log: BattleLogEntry[];
}

export interface HeadToHead {
  total: number;
  draws: number;
  wins: Record<string, number>;
}

// ─── Credentials ────────────────────────────────────────────────────

export type Provider = "anthropic" | "openai";

export interface CredentialConfig {
  key: string;
  provider: Provider;
  alias: string;
  monthly_budget_usd: number;
  cost_per_1k_input: number;
  cost_per_1k_output: number;
}

export interface CredentialSummary {
  alias: string;
  provider: Provider;
  available: boolean;
  active: boolean;
  health: number;
  cost_usd: number;
  budget_remaining_usd: number;
  tokens_in: number;
  tokens_out: number;
  errors_ratelimit: number;
  errors_server: number;
  cooldown_remaining_s: number;
}

// ─── Model Calls ────────────────────────────────────────────────────

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface ThinkingOptions {
  budgetTokens: number;
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  /** When set, the request uses a thinking budget instead of a sampling temperature. */
  thinking?: ThinkingOptions;
}

export interface CompletionResult {
  text: string;
  tokensIn: number;
  tokensOut: number;
  modelId: string;
  credentialAlias: string;
  latencyMs: number;
}

/** The one operation the evolution engine and agents need from the call layer. */
export interface ChatCompleter {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Journal Events ─────────────────────────────────────────────────

export type JournalEventType =
  | "llm.call.succeeded"
  | "llm.call.retry"
  | "llm.call.failed"
  | "credential.cooldown"
  | "prompt.seeded"
  | "prompt.evolved"
  | "prompt.pruned"
  | "policy.saved"
  | "game.reflected";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  /** Agent id, or "system" for pool-level events. */
  scope_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

/** Narrow sink the core packages emit into; the Journal implements it. */
export interface EventSink {
  tryEmit(scopeId: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null>;
}
