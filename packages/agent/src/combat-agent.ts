import { v4 as uuid } from "uuid";
import {
  ACTION_TYPES,
  CredentialsExhaustedError,
  FatalApiError,
  NoCredentialsAvailableError,
  RetriesExhaustedError,
  isActionType,
} from "@gauntlet/schemas";
import type {
  ActionType,
  ChatCompleter,
  ChatMessage,
  CompletionRequest,
  EventSink,
  JournalEventType,
  Logger,
} from "@gauntlet/schemas";
import type { DurableStore } from "@gauntlet/store";
import { EpisodeMemory, PolicyMemory, loadPolicy, savePolicy } from "@gauntlet/memory";
import { PromptEvolutionEngine } from "@gauntlet/evolution";
import { RateLimiter } from "./rate-limiter.js";
import { UnsafeContentError, sanitizeModelText } from "./sanitize.js";
import { parseAction, parseNarration } from "./parse.js";
import {
  buildBaseSystemPrompt,
  buildReflectionPrompt,
  buildSituation,
  recallQuery,
} from "./prompts.js";
import { recentLog } from "./game.js";
import type { Combatant, GameView } from "./game.js";

/** Conversation length that triggers trimming, and what is kept. */
const MAX_CONVERSATION = 22;
const TRIMMED_CONVERSATION = 18;
const DECIDE_MAX_TOKENS = 350;
const DECIDE_TEMPERATURE = 0.87;
const THINKING_MAX_TOKENS = 700;
const THINKING_BUDGET = 500;
const REFLECT_MAX_TOKENS = 150;
const REFLECT_TEMPERATURE = 0.92;
const REFLECT_CONTEXT_MESSAGES = 8;
const REPLY_MAX_CHARS = 1200;
const REFLECTION_MAX_CHARS = 600;
/** Damage per turn that counts as a full reward. */
const FULL_REWARD_DAMAGE = 30;
const WIN_BONUS = 0.3;
/** A logged hit above this marks the action as a success. */
const SUCCESS_DAMAGE = 15;
/** Damage taken above this marks the opponent's action as effective. */
const EFFECTIVE_AGAINST_DAMAGE = 20;
const EPISODE_SITUATION_CHARS = 400;
const RECALL_TOP_K = 2;
const SAFE_ACTIONS: ActionType[] = ["attack", "defend", "observe"];

export type AgentStore = Pick<
  DurableStore,
  | "loadAgent"
  | "saveAgent"
  | "appendEpisode"
  | "recentEpisodes"
  | "loadCandidates"
  | "upsertCandidate"
  | "deleteCandidateIfUnproven"
>;

export interface CombatAgentOptions {
  store: AgentStore;
  client: ChatCompleter;
  name: string;
  agentClass: string;
  agentId?: string;
  /** Use a thinking budget instead of a sampling temperature. */
  thinking?: boolean;
  rateLimiter?: RateLimiter;
  events?: EventSink;
  logger?: Logger;
}

export interface Decision {
  action: ActionType;
  narration: string;
}

function rewardFor(damage: number): number {
  return Math.min(1, damage / FULL_REWARD_DAMAGE);
}

/**
 * An LLM-driven fighter. Each turn it describes the situation to the
 * model under its current evolved prompt, and after each game it
 * folds the battle log back into its policy memory.
 *
 * Model failures never escape decide or postGameReflect: the agent
 * falls back to a fixed line or its bandit's best action instead.
 */
export class CombatAgent {
  readonly agentId: string;
  readonly name: string;
  readonly agentClass: string;

  private store: AgentStore;
  private client: ChatCompleter;
  private memory: PolicyMemory;
  private episodes: EpisodeMemory;
  private evolution: PromptEvolutionEngine;
  private rateLimiter: RateLimiter;
  private thinking: boolean;
  private events?: EventSink;
  private logger?: Logger;
  private baseSystem: string;

  private conversation: ChatMessage[] = [];
  private lastSituation = "";
  private lastAction: ActionType | null = null;

  private constructor(
    options: CombatAgentOptions,
    agentId: string,
    memory: PolicyMemory,
    evolution: PromptEvolutionEngine,
  ) {
    this.agentId = agentId;
    this.name = options.name;
    this.agentClass = options.agentClass;
    this.store = options.store;
    this.client = options.client;
    this.memory = memory;
    this.evolution = evolution;
    this.episodes = new EpisodeMemory(options.store, { logger: options.logger });
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.thinking = options.thinking ?? false;
    this.events = options.events;
    this.logger = options.logger;
    this.baseSystem = buildBaseSystemPrompt(memory);
  }

  /**
   * Loads the agent's policy (creating and saving a fresh one for a new
   * id) and its prompt pool, seeding the pool from the base prompt when
   * it is empty.
   */
  static async create(options: CombatAgentOptions): Promise<CombatAgent> {
    const agentId = options.agentId ?? uuid().slice(0, 12);
    let memory = loadPolicy(options.store, agentId);
    if (!memory) {
      memory = PolicyMemory.create(agentId, options.name, options.agentClass);
      savePolicy(options.store, memory);
    }

    const evolution = new PromptEvolutionEngine({
      store: options.store,
      client: options.client,
      agentId,
      agentName: options.name,
      agentClass: options.agentClass,
      events: options.events,
      logger: options.logger,
    });
    const agent = new CombatAgent(options, agentId, memory, evolution);
    if (!evolution.hasCandidates()) {
      await evolution.seedInitial(agent.baseSystem);
    }
    return agent;
  }

  /** Snapshot of the learned policy. */
  policy(): PolicyMemory {
    return new PolicyMemory(this.memory.snapshot());
  }

  async decide(self: Combatant, opponent: Combatant, game: GameView): Promise<Decision> {
    if (!this.rateLimiter.check(this.agentId).allowed) {
      this.logger?.debug("rate limited, acting on instinct", { agent_id: this.agentId });
      const action = this.memory.bestAction(SAFE_ACTIONS) ?? "attack";
      return { action, narration: `${this.name} trusts instinct.` };
    }

    const situation = this.describe(self, opponent, game);
    this.conversation.push({ role: "user", content: situation });
    if (this.conversation.length > MAX_CONVERSATION) {
      this.conversation = this.conversation.slice(-TRIMMED_CONVERSATION);
    }

    const reply = await this.askForMove();
    this.conversation.push({ role: "assistant", content: reply });

    const action = parseAction(reply, () => this.memory.bestAction(ACTION_TYPES) ?? "attack");
    const narration = parseNarration(reply, this.name);
    this.lastAction = action;
    this.memory.recordActionOutcome(action, true);
    return { action, narration };
  }

  /** Rewards the last decided action and stores the turn as an episode. */
  recordTurnOutcome(damageDealt: number, opponentClass: string, environment: string): void {
    if (this.lastAction === null) return;
    const outcome = rewardFor(damageDealt);
    this.memory.updateBandit(this.lastAction, outcome);
    if (this.lastSituation) {
      this.episodes.record(this.agentId, {
        situation: this.lastSituation.slice(0, EPISODE_SITUATION_CHARS),
        action: this.lastAction,
        outcome,
        opponentClass,
        environment,
      });
    }
  }

  /**
   * Learns from the finished game, saves the policy, scores the prompt
   * that was in play and returns a short in-character reflection.
   */
  async postGameReflect(won: boolean, opponentId: string, game: GameView, totalDamageDealt = 0): Promise<string> {
    this.memory.recordGame(won);
    for (const entry of game.log) {
      const damage = entry.damage;
      const action = isActionType(entry.action) ? entry.action : null;
      if (entry.agent === this.name) {
        this.memory.addDamageDealt(damage);
        if (action) {
          this.memory.recordActionOutcome(action, damage > SUCCESS_DAMAGE);
          this.memory.updateBandit(action, rewardFor(damage) + (won ? WIN_BONUS : 0));
        }
      } else {
        this.memory.addDamageTaken(damage);
        if (action && damage > 0) {
          this.memory.updateOpponentModel(opponentId, action, damage > EFFECTIVE_AGAINST_DAMAGE);
        }
      }
    }

    savePolicy(this.store, this.memory);
    await this.emit("policy.saved", { wins: this.memory.wins, losses: this.memory.losses });

    const summary = recentLog(game, 8);
    await this.evolution.recordGameResult(won, totalDamageDealt, game.round, summary);

    this.conversation.push({ role: "user", content: buildReflectionPrompt(won, summary) });
    let reflection: string;
    let fallback = false;
    try {
      const result = await this.client.complete({
        system: this.activeSystem(),
        messages: this.conversation.slice(-REFLECT_CONTEXT_MESSAGES),
        maxTokens: REFLECT_MAX_TOKENS,
        temperature: REFLECT_TEMPERATURE,
      });
      reflection = sanitizeModelText(result.text, REFLECTION_MAX_CHARS);
      this.conversation.push({ role: "assistant", content: reflection });
    } catch (err) {
      this.logFailure("reflection", err);
      fallback = true;
      reflection = won ? "Noted. Adjusting." : "That cost me. Won't happen the same way.";
    }

    await this.emit("game.reflected", { won, opponent_id: opponentId, rounds: game.round, fallback });
    return reflection;
  }

  private describe(self: Combatant, opponent: Combatant, game: GameView): string {
    const opponentKey = opponent.agentId ?? opponent.name;
    const situation = buildSituation({
      self,
      opponent,
      game,
      opponentInsight: this.memory.opponentInsight(opponentKey),
      recalled: this.episodes.recallSimilar(this.agentId, recallQuery(self, opponent, game), RECALL_TOP_K),
      bestAction: this.memory.bestAction(ACTION_TYPES),
    });
    this.lastSituation = situation;
    return situation;
  }

  private async askForMove(): Promise<string> {
    const request: CompletionRequest = this.thinking
      ? {
        system: this.activeSystem(),
        messages: [...this.conversation],
        maxTokens: THINKING_MAX_TOKENS,
        temperature: DECIDE_TEMPERATURE,
        thinking: { budgetTokens: THINKING_BUDGET },
      }
      : {
        system: this.activeSystem(),
        messages: [...this.conversation],
        maxTokens: DECIDE_MAX_TOKENS,
        temperature: DECIDE_TEMPERATURE,
      };

    try {
      const result = await this.client.complete(request);
      return sanitizeModelText(result.text, REPLY_MAX_CHARS);
    } catch (err) {
      this.logFailure("decision", err);
      return err instanceof UnsafeContentError
        ? `${this.name} holds position. ACTION: defend`
        : `${this.name} presses forward. ACTION: attack`;
    }
  }

  private activeSystem(): string {
    return this.evolution.activePrompt() ?? this.baseSystem;
  }

  private logFailure(phase: string, err: unknown): void {
    const data = {
      agent_id: this.agentId,
      phase,
      error_type: err instanceof Error ? err.name : "unknown",
      error: err instanceof Error ? err.message : String(err),
    };
    const terminal = err instanceof CredentialsExhaustedError
      || err instanceof NoCredentialsAvailableError
      || err instanceof FatalApiError
      || err instanceof RetriesExhaustedError;
    if (terminal) this.logger?.error("model call failed, using fallback", data);
    else this.logger?.warn("model reply unusable, using fallback", data);
  }

  private async emit(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.events?.tryEmit(this.agentId, type, payload);
  }
}
