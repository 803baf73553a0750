import { v4 as uuid } from "uuid";
import { Mutex } from "@gauntlet/schemas";
import type {
  ChatCompleter,
  EventSink,
  JournalEventType,
  Logger,
  PromptCandidate,
} from "@gauntlet/schemas";
import type { DurableStore } from "@gauntlet/store";
import {
  candidateScore,
  ema,
  selectActive,
  totalEvaluations,
  winRate,
} from "./scoring.js";
import {
  VARIANT_MAX_TOKENS,
  VARIANT_SYSTEM_PROMPT,
  VARIANT_TEMPERATURE,
  buildVariantPrompt,
  parseVariants,
} from "./variants.js";

/** Games between evolution rounds. */
export const EVOLVE_EVERY = 5;
/** Variants requested per evolution round. */
export const VARIANTS_PER_ROUND = 3;
/** Recorded games the pool needs before it may evolve. */
export const MIN_POOL_GAMES = 3;
/** Pool size above which the weakest candidates are evicted. */
export const MAX_POOL_SIZE = 12;

export type CandidateStore = Pick<DurableStore, "loadCandidates" | "upsertCandidate" | "deleteCandidateIfUnproven">;

export interface PromptEvolutionEngineOptions {
  store: CandidateStore;
  client: ChatCompleter;
  agentId: string;
  agentName: string;
  agentClass: string;
  evolveEvery?: number;
  variantsPerRound?: number;
  minPoolGames?: number;
  maxPoolSize?: number;
  /** Epoch-seconds clock for created_at. */
  now?: () => number;
  events?: EventSink;
  logger?: Logger;
}

/**
 * Per-agent pool of competing system prompts. Picks the prompt for the
 * next game by UCB1, scores it when the game ends and every few games
 * asks the model for rewrites of the best performer.
 *
 * Result recording and evolution share one lock: the rewrite call is
 * awaited halfway through a pool mutation.
 */
export class PromptEvolutionEngine {
  private store: CandidateStore;
  private client: ChatCompleter;
  private agentId: string;
  private agentName: string;
  private agentClass: string;
  private evolveEvery: number;
  private variantsPerRound: number;
  private minPoolGames: number;
  private maxPoolSize: number;
  private now: () => number;
  private events?: EventSink;
  private logger?: Logger;

  private pool: PromptCandidate[] = [];
  private currentId: string | null = null;
  private gamesSinceEvolution = 0;
  private mutex = new Mutex();

  constructor(options: PromptEvolutionEngineOptions) {
    this.store = options.store;
    this.client = options.client;
    this.agentId = options.agentId;
    this.agentName = options.agentName;
    this.agentClass = options.agentClass;
    this.evolveEvery = options.evolveEvery ?? EVOLVE_EVERY;
    this.variantsPerRound = options.variantsPerRound ?? VARIANTS_PER_ROUND;
    this.minPoolGames = options.minPoolGames ?? MIN_POOL_GAMES;
    this.maxPoolSize = options.maxPoolSize ?? MAX_POOL_SIZE;
    this.now = options.now ?? (() => Date.now() / 1000);
    this.events = options.events;
    this.logger = options.logger;
    this.load();
  }

  /** Replaces the in-memory pool with the agent's stored candidates. */
  load(): void {
    this.pool = this.store.loadCandidates(this.agentId);
    this.currentId = null;
  }

  hasCandidates(): boolean {
    return this.pool.length > 0;
  }

  candidates(): PromptCandidate[] {
    return structuredClone(this.pool);
  }

  get pendingGames(): number {
    return this.gamesSinceEvolution;
  }

  /** Starts the pool from a hand-written prompt at generation 0. */
  async seedInitial(text: string): Promise<PromptCandidate> {
    return this.mutex.runExclusive(async () => {
      const seed = this.newCandidate(`seed_${this.agentId}`, text, 0);
      this.store.upsertCandidate(seed);
      this.pool = [seed];
      this.currentId = null;
      await this.emit("prompt.seeded", { prompt_id: seed.prompt_id, chars: text.length });
      return structuredClone(seed);
    });
  }

  /**
   * Text of the candidate to play next, or null with an empty pool.
   * The pick is remembered for recordGameResult.
   */
  activePrompt(): string | null {
    if (this.pool.length === 0) return null;
    const picked = selectActive(this.pool);
    this.currentId = picked.prompt_id;
    return picked.text;
  }

  /** Scores one game for a candidate, then evolves if a round is due. */
  async recordResult(
    candidateId: string,
    won: boolean,
    damage: number,
    roundsSurvived: number,
    feedback = "",
  ): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.applyResult(candidateId, won, damage, roundsSurvived);
      await this.afterGame(feedback);
    });
  }

  /** Scores the game for the candidate last handed out by activePrompt. */
  async recordGameResult(won: boolean, damage: number, rounds: number, battleSummary: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.currentId !== null) {
        this.applyResult(this.currentId, won, damage, rounds);
      }
      await this.afterGame(battleSummary);
    });
  }

  /** Runs one evolution round now. Returns the candidates it added. */
  async evolve(feedback: string): Promise<PromptCandidate[]> {
    return this.mutex.runExclusive(() => this.evolveLocked(feedback));
  }

  private applyResult(candidateId: string, won: boolean, damage: number, rounds: number): void {
    const candidate = this.pool.find((c) => c.prompt_id === candidateId);
    if (!candidate) {
      this.logger?.warn("result for unknown candidate", { prompt_id: candidateId });
      return;
    }
    if (won) candidate.wins++;
    else candidate.losses++;
    candidate.avg_damage = ema(candidate.avg_damage, damage);
    candidate.avg_rounds = ema(candidate.avg_rounds, rounds);
    this.store.upsertCandidate(candidate);
  }

  private async afterGame(feedback: string): Promise<void> {
    this.gamesSinceEvolution++;
    if (this.gamesSinceEvolution >= this.evolveEvery && totalEvaluations(this.pool) >= this.minPoolGames) {
      this.gamesSinceEvolution = 0;
      await this.evolveLocked(feedback);
    }
  }

  private async evolveLocked(feedback: string): Promise<PromptCandidate[]> {
    if (this.pool.length === 0) return [];

    const seed = this.pool.reduce((best, c) => (winRate(c) > winRate(best) ? c : best));
    const generation = Math.max(...this.pool.map((c) => c.generation)) + 1;
    const texts = await this.generateVariants(seed, feedback);

    const added = texts.map((text) => this.newCandidate(`evo_${this.agentId}_${uuid()}`, text, generation));
    for (const candidate of added) {
      this.store.upsertCandidate(candidate);
      this.pool.push(candidate);
    }

    this.logger?.info("prompt pool evolved", {
      seed: seed.prompt_id,
      generation,
      added: added.length,
    });
    await this.emit("prompt.evolved", {
      seed_id: seed.prompt_id,
      seed_win_rate: winRate(seed),
      generation,
      requested: this.variantsPerRound,
      accepted: added.length,
      prompt_ids: added.map((c) => c.prompt_id),
    });

    if (this.pool.length > this.maxPoolSize) {
      await this.prune();
    }
    return structuredClone(added);
  }

  private async generateVariants(seed: PromptCandidate, feedback: string): Promise<string[]> {
    const prompt = buildVariantPrompt({
      agentName: this.agentName,
      agentClass: this.agentClass,
      seedText: seed.text,
      seedWinRate: winRate(seed),
      feedback,
      count: this.variantsPerRound,
    });
    try {
      const result = await this.client.complete({
        system: VARIANT_SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
        maxTokens: VARIANT_MAX_TOKENS,
        temperature: VARIANT_TEMPERATURE,
      });
      return parseVariants(result.text, this.variantsPerRound);
    } catch (err) {
      this.logger?.warn("variant generation failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  /**
   * Keeps the best `maxPoolSize - 2` by score. Evicted rows are deleted
   * from the store only while they have fewer than two games; proven
   * ones stay stored but leave the active pool.
   */
  private async prune(): Promise<void> {
    const total = totalEvaluations(this.pool);
    const scores = new Map(this.pool.map((c) => [c.prompt_id, candidateScore(c, total)]));
    const scoreOf = (c: PromptCandidate): number => scores.get(c.prompt_id) ?? 0;
    // Infinity - Infinity is NaN, so compare instead of subtracting
    const ranked = [...this.pool].sort((a, b) => (scoreOf(a) === scoreOf(b) ? 0 : scoreOf(a) > scoreOf(b) ? -1 : 1));
    const kept = ranked.slice(0, this.maxPoolSize - 2);
    const evicted = ranked.slice(this.maxPoolSize - 2);

    const deleted: string[] = [];
    for (const candidate of evicted) {
      if (this.store.deleteCandidateIfUnproven(candidate.prompt_id)) {
        deleted.push(candidate.prompt_id);
      }
    }
    this.pool = kept;
    if (this.currentId !== null && !kept.some((c) => c.prompt_id === this.currentId)) {
      this.currentId = null;
    }

    await this.emit("prompt.pruned", {
      kept: kept.length,
      evicted: evicted.map((c) => c.prompt_id),
      deleted,
    });
  }

  private newCandidate(promptId: string, text: string, generation: number): PromptCandidate {
    return {
      prompt_id: promptId,
      agent_id: this.agentId,
      text,
      wins: 0,
      losses: 0,
      avg_damage: 0,
      avg_rounds: 0,
      generation,
      created_at: this.now(),
    };
  }

  private async emit(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.events?.tryEmit(this.agentId, type, payload);
  }
}
