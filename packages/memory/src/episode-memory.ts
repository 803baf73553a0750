import { isActionType, parseEmbedding, parseJson } from "@gauntlet/schemas";
import type { ActionType, Logger, RecalledEpisode } from "@gauntlet/schemas";
import type { DurableStore } from "@gauntlet/store";
import { EMBEDDING_DIM, cosineSimilarity, embedText } from "./embedding.js";

export const MAX_SITUATION_CHARS = 500;
/** Recall scans only this many of an agent's latest episodes. */
export const RECALL_WINDOW = 120;
export const DEFAULT_TOP_K = 3;
export const DEFAULT_MIN_SIMILARITY = 0.25;

export type EpisodeStore = Pick<DurableStore, "appendEpisode" | "recentEpisodes">;

export interface EpisodeMemoryOptions {
  /** Epoch-seconds clock for created_at. */
  now?: () => number;
  logger?: Logger;
}

export interface EpisodeInput {
  situation: string;
  action: ActionType;
  outcome: number;
  opponentClass?: string;
  environment?: string;
}

/** Append-only log of (situation, action, outcome) with similarity recall. */
export class EpisodeMemory {
  private store: EpisodeStore;
  private now: () => number;
  private logger?: Logger;

  constructor(store: EpisodeStore, options?: EpisodeMemoryOptions) {
    this.store = store;
    this.now = options?.now ?? (() => Date.now() / 1000);
    this.logger = options?.logger;
  }

  record(agentId: string, episode: EpisodeInput): void {
    const situation = episode.situation.slice(0, MAX_SITUATION_CHARS);
    this.store.appendEpisode({
      agent_id: agentId,
      situation,
      embedding: embedText(episode.situation),
      action: episode.action,
      outcome: episode.outcome,
      opponent_class: episode.opponentClass ?? "",
      environment: episode.environment ?? "",
      created_at: this.now(),
    });
  }

  /**
   * The `k` most similar recent episodes at or above `minSimilarity`,
   * best first. Rows that no longer parse are skipped.
   */
  recallSimilar(
    agentId: string,
    text: string,
    k: number = DEFAULT_TOP_K,
    minSimilarity: number = DEFAULT_MIN_SIMILARITY,
  ): RecalledEpisode[] {
    const query = embedText(text);
    const scored: RecalledEpisode[] = [];
    let skipped = 0;

    for (const row of this.store.recentEpisodes(agentId, RECALL_WINDOW)) {
      const json = parseJson(row.embedding);
      const embedding = json.ok ? parseEmbedding(json.value) : json;
      if (!embedding.ok || embedding.value.length !== EMBEDDING_DIM || !isActionType(row.action)) {
        skipped++;
        continue;
      }
      const similarity = cosineSimilarity(query, embedding.value);
      if (similarity >= minSimilarity) {
        scored.push({ situation: row.situation, action: row.action, outcome: row.outcome, similarity });
      }
    }

    if (skipped > 0) {
      this.logger?.warn("skipped malformed episodes", { agent_id: agentId, skipped });
    }
    scored.sort((a, b) => b.similarity - a.similarity);
    return scored.slice(0, k);
  }
}
