import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Database, ParamsObject } from "sql.js";
import type { BattleLogEntry, Episode, GameRecord, HeadToHead, PromptCandidate } from "@gauntlet/schemas";
import { loadSqlite, nullableText, num, Query, Statement, text } from "./sqlite.js";

/** Agent row as stored; the three policy maps stay as JSON text. */
export interface AgentRow {
  agent_id: string;
  name: string;
  agent_class: string;
  level: number;
  wins: number;
  losses: number;
  dmg_dealt: number;
  dmg_taken: number;
  pref_actions: string;
  opp_models: string;
  ucb_stats: string;
}

export interface EpisodeRow {
  id: number;
  agent_id: string;
  situation: string;
  embedding: string;
  action: string;
  outcome: number;
  opp_class: string;
  env: string;
  created_at: number;
}

export interface StoredGame extends GameRecord {
  created_at: number;
}

interface GameRow {
  game_id: string;
  agent1_id: string;
  agent2_id: string;
  winner_id: string | null;
  rounds: number;
  env: string;
  log: string;
  created_at: number;
}

type AgentParams = [string, string, string, number, number, number, number, number, string, string, string, number];
type EpisodeParams = [string, string, string, string, number, string, string, number];
type CandidateParams = [string, string, string, number, number, number, number, number, number];
type GameParams = [string, string, string, string | null, number, string, string, number];

interface WinnerCount {
  winner_id: string | null;
  cnt: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS agents (
    agent_id     TEXT PRIMARY KEY,
    name         TEXT NOT NULL,
    agent_class  TEXT NOT NULL,
    level        INTEGER NOT NULL DEFAULT 1,
    wins         INTEGER NOT NULL DEFAULT 0,
    losses       INTEGER NOT NULL DEFAULT 0,
    dmg_dealt    INTEGER NOT NULL DEFAULT 0,
    dmg_taken    INTEGER NOT NULL DEFAULT 0,
    pref_actions TEXT NOT NULL DEFAULT '{}',
    opp_models   TEXT NOT NULL DEFAULT '{}',
    ucb_stats    TEXT NOT NULL DEFAULT '{}',
    created_at   INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER)),
    updated_at   INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER))
  );

  CREATE TABLE IF NOT EXISTS episodes (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    agent_id    TEXT NOT NULL,
    situation   TEXT NOT NULL,
    embedding   TEXT NOT NULL,
    action      TEXT NOT NULL,
    outcome     REAL NOT NULL DEFAULT 0,
    opp_class   TEXT NOT NULL DEFAULT '',
    env         TEXT NOT NULL DEFAULT '',
    created_at  REAL NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_episodes_agent ON episodes(agent_id, id DESC);

  CREATE TABLE IF NOT EXISTS prompt_candidates (
    prompt_id   TEXT PRIMARY KEY,
    agent_id    TEXT NOT NULL,
    text        TEXT NOT NULL,
    wins        INTEGER NOT NULL DEFAULT 0,
    losses      INTEGER NOT NULL DEFAULT 0,
    avg_dmg     REAL NOT NULL DEFAULT 0,
    avg_rounds  REAL NOT NULL DEFAULT 0,
    generation  INTEGER NOT NULL DEFAULT 0,
    created_at  REAL NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_prompt_agent ON prompt_candidates(agent_id);

  CREATE TABLE IF NOT EXISTS games (
    game_id    TEXT PRIMARY KEY,
    agent1_id  TEXT NOT NULL,
    agent2_id  TEXT NOT NULL,
    winner_id  TEXT,
    rounds     INTEGER NOT NULL DEFAULT 0,
    env        TEXT NOT NULL DEFAULT '',
    log        TEXT NOT NULL DEFAULT '[]',
    created_at INTEGER NOT NULL DEFAULT (CAST(strftime('%s', 'now') AS INTEGER))
  );
  CREATE INDEX IF NOT EXISTS idx_games_agents ON games(agent1_id, agent2_id);
`;

export interface DurableStoreOptions {
  /** Epoch-seconds clock for timestamps the store stamps itself. */
  now?: () => number;
}

const MEMORY_PATH = ":memory:";

function readAgent(row: ParamsObject): AgentRow {
  return {
    agent_id: text(row, "agent_id"),
    name: text(row, "name"),
    agent_class: text(row, "agent_class"),
    level: num(row, "level"),
    wins: num(row, "wins"),
    losses: num(row, "losses"),
    dmg_dealt: num(row, "dmg_dealt"),
    dmg_taken: num(row, "dmg_taken"),
    pref_actions: text(row, "pref_actions"),
    opp_models: text(row, "opp_models"),
    ucb_stats: text(row, "ucb_stats"),
  };
}

function readEpisode(row: ParamsObject): EpisodeRow {
  return {
    id: num(row, "id"),
    agent_id: text(row, "agent_id"),
    situation: text(row, "situation"),
    embedding: text(row, "embedding"),
    action: text(row, "action"),
    outcome: num(row, "outcome"),
    opp_class: text(row, "opp_class"),
    env: text(row, "env"),
    created_at: num(row, "created_at"),
  };
}

function readCandidate(row: ParamsObject): PromptCandidate {
  return {
    prompt_id: text(row, "prompt_id"),
    agent_id: text(row, "agent_id"),
    text: text(row, "text"),
    wins: num(row, "wins"),
    losses: num(row, "losses"),
    avg_damage: num(row, "avg_damage"),
    avg_rounds: num(row, "avg_rounds"),
    generation: num(row, "generation"),
    created_at: num(row, "created_at"),
  };
}

function readGame(row: ParamsObject): GameRow {
  return {
    game_id: text(row, "game_id"),
    agent1_id: text(row, "agent1_id"),
    agent2_id: text(row, "agent2_id"),
    winner_id: nullableText(row, "winner_id"),
    rounds: num(row, "rounds"),
    env: text(row, "env"),
    log: text(row, "log"),
    created_at: num(row, "created_at"),
  };
}

function readWinnerCount(row: ParamsObject): WinnerCount {
  return { winner_id: nullableText(row, "winner_id"), cnt: num(row, "cnt") };
}

/**
 * SQLite persistence for agents, episodes, prompt candidates and games,
 * on the sql.js build of SQLite. The database lives in memory; a
 * file-backed store rewrites its file after every change.
 */
export class DurableStore {
  private db: Database;
  private file: string | null;
  private now: () => number;

  private stmtLoadAgent: Query<[string], AgentRow>;
  private stmtSaveAgent: Statement<AgentParams>;
  private stmtAppendEpisode: Statement<EpisodeParams>;
  private stmtRecentEpisodes: Query<[string, number], EpisodeRow>;
  private stmtLoadCandidates: Query<[string], PromptCandidate>;
  private stmtUpsertCandidate: Statement<CandidateParams>;
  private stmtDeleteUnproven: Statement<[string]>;
  private stmtSaveGame: Statement<GameParams>;
  private stmtLoadGame: Query<[string], GameRow>;
  private stmtHeadToHead: Query<[string, string, string, string], WinnerCount>;

  /** Opens `dbPath`, creating it and its directory when missing. ":memory:" keeps nothing on disk. */
  static async open(dbPath: string, options?: DurableStoreOptions): Promise<DurableStore> {
    const sqlite = await loadSqlite();
    if (dbPath === MEMORY_PATH) {
      return new DurableStore(new sqlite.Database(), null, options);
    }
    mkdirSync(dirname(dbPath), { recursive: true });
    const data = existsSync(dbPath) ? readFileSync(dbPath) : null;
    return new DurableStore(new sqlite.Database(data), dbPath, options);
  }

  private constructor(db: Database, file: string | null, options?: DurableStoreOptions) {
    this.db = db;
    this.file = file;
    this.db.exec(SCHEMA);
    this.now = options?.now ?? (() => Math.floor(Date.now() / 1000));

    this.stmtLoadAgent = new Query(db,
      `SELECT agent_id, name, agent_class, level, wins, losses, dmg_dealt, dmg_taken,
              pref_actions, opp_models, ucb_stats
         FROM agents WHERE agent_id = ?`,
      readAgent,
    );
    this.stmtSaveAgent = new Statement(db,
      `INSERT INTO agents (agent_id, name, agent_class, level, wins, losses, dmg_dealt, dmg_taken,
                           pref_actions, opp_models, ucb_stats, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(agent_id) DO UPDATE SET
         name = excluded.name,
         agent_class = excluded.agent_class,
         level = excluded.level,
         wins = excluded.wins,
         losses = excluded.losses,
         dmg_dealt = excluded.dmg_dealt,
         dmg_taken = excluded.dmg_taken,
         pref_actions = excluded.pref_actions,
         opp_models = excluded.opp_models,
         ucb_stats = excluded.ucb_stats,
         updated_at = excluded.updated_at`
    );
    this.stmtAppendEpisode = new Statement(db,
      `INSERT INTO episodes (agent_id, situation, embedding, action, outcome, opp_class, env, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    this.stmtRecentEpisodes = new Query(db,
      `SELECT id, agent_id, situation, embedding, action, outcome, opp_class, env, created_at
         FROM episodes WHERE agent_id = ? ORDER BY id DESC LIMIT ?`,
      readEpisode,
    );
    this.stmtLoadCandidates = new Query(db,
      `SELECT prompt_id, agent_id, text, wins, losses, avg_dmg AS avg_damage, avg_rounds,
              generation, created_at
         FROM prompt_candidates WHERE agent_id = ?
        ORDER BY generation DESC, wins DESC`,
      readCandidate,
    );
    this.stmtUpsertCandidate = new Statement(db,
      `INSERT INTO prompt_candidates (prompt_id, agent_id, text, wins, losses, avg_dmg, avg_rounds, generation, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(prompt_id) DO UPDATE SET
         wins = excluded.wins,
         losses = excluded.losses,
         avg_dmg = excluded.avg_dmg,
         avg_rounds = excluded.avg_rounds`
    );
    this.stmtDeleteUnproven = new Statement(db,
      `DELETE FROM prompt_candidates WHERE prompt_id = ? AND wins + losses < 2`
    );
    this.stmtSaveGame = new Statement(db,
      `INSERT INTO games (game_id, agent1_id, agent2_id, winner_id, rounds, env, log, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(game_id) DO UPDATE SET
         winner_id = excluded.winner_id,
         rounds = excluded.rounds,
         log = excluded.log`
    );
    this.stmtLoadGame = new Query(db,
      `SELECT game_id, agent1_id, agent2_id, winner_id, rounds, env, log, created_at
         FROM games WHERE game_id = ?`,
      readGame,
    );
    this.stmtHeadToHead = new Query(db,
      `SELECT winner_id, COUNT(*) AS cnt FROM games
        WHERE (agent1_id = ? AND agent2_id = ?) OR (agent1_id = ? AND agent2_id = ?)
        GROUP BY winner_id`,
      readWinnerCount,
    );
    this.persist();
  }

  /** Path of the backing file, null for an in-memory store. */
  get path(): string | null {
    return this.file;
  }

  // ─── Agents ─────────────────────────────────────────────────────

  loadAgent(agentId: string): AgentRow | null {
    return this.stmtLoadAgent.get(agentId) ?? null;
  }

  saveAgent(row: AgentRow): void {
    this.stmtSaveAgent.run(
      row.agent_id, row.name, row.agent_class, row.level, row.wins, row.losses,
      row.dmg_dealt, row.dmg_taken, row.pref_actions, row.opp_models, row.ucb_stats,
      this.now(),
    );
    this.persist();
  }

  // ─── Episodes ───────────────────────────────────────────────────

  appendEpisode(episode: Episode): void {
    this.stmtAppendEpisode.run(
      episode.agent_id,
      episode.situation,
      JSON.stringify(episode.embedding),
      episode.action,
      episode.outcome,
      episode.opponent_class,
      episode.environment,
      episode.created_at,
    );
    this.persist();
  }

  /** Newest first. */
  recentEpisodes(agentId: string, limit: number): EpisodeRow[] {
    return this.stmtRecentEpisodes.all(agentId, limit);
  }

  // ─── Prompt candidates ──────────────────────────────────────────

  loadCandidates(agentId: string): PromptCandidate[] {
    return this.stmtLoadCandidates.all(agentId);
  }

  /** Inserts a new candidate; on conflict only the performance fields change. */
  upsertCandidate(candidate: PromptCandidate): void {
    this.stmtUpsertCandidate.run(
      candidate.prompt_id,
      candidate.agent_id,
      candidate.text,
      candidate.wins,
      candidate.losses,
      candidate.avg_damage,
      candidate.avg_rounds,
      candidate.generation,
      candidate.created_at,
    );
    this.persist();
  }

  /** Deletes the candidate only when it has fewer than two recorded games. Returns whether a row went. */
  deleteCandidateIfUnproven(promptId: string): boolean {
    const deleted = this.stmtDeleteUnproven.run(promptId) > 0;
    if (deleted) this.persist();
    return deleted;
  }

  // ─── Games ──────────────────────────────────────────────────────

  saveGame(game: GameRecord): void {
    this.stmtSaveGame.run(
      game.game_id,
      game.agent1_id,
      game.agent2_id,
      game.winner_id,
      game.rounds,
      game.environment,
      JSON.stringify(game.log),
      this.now(),
    );
    this.persist();
  }

  loadGame(gameId: string): StoredGame | null {
    const row = this.stmtLoadGame.get(gameId);
    if (!row) return null;
    return {
      game_id: row.game_id,
      agent1_id: row.agent1_id,
      agent2_id: row.agent2_id,
      winner_id: row.winner_id,
      rounds: row.rounds,
      environment: row.env,
      log: parseLog(row.log),
      created_at: row.created_at,
    };
  }

  headToHead(agentA: string, agentB: string): HeadToHead {
    const result: HeadToHead = { total: 0, draws: 0, wins: { [agentA]: 0, [agentB]: 0 } };
    for (const row of this.stmtHeadToHead.all(agentA, agentB, agentB, agentA)) {
      result.total += row.cnt;
      if (row.winner_id === agentA || row.winner_id === agentB) {
        result.wins[row.winner_id] = (result.wins[row.winner_id] ?? 0) + row.cnt;
      } else {
        result.draws += row.cnt;
      }
    }
    return result;
  }

  close(): void {
    this.db.close();
  }

  // Whole-file rewrite through a temp file and rename
  private persist(): void {
    if (!this.file) return;
    const tmp = `${this.file}.tmp`;
    writeFileSync(tmp, this.db.export());
    renameSync(tmp, this.file);
  }
}

function parseLog(text: string): BattleLogEntry[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return [];
  }
  if (!Array.isArray(value)) return [];
  return value.filter(isBattleLogEntry);
}

function isBattleLogEntry(value: unknown): value is BattleLogEntry {
  if (typeof value !== "object" || value === null) return false;
  return "round" in value && typeof value.round === "number"
    && "agent" in value && typeof value.agent === "string"
    && "action" in value && typeof value.action === "string"
    && "narration" in value && typeof value.narration === "string"
    && "damage" in value && typeof value.damage === "number";
}
