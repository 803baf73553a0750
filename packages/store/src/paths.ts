import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const DB_FILE_NAME = "gauntlet.db";

/** `GAUNTLET_DATA_DIR`, else the XDG data home, else `~/.local/share/gauntlet`. */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.GAUNTLET_DATA_DIR?.trim();
  if (override) return resolve(override);
  const xdg = env.XDG_DATA_HOME?.trim();
  if (xdg) return join(resolve(xdg), "gauntlet");
  return join(homedir(), ".local", "share", "gauntlet");
}

export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.GAUNTLET_DB_PATH?.trim();
  if (override) return override === ":memory:" ? override : resolve(override);
  return join(resolveDataDir(env), DB_FILE_NAME);
}

export const JOURNAL_FILE_NAME = "journal.jsonl";

export function resolveJournalPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.GAUNTLET_JOURNAL_PATH?.trim();
  if (override) return resolve(override);
  return join(resolveDataDir(env), JOURNAL_FILE_NAME);
}
