export { DurableStore } from "./store.js";
export type { AgentRow, EpisodeRow, StoredGame, DurableStoreOptions } from "./store.js";
export { resolveDbPath, resolveDataDir, resolveJournalPath, DB_FILE_NAME, JOURNAL_FILE_NAME } from "./paths.js";
