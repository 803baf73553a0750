import {
  PolicyStateCorruptError,
  parseActionPreferences,
  parseBanditStats,
  parseJson,
  parseOpponentModels,
} from "@gauntlet/schemas";
import type { Parsed } from "@gauntlet/schemas";
import type { DurableStore } from "@gauntlet/store";
import { PolicyMemory } from "./policy-memory.js";

export type PolicyStore = Pick<DurableStore, "loadAgent" | "saveAgent">;

function parseBlob<T>(field: string, text: string, parse: (data: unknown) => Parsed<T>, errors: string[]): T | undefined {
  const json = parseJson(text);
  const parsed = json.ok ? parse(json.value) : json;
  if (parsed.ok) return parsed.value;
  errors.push(...parsed.errors.map((e) => `${field}: ${e}`));
  return undefined;
}

/**
 * Loads the whole policy for an agent, or null if it has none yet.
 * Throws PolicyStateCorruptError when a stored map fails validation.
 */
export function loadPolicy(store: PolicyStore, agentId: string): PolicyMemory | null {
  const row = store.loadAgent(agentId);
  if (!row) return null;

  const errors: string[] = [];
  const preferences = parseBlob("pref_actions", row.pref_actions, parseActionPreferences, errors);
  const bandit = parseBlob("ucb_stats", row.ucb_stats, parseBanditStats, errors);
  const opponents = parseBlob("opp_models", row.opp_models, parseOpponentModels, errors);
  if (!preferences || !bandit || !opponents) {
    throw new PolicyStateCorruptError(agentId, errors);
  }

  return new PolicyMemory({
    agent_id: row.agent_id,
    name: row.name,
    agent_class: row.agent_class,
    level: row.level,
    wins: row.wins,
    losses: row.losses,
    damage_dealt: row.dmg_dealt,
    damage_taken: row.dmg_taken,
    action_preferences: preferences,
    bandit_stats: bandit,
    opponent_models: opponents,
  });
}

/** Writes the whole policy as one row. */
export function savePolicy(store: PolicyStore, memory: PolicyMemory): void {
  const state = memory.snapshot();
  store.saveAgent({
    agent_id: state.agent_id,
    name: state.name,
    agent_class: state.agent_class,
    level: state.level,
    wins: state.wins,
    losses: state.losses,
    dmg_dealt: state.damage_dealt,
    dmg_taken: state.damage_taken,
    pref_actions: JSON.stringify(state.action_preferences),
    opp_models: JSON.stringify(state.opponent_models),
    ucb_stats: JSON.stringify(state.bandit_stats),
  });
}
