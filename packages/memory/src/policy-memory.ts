import { isActionType } from "@gauntlet/schemas";
import type { ActionMap, ActionType, AgentPolicyState, BanditArm } from "@gauntlet/schemas";

/** Preference of an action the agent has never tried. */
export const NEUTRAL_PREFERENCE = 0.5;
/** Weight of the newest outcome in the preference EMA. */
export const PREFERENCE_SMOOTHING = 0.15;

/** Present entries in insertion order. */
function entries<T>(map: ActionMap<T>): Array<[ActionType, T]> {
  const out: Array<[ActionType, T]> = [];
  for (const action of Object.keys(map).filter(isActionType)) {
    const value = map[action];
    if (value !== undefined) out.push([action, value]);
  }
  return out;
}

function meanReward(arm: BanditArm): number {
  return arm.total_reward / Math.max(1, arm.plays);
}

/**
 * One agent's learned policy: EMA action preferences, a UCB1 bandit
 * over actions and per-opponent tallies. Lives in memory; persist it
 * with savePolicy after a batch of updates.
 */
export class PolicyMemory {
  private state: AgentPolicyState;

  constructor(state: AgentPolicyState) {
    this.state = structuredClone(state);
  }

  static create(agentId: string, name: string, agentClass: string): PolicyMemory {
    return new PolicyMemory({
      agent_id: agentId,
      name,
      agent_class: agentClass,
      level: 1,
      wins: 0,
      losses: 0,
      damage_dealt: 0,
      damage_taken: 0,
      action_preferences: {},
      bandit_stats: {},
      opponent_models: {},
    });
  }

  get agentId(): string { return this.state.agent_id; }
  get name(): string { return this.state.name; }
  get agentClass(): string { return this.state.agent_class; }
  get wins(): number { return this.state.wins; }
  get losses(): number { return this.state.losses; }
  get gamesPlayed(): number { return this.state.wins + this.state.losses; }

  winRate(): number {
    const total = this.gamesPlayed;
    return total > 0 ? this.state.wins / total : 0;
  }

  recordGame(won: boolean): void {
    if (won) this.state.wins++;
    else this.state.losses++;
  }

  addDamageDealt(amount: number): void {
    this.state.damage_dealt += amount;
  }

  addDamageTaken(amount: number): void {
    this.state.damage_taken += amount;
  }

  // ─── Preferences ────────────────────────────────────────────────

  recordActionOutcome(action: ActionType, success: boolean): void {
    const current = this.state.action_preferences[action] ?? NEUTRAL_PREFERENCE;
    this.state.action_preferences[action] =
      current * (1 - PREFERENCE_SMOOTHING) + (success ? 1 : 0) * PREFERENCE_SMOOTHING;
  }

  preference(action: ActionType): number | undefined {
    return this.state.action_preferences[action];
  }

  /** Up to three actions, highest preference first. */
  preferredActions(): ActionType[] {
    return entries(this.state.action_preferences)
      .sort((a, b) => b[1] - a[1])
      .slice(0, 3)
      .map(([action]) => action);
  }

  // ─── Bandit ─────────────────────────────────────────────────────

  updateBandit(action: ActionType, reward: number): void {
    const arm = this.state.bandit_stats[action] ?? { total_reward: 0, plays: 0 };
    this.state.bandit_stats[action] = { total_reward: arm.total_reward + reward, plays: arm.plays + 1 };
  }

  /**
   * UCB1 pick among `candidates`. Null before any action has been
   * played. An untried candidate is returned as soon as it is reached.
   */
  bestAction(candidates: readonly ActionType[]): ActionType | null {
    const arms = entries(this.state.bandit_stats);
    if (arms.length === 0) return null;
    const totalPlays = arms.reduce((sum, [, arm]) => sum + arm.plays, 0);

    let best: ActionType | null = null;
    let bestScore = -Infinity;
    for (const action of candidates) {
      const arm = this.state.bandit_stats[action];
      if (!arm || arm.plays === 0) return action;
      const score = arm.total_reward / arm.plays
        + Math.sqrt((2 * Math.log(Math.max(1, totalPlays))) / arm.plays);
      if (score > bestScore) {
        bestScore = score;
        best = action;
      }
    }
    return best;
  }

  /** "Data: attack(0.62), defend(0.40)" for the four best mean rewards. */
  banditSummary(): string {
    const arms = entries(this.state.bandit_stats);
    if (arms.length === 0) return "";
    const parts = arms
      .sort((a, b) => meanReward(b[1]) - meanReward(a[1]))
      .slice(0, 4)
      .map(([action, arm]) => `${action}(${meanReward(arm).toFixed(2)})`);
    return `Data: ${parts.join(", ")}`;
  }

  // ─── Opponents ──────────────────────────────────────────────────

  // Opponent ids are arbitrary strings: "constructor" or "__proto__" must
  // resolve to own entries only, never to Object.prototype members.
  private opponentTally(opponentId: string): ActionMap<number> | undefined {
    const models = this.state.opponent_models;
    return Object.hasOwn(models, opponentId) ? models[opponentId] : undefined;
  }

  updateOpponentModel(opponentId: string, action: ActionType, effective: boolean): void {
    const tally = { ...this.opponentTally(opponentId) };
    tally[action] = (tally[action] ?? 0) + (effective ? 1 : -1);
    this.state.opponent_models = { ...this.state.opponent_models, [opponentId]: tally };
  }

  /** "effective: a, b; less useful: c", or "" with nothing learned. */
  opponentInsight(opponentId: string): string {
    const tally = this.opponentTally(opponentId);
    if (!tally) return "";
    const ranked = entries(tally).sort((a, b) => b[1] - a[1]);
    const effective = ranked.filter(([, v]) => v > 0).slice(0, 2).map(([a]) => a);
    const weak = ranked.filter(([, v]) => v < 0).slice(0, 2).map(([a]) => a);
    const parts: string[] = [];
    if (effective.length > 0) parts.push(`effective: ${effective.join(", ")}`);
    if (weak.length > 0) parts.push(`less useful: ${weak.join(", ")}`);
    return parts.join("; ");
  }

  /** Deep copy of the full state, safe to hand out or persist. */
  snapshot(): AgentPolicyState {
    return structuredClone(this.state);
  }
}
