import type { BattleLogEntry } from "@gauntlet/schemas";

export interface InventoryItem {
  name: string;
  uses: number;
}

/** Read-only view of a fighter, supplied by the game layer each turn. */
export interface Combatant {
  name: string;
  agentClass: string;
  /** Stable id used for opponent modelling; falls back to the name. */
  agentId?: string;
  hp: number;
  maxHp: number;
  mp: number;
  maxMp: number;
  inventory: InventoryItem[];
}

export interface GameView {
  round: number;
  maxRounds: number;
  environment: string;
  weather: string;
  log: BattleLogEntry[];
}

export function hpFraction(combatant: Combatant): number {
  return combatant.maxHp > 0 ? combatant.hp / combatant.maxHp : 0;
}

/** The last `turnsBack` log lines, oldest first. */
export function recentLog(game: GameView, turnsBack = 5): string {
  const recent = game.log.slice(-turnsBack);
  if (recent.length === 0) return "The battle has just begun.";
  return recent.map((e) => `Round ${e.round} -- ${e.agent}: ${e.narration}`).join("\n");
}
