import { ACTION_TYPES } from "@gauntlet/schemas";
import type { RecalledEpisode } from "@gauntlet/schemas";
import type { PolicyMemory } from "@gauntlet/memory";
import { hpFraction, recentLog } from "./game.js";
import type { Combatant, GameView } from "./game.js";

/** Recalled outcomes above this read as "worked". */
const WORKED_THRESHOLD = 0.3;

function moodFor(memory: PolicyMemory): string {
  const rate = memory.winRate();
  if (rate > 0.65) {
    return "You fight with calm certainty. Not swagger, just the memory of having walked out of worse.";
  }
  if (rate < 0.38 && memory.gamesPlayed > 2) {
    return "The losses have piled up. You are hungry now, sharper, with something to win back.";
  }
  return "Nobody can read you, and that is the point. Each fight gets all of you. Assume nothing.";
}

/** The hand-written prompt an agent starts from before any evolution. */
export function buildBaseSystemPrompt(memory: PolicyMemory): string {
  const preferred = memory.preferredActions();
  const tendencies = preferred.length > 0 ? preferred.join(", ") : "none yet, every fight is read fresh";
  return `You are ${memory.name}, a ${memory.agentClass}, and this fight might be your last.

${moodFor(memory)}

Habits that kept you alive: ${tendencies}
${memory.banditSummary()}
Record: ${memory.wins}W / ${memory.losses}L

Think and talk like someone in real danger, not like a game controller. Adjust as the fight turns. Bluff when it pays. Let fear show when it should and go cold when you have the upper hand.

VOICE:
- One or two sentences of raw thought before you move
- Never open with "Certainly", "Let me", "As a" or "I will now"
- Speak in the body, not the numbers: not "low HP" but "every breath scrapes"
- Short line. A longer one that earns it. Short again.
- Winning, stay quiet. Hurting, stay hard.

ACTIONS: ${ACTION_TYPES.join(", ")}

Close every reply with: ACTION: <action_name>`;
}

export function selfCondition(self: Combatant): string {
  const pct = hpFraction(self);
  if (pct > 0.78) return "Still fresh. Barely a scratch on you.";
  if (pct > 0.52) return "You have taken a few. Nothing you can't carry, but you feel them.";
  if (pct > 0.27) return "You are hurt. Every breath has a price now.";
  return "One more mistake and you are on the ground. Everything is urgent.";
}

export function opponentCondition(opponent: Combatant): string {
  const pct = hpFraction(opponent);
  if (pct > 0.78) return `${opponent.name} looks untouched and just as dangerous.`;
  if (pct > 0.52) return `${opponent.name} is bleeding but still composed.`;
  if (pct > 0.27) return `${opponent.name} is fading. You can see it in how they hold their guard.`;
  return `${opponent.name} is nearly finished. Do not ease off.`;
}

/** Query text for episodic recall; must stay stable across turns. */
export function recallQuery(self: Combatant, opponent: Combatant, game: GameView): string {
  return `${selfCondition(self)} opponent:${opponentCondition(opponent)} env:${game.environment}`;
}

export interface SituationInput {
  self: Combatant;
  opponent: Combatant;
  game: GameView;
  opponentInsight: string;
  recalled: RecalledEpisode[];
  bestAction: string | null;
}

export function buildSituation(input: SituationInput): string {
  const { self, opponent, game } = input;
  const items = self.inventory.filter((i) => i.uses > 0).map((i) => i.name);
  const carrying = items.length > 0 ? items.join(", ") : "the bag is empty";

  const memoryLine = input.recalled.length > 0
    ? `Memory: ${input.recalled
      .map((e) => `${e.action} ${e.outcome > WORKED_THRESHOLD ? "worked" : "backfired"} in a spot like this`)
      .join("; ")}.`
    : "";
  const insightLine = input.opponentInsight ? `Known from earlier fights: ${input.opponentInsight}` : "";
  const banditLine = input.bestAction ? `Your record says ${input.bestAction} pays best on average.` : "";

  return `Setting: ${game.environment} -- ${game.weather}
Round ${game.round}/${game.maxRounds}

YOU: ${selfCondition(self)} MP: ${self.mp}/${self.maxMp}. Carrying: ${carrying}.
THEM: ${opponentCondition(opponent)} Class: ${opponent.agentClass}.
${insightLine}
${memoryLine}
${banditLine}

RECENT:
${recentLog(game, 5)}

Your move. Think briefly, then act. End with: ACTION: <action_name>`;
}

export function buildReflectionPrompt(won: boolean, summary: string): string {
  return `The fight is over. You ${won ? "won" : "lost"}.

How it went:
${summary}

Two sentences. What did this fight actually teach you, and what changes next time? Answer as yourself, not as a report.`;
}
