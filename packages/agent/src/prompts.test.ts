import { describe, it, expect } from "vitest";
import { PolicyMemory } from "@gauntlet/memory";
import { buildBaseSystemPrompt, buildReflectionPrompt, buildSituation, opponentCondition, selfCondition } from "./prompts.js";
import type { Combatant, GameView } from "./game.js";

function fighter(overrides: Partial<Combatant> = {}): Combatant {
  return { name: "Kira", agentClass: "rogue", hp: 100, maxHp: 100, mp: 40, maxMp: 50, inventory: [], ...overrides };
}

function withRecord(wins: number, losses: number): PolicyMemory {
  const memory = PolicyMemory.create("agent-1", "Kira", "rogue");
  for (let i = 0; i < wins; i++) memory.recordGame(true);
  for (let i = 0; i < losses; i++) memory.recordGame(false);
  return memory;
}

const GAME: GameView = { round: 3, maxRounds: 20, environment: "sunken crypt", weather: "cold fog", log: [] };

describe("buildBaseSystemPrompt", () => {
  it("opens with identity and record", () => {
    const prompt = buildBaseSystemPrompt(withRecord(0, 0));
    expect(prompt.startsWith("You are Kira, a rogue, and this fight might be your last.")).toBe(true);
    expect(prompt).toContain("Habits that kept you alive: none yet, every fight is read fresh");
    expect(prompt).toContain("Record: 0W / 0L");
    expect(prompt).toContain("ACTIONS: attack, defend, cast_spell, use_item, negotiate, flee, taunt, observe");
    expect(prompt.endsWith("Close every reply with: ACTION: <action_name>")).toBe(true);
  });

  it("picks the mood from the record", () => {
    expect(buildBaseSystemPrompt(withRecord(7, 3))).toContain("You fight with calm certainty.");
    expect(buildBaseSystemPrompt(withRecord(1, 3))).toContain("The losses have piled up.");
    expect(buildBaseSystemPrompt(withRecord(0, 2))).toContain("Nobody can read you");
  });

  it("lists learned tendencies", () => {
    const memory = withRecord(0, 0);
    memory.recordActionOutcome("taunt", true);
    memory.updateBandit("taunt", 0.5);
    const prompt = buildBaseSystemPrompt(memory);
    expect(prompt).toContain("Habits that kept you alive: taunt");
    expect(prompt).toContain("Data: taunt(0.50)");
  });
});

describe("condition bands", () => {
  it("describes the agent's own health", () => {
    expect(selfCondition(fighter({ hp: 79 }))).toBe("Still fresh. Barely a scratch on you.");
    expect(selfCondition(fighter({ hp: 78 }))).toBe("You have taken a few. Nothing you can't carry, but you feel them.");
    expect(selfCondition(fighter({ hp: 40 }))).toBe("You are hurt. Every breath has a price now.");
    expect(selfCondition(fighter({ hp: 27 }))).toBe("One more mistake and you are on the ground. Everything is urgent.");
    expect(selfCondition(fighter({ maxHp: 0 }))).toBe("One more mistake and you are on the ground. Everything is urgent.");
  });

  it("describes the opponent by name", () => {
    expect(opponentCondition(fighter({ name: "Brute", hp: 30 }))).toBe(
      "Brute is fading. You can see it in how they hold their guard.",
    );
  });
});

describe("buildSituation", () => {
  it("includes memory, insight and the bandit hint", () => {
    const text = buildSituation({
      self: fighter({ inventory: [{ name: "Smoke bomb", uses: 1 }, { name: "Old potion", uses: 0 }] }),
      opponent: fighter({ name: "Brute", agentClass: "warrior", hp: 30 }),
      game: GAME,
      opponentInsight: "effective: attack",
      recalled: [
        { situation: "s1", action: "attack", outcome: 0.5, similarity: 0.9 },
        { situation: "s2", action: "flee", outcome: 0.1, similarity: 0.4 },
      ],
      bestAction: "defend",
    });

    expect(text.split("\n")).toEqual([
      "Setting: sunken crypt -- cold fog",
      "Round 3/20",
      "",
      "YOU: Still fresh. Barely a scratch on you. MP: 40/50. Carrying: Smoke bomb.",
      "THEM: Brute is fading. You can see it in how they hold their guard. Class: warrior.",
      "Known from earlier fights: effective: attack",
      "Memory: attack worked in a spot like this; flee backfired in a spot like this.",
      "Your record says defend pays best on average.",
      "",
      "RECENT:",
      "The battle has just begun.",
      "",
      "Your move. Think briefly, then act. End with: ACTION: <action_name>",
    ]);
  });

  it("shows the five latest log lines", () => {
    const log = Array.from({ length: 7 }, (_, i) => ({
      round: i + 1, agent: i % 2 === 0 ? "Kira" : "Brute", action: "attack", narration: `hit ${i + 1}`, damage: 5,
    }));
    const text = buildSituation({
      self: fighter(), opponent: fighter({ name: "Brute" }), game: { ...GAME, log },
      opponentInsight: "", recalled: [], bestAction: null,
    });
    expect(text).toContain("RECENT:\nRound 3 -- Kira: hit 3\nRound 4 -- Brute: hit 4\nRound 5 -- Kira: hit 5\nRound 6 -- Brute: hit 6\nRound 7 -- Kira: hit 7\n");
    expect(text).toContain("Carrying: the bag is empty.");
  });
});

describe("buildReflectionPrompt", () => {
  it("states the outcome and the summary", () => {
    expect(buildReflectionPrompt(false, "Round 1 -- Kira: missed")).toBe(
      "The fight is over. You lost.\n\nHow it went:\nRound 1 -- Kira: missed\n\n" +
      "Two sentences. What did this fight actually teach you, and what changes next time? Answer as yourself, not as a report.",
    );
  });
});
