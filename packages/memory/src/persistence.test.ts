import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PolicyStateCorruptError } from "@gauntlet/schemas";
import { DurableStore } from "@gauntlet/store";
import { PolicyMemory } from "./policy-memory.js";
import { loadPolicy, savePolicy } from "./persistence.js";

describe("policy persistence", () => {
  let store: DurableStore;

  beforeEach(async () => {
    store = await DurableStore.open(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("returns null for an unknown agent", () => {
    expect(loadPolicy(store, "nobody")).toBeNull();
  });

  it("round-trips the whole policy", () => {
    const memory = PolicyMemory.create("agent-1", "Kira", "rogue");
    memory.recordGame(true);
    memory.addDamageDealt(42);
    memory.addDamageTaken(17);
    memory.recordActionOutcome("attack", true);
    memory.updateBandit("defend", 0.4);
    memory.updateOpponentModel("agent-2", "taunt", false);
    savePolicy(store, memory);

    const loaded = loadPolicy(store, "agent-1");
    expect(loaded?.snapshot()).toEqual(memory.snapshot());
  });

  it("round-trips an opponent named like an Object.prototype member", () => {
    const memory = PolicyMemory.create("agent-1", "Kira", "rogue");
    memory.updateOpponentModel("constructor", "attack", true);
    savePolicy(store, memory);

    const loaded = loadPolicy(store, "agent-1");
    expect(loaded?.opponentInsight("constructor")).toBe("effective: attack");
    expect(loaded?.snapshot().opponent_models).toEqual({ constructor: { attack: 1 } });
  });

  it("overwrites the previous row on save", () => {
    const memory = PolicyMemory.create("agent-1", "Kira", "rogue");
    savePolicy(store, memory);
    memory.recordGame(false);
    savePolicy(store, memory);
    expect(loadPolicy(store, "agent-1")?.losses).toBe(1);
  });

  it("refuses a stored map that fails validation", () => {
    savePolicy(store, PolicyMemory.create("agent-1", "Kira", "rogue"));
    const row = store.loadAgent("agent-1");
    if (!row) throw new Error("row missing");
    store.saveAgent({ ...row, ucb_stats: '{"attack":3}' });

    expect(() => loadPolicy(store, "agent-1")).toThrow(PolicyStateCorruptError);
  });

  it("refuses a stored map that is not JSON", () => {
    savePolicy(store, PolicyMemory.create("agent-1", "Kira", "rogue"));
    const row = store.loadAgent("agent-1");
    if (!row) throw new Error("row missing");
    store.saveAgent({ ...row, pref_actions: "not json" });

    expect(() => loadPolicy(store, "agent-1")).toThrow(/agent-1 is malformed: pref_actions/);
  });
});
