import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { CommanderError } from "commander";
import { Journal, silentLogger } from "@gauntlet/journal";
import { DurableStore } from "@gauntlet/store";
import { EpisodeMemory, PolicyMemory, savePolicy } from "@gauntlet/memory";
import type { ChatCompleter, CompletionRequest, CompletionResult, PromptCandidate } from "@gauntlet/schemas";
import type { ClientFactoryOptions } from "@gauntlet/llm";
import { buildProgram } from "./program.js";
import { dim, green } from "./format.js";

class ScriptedCompleter implements ChatCompleter {
  readonly requests: CompletionRequest[] = [];

  constructor(private reply: string) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    return { text: this.reply, tokensIn: 0, tokensOut: 0, modelId: "test-model", credentialAlias: "primary", latencyMs: 0 };
  }
}

const VARIANT = "You are Kira, a patient rogue. Open with observe, then strike hard once the enemy drops below half health.";

function candidate(promptId: string, overrides: Partial<PromptCandidate>): PromptCandidate {
  return {
    prompt_id: promptId,
    agent_id: "agent-1",
    text: `prompt ${promptId}`,
    wins: 0,
    losses: 0,
    avg_damage: 0,
    avg_rounds: 0,
    generation: 0,
    created_at: 1_700_000_000,
    ...overrides,
  };
}

describe("gauntlet CLI", () => {
  let store: DurableStore;
  let out: string[];
  let err: string[];
  let env: NodeJS.ProcessEnv;
  let completer: ScriptedCompleter;
  let clientOptions: ClientFactoryOptions[];

  beforeEach(async () => {
    store = await DurableStore.open(":memory:");
    out = [];
    err = [];
    env = { GAUNTLET_DATA_DIR: "/srv/gauntlet" };
    completer = new ScriptedCompleter(`<VARIANT>\n${VARIANT}\n</VARIANT>`);
    clientOptions = [];
  });

  async function run(...args: string[]): Promise<void> {
    const program = buildProgram({
      env,
      io: { out: (line) => out.push(line), err: (line) => err.push(line) },
      openStore: async () => store,
      openClient: (_pool, options) => {
        clientOptions.push(options);
        return completer;
      },
      logger: silentLogger,
    });
    await program.parseAsync(args, { from: "user" });
  }

  it("prints the version", async () => {
    await expect(run("--version")).rejects.toMatchObject({ exitCode: 0 });
    expect(out).toEqual(["0.1.0"]);
  });

  describe("where", () => {
    it("shows the database and journal paths", async () => {
      await run("where");
      expect(out).toEqual([
        "Database: /srv/gauntlet/gauntlet.db",
        "Journal:  /srv/gauntlet/journal.jsonl",
      ]);
    });
  });

  describe("status", () => {
    it("summarises each credential and the total cost", async () => {
      env = { ANTHROPIC_API_KEY: "test-secret" };
      await run("status");
      expect(out).toEqual([
        `primary    anthropic ${green("ready")}  health 1.000  spent $0.0000  left $10.0000  tokens 0/0  errors 0/0`,
        "Total cost: $0.0000",
      ]);
    });

    it("fails with the configuration error when no keys are set", async () => {
      env = {};
      await expect(run("status")).rejects.toBeInstanceOf(CommanderError);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^No API keys found\. Set ANTHROPIC_API_KEY/);
    });
  });

  describe("agent", () => {
    it("summarises the stored policy", async () => {
      const memory = PolicyMemory.create("agent-1", "Kira", "rogue");
      for (const won of [true, true, false, true]) memory.recordGame(won);
      memory.addDamageDealt(120);
      memory.addDamageTaken(80);
      memory.recordActionOutcome("attack", true);
      memory.recordActionOutcome("defend", false);
      memory.updateBandit("attack", 0.75);
      memory.updateBandit("defend", 0.4);
      memory.updateOpponentModel("brute", "taunt", true);
      savePolicy(store, memory);

      await run("agent", "agent-1");

      expect(out).toEqual([
        "Kira (rogue) [agent-1]",
        "Record: 3W 1L (75.0%)",
        "Damage: dealt 120, taken 80",
        "Preferred: attack, defend",
        "Data: attack(0.75), defend(0.40)",
        "vs brute: effective: taunt",
      ]);
    });

    it("fails for an unknown agent", async () => {
      await expect(run("agent", "ghost")).rejects.toMatchObject({ exitCode: 1 });
      expect(err).toEqual(["No agent found with id ghost"]);
      expect(out).toEqual([]);
    });

    it("reports a corrupt stored policy", async () => {
      savePolicy(store, PolicyMemory.create("agent-1", "Kira", "rogue"));
      const row = store.loadAgent("agent-1");
      if (!row) throw new Error("row missing");
      store.saveAgent({ ...row, pref_actions: "not json" });

      await expect(run("agent", "agent-1")).rejects.toBeInstanceOf(CommanderError);
      expect(err[0]).toMatch(/agent-1 is malformed: pref_actions/);
    });
  });

  describe("candidates", () => {
    it("ranks untried candidates first", async () => {
      store.upsertCandidate(candidate("a", {
        wins: 3,
        losses: 1,
        avg_damage: 30,
        generation: 1,
        text: "You are Kira.\n  Strike first.",
      }));
      store.upsertCandidate(candidate("b", { generation: 2 }));

      await run("candidates", "agent-1");

      expect(out).toEqual([
        `b  gen 2  0W 0L (50.0%)  score untried  dmg 0.0  ${dim("prompt b")}`,
        `a  gen 1  3W 1L (75.0%)  score 1.633  dmg 30.0  ${dim("You are Kira. Strike first.")}`,
      ]);
    });

    it("says so when the pool is empty", async () => {
      await run("candidates", "agent-1");
      expect(out).toEqual(["No prompt candidates."]);
    });
  });

  describe("recall", () => {
    it("lists the closest episodes", async () => {
      const episodes = new EpisodeMemory(store, { now: () => 1_700_000_000 });
      episodes.record("agent-1", { situation: "enemy low hp in the swamp", action: "attack", outcome: 0.8 });
      episodes.record("agent-1", { situation: "surrounded by goblins at dusk", action: "defend", outcome: 0.2 });

      await run("recall", "agent-1", "enemy low hp in the swamp", "--min", "0.99");

      expect(out).toEqual(["1.00  attack -> 0.80  enemy low hp in the swamp"]);
    });

    it("rejects a non-positive count", async () => {
      await expect(run("recall", "agent-1", "anything", "-k", "0")).rejects.toMatchObject({ exitCode: 1 });
      expect(err).toEqual(['Invalid top: "0" (must be a positive integer)']);
    });

    it("says so when nothing is similar enough", async () => {
      await run("recall", "agent-1", "anything at all");
      expect(out).toEqual(["No similar episodes."]);
    });
  });

  describe("h2h", () => {
    it("counts wins in both seatings and draws", async () => {
      store.saveGame({ game_id: "g1", agent1_id: "a", agent2_id: "b", winner_id: "a", rounds: 7, environment: "swamp", log: [] });
      store.saveGame({ game_id: "g2", agent1_id: "b", agent2_id: "a", winner_id: "a", rounds: 9, environment: "arena", log: [] });
      store.saveGame({ game_id: "g3", agent1_id: "a", agent2_id: "b", winner_id: null, rounds: 20, environment: "arena", log: [] });

      await run("h2h", "a", "b");

      expect(out).toEqual(["a vs b: 3 games", "  a: 2 wins", "  b: 0 wins", "  draws: 1"]);
    });

    it("notes agents that never met", async () => {
      await run("h2h", "a", "b");
      expect(out).toEqual(["a and b have not met."]);
    });
  });

  describe("journal commands", () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "gauntlet-cli-"));
      file = join(dir, "journal.jsonl");
      env = { GAUNTLET_JOURNAL_PATH: file };
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    async function seedJournal(): Promise<void> {
      const journal = new Journal(file, { fsync: false, logger: silentLogger });
      await journal.init();
      await journal.emit("agent-1", "prompt.seeded", { prompt_id: "seed_agent-1" });
      await journal.emit("system", "credential.cooldown", { alias: "primary", status: 429 });
      await journal.close();
    }

    it("prints the latest events", async () => {
      await seedJournal();
      await run("events", "-n", "1");
      expect(out).toHaveLength(1);
      expect(out[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] system credential\.cooldown \{"alias":"primary","status":429\}$/);
    });

    it("filters events by scope", async () => {
      await seedJournal();
      await run("events", "agent-1");
      expect(out).toHaveLength(1);
      expect(out[0]).toMatch(/\] agent-1 prompt\.seeded \{"prompt_id":"seed_agent-1"\}$/);
    });

    it("says so when the journal is empty", async () => {
      await run("events");
      expect(out).toEqual(["No events recorded."]);
    });

    it("verifies an intact chain", async () => {
      await seedJournal();
      await run("verify");
      expect(out).toEqual(["Journal integrity: OK"]);
    });

    it("replays the journal into metrics", async () => {
      await seedJournal();
      await run("metrics");
      expect(out).toHaveLength(1);
      expect(out[0]).toContain('gauntlet_credential_cooldowns_total{alias="primary",cause="rate_limit"} 1');
    });

    it("evolves the prompt pool through the configured client", async () => {
      env = { ...env, ANTHROPIC_API_KEY: "test-secret" };
      savePolicy(store, PolicyMemory.create("agent-1", "Kira", "rogue"));
      store.upsertCandidate(candidate("seed_agent-1", { wins: 2, losses: 1 }));

      await run("evolve", "agent-1", "-f", "lost to a mage in round 4");

      expect(out).toHaveLength(1);
      expect(out[0]).toMatch(/^evo_agent-1_[0-9a-f-]{36}  /);
      expect(out[0]?.endsWith(
        `  gen 1  0W 0L (50.0%)  score untried  dmg 0.0  ${dim("You are Kira, a patient rogue. Open with observe, then st...")}`,
      )).toBe(true);
      expect(completer.requests[0]?.messages[0]?.content).toContain("Latest battle: lost to a mage in round 4");
      expect(clientOptions[0]?.scopeId).toBe("agent-1");
      expect(store.loadCandidates("agent-1").map((c) => c.text)).toEqual([VARIANT, "prompt seed_agent-1"]);

      const events = await new Journal(file, { logger: silentLogger }).readScope("agent-1");
      expect(events.map((e) => e.type)).toEqual(["prompt.evolved"]);
    });

    it("refuses to evolve an agent without candidates", async () => {
      env = { ...env, ANTHROPIC_API_KEY: "test-secret" };
      savePolicy(store, PolicyMemory.create("agent-1", "Kira", "rogue"));

      await expect(run("evolve", "agent-1")).rejects.toMatchObject({ exitCode: 1 });
      expect(err).toEqual(["Agent agent-1 has no prompt candidates to evolve"]);
      expect(completer.requests).toEqual([]);
    });

    it("reports where the chain breaks", async () => {
      const first = JSON.stringify({ event_id: "e1", timestamp: "2026-01-01T00:00:00.000Z", scope_id: "system", type: "policy.saved", payload: {} });
      const second = JSON.stringify({ event_id: "e2", timestamp: "2026-01-01T00:00:01.000Z", scope_id: "system", type: "policy.saved", payload: {}, hash_prev: "0000" });
      await writeFile(file, `${first}\n${second}\n`, "utf-8");

      await expect(run("verify")).rejects.toMatchObject({ exitCode: 1 });
      expect(err).toEqual(["Journal integrity: BROKEN at event 1"]);
    });
  });
});
