import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { Journal } from "./journal.js";
import { silentLogger } from "./logger.js";

describe("Journal", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gauntlet-journal-"));
    file = join(dir, "nested", "events.jsonl");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function openJournal(): Journal {
    return new Journal(file, { fsync: false, logger: silentLogger });
  }

  it("creates the directory on init and the file on first emit", async () => {
    const journal = openJournal();
    await journal.init();
    const event = await journal.emit("agent-1", "prompt.seeded", { prompt_id: "seed_agent-1" });
    expect(event.scope_id).toBe("agent-1");
    expect(event.type).toBe("prompt.seeded");
    expect(event.seq).toBe(0);
    expect(event.payload).toEqual({ prompt_id: "seed_agent-1" });
    expect(existsSync(file)).toBe(true);
  });

  it("chains each event to the hash of the previous line", async () => {
    const journal = openJournal();
    await journal.init();
    const e1 = await journal.emit("system", "llm.call.succeeded", {});
    const e2 = await journal.emit("system", "llm.call.retry", {});
    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("detects a tampered line", async () => {
    const journal = openJournal();
    await journal.init();
    await journal.emit("system", "llm.call.succeeded", {});
    await journal.emit("system", "llm.call.retry", {});
    await journal.emit("system", "llm.call.failed", {});

    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    const parsed = JSON.parse(lines[1]);
    parsed.payload = { tampered: true };
    lines[1] = JSON.stringify(parsed);
    await writeFile(file, lines.join("\n") + "\n", "utf-8");

    expect(await journal.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });
  });

  it("serializes concurrent emits into consecutive sequence numbers", async () => {
    const journal = openJournal();
    await journal.init();
    const events = await Promise.all(
      Array.from({ length: 10 }, (_, i) => journal.emit("agent-1", "policy.saved", { i }))
    );
    expect(events.map((e) => e.seq).sort((a, b) => (a ?? 0) - (b ?? 0))).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("continues the sequence and chain after reopening", async () => {
    const first = openJournal();
    await first.init();
    await first.emit("agent-1", "policy.saved", {});
    await first.close();

    const second = openJournal();
    await second.init();
    const next = await second.emit("agent-1", "policy.saved", {});
    expect(next.seq).toBe(1);
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
  });

  it("truncates a torn last line on init", async () => {
    const journal = openJournal();
    await journal.init();
    await journal.emit("agent-1", "policy.saved", {});
    await appendFile(file, '{"event_id":"half', "utf-8");

    const reopened = openJournal();
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(1);
  });

  it("redacts secrets in payloads", async () => {
    const journal = openJournal();
    await journal.init();
    const event = await journal.emit("system", "credential.cooldown", {
      alias: "primary",
      api_key: "test-secret",
      detail: "sk-ant-test-placeholder",
    });
    expect(event.payload).toEqual({ alias: "primary", api_key: "[REDACTED]", detail: "[REDACTED]" });
  });

  it("keeps payloads verbatim when redaction is off", async () => {
    const journal = new Journal(file, { fsync: false, redact: false, logger: silentLogger });
    await journal.init();
    const event = await journal.emit("system", "credential.cooldown", { api_key: "test-secret" });
    expect(event.payload).toEqual({ api_key: "test-secret" });
  });

  it("notifies listeners and stops after unsubscribe", async () => {
    const journal = openJournal();
    await journal.init();
    const seen: string[] = [];
    const off = journal.on((e) => seen.push(e.type));
    await journal.emit("system", "llm.call.succeeded", {});
    off();
    await journal.emit("system", "llm.call.failed", {});
    expect(seen).toEqual(["llm.call.succeeded"]);
  });

  it("does not let a throwing listener break the write", async () => {
    const journal = openJournal();
    await journal.init();
    journal.on(() => { throw new Error("listener bug"); });
    await expect(journal.emit("system", "llm.call.succeeded", {})).resolves.toBeDefined();
  });

  it("readScope filters by scope id and readAll honours limit", async () => {
    const journal = openJournal();
    await journal.init();
    await journal.emit("agent-1", "policy.saved", {});
    await journal.emit("agent-2", "policy.saved", {});
    await journal.emit("agent-1", "game.reflected", {});
    expect((await journal.readScope("agent-1")).map((e) => e.type)).toEqual(["policy.saved", "game.reflected"]);
    expect((await journal.readAll({ limit: 1 })).map((e) => e.scope_id)).toEqual(["agent-1"]);
  });

  it("tryEmit returns null instead of throwing on invalid events", async () => {
    const journal = openJournal();
    await journal.init();
    const bogusScope = "";
    await expect(journal.tryEmit(bogusScope, "policy.saved", {})).resolves.toBeNull();
  });
});
