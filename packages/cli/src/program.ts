import { Command, CommanderError } from "commander";
import { Journal, ConsoleLogger } from "@gauntlet/journal";
import type { ChatCompleter, Logger } from "@gauntlet/schemas";
import { CredentialPool } from "@gauntlet/keys";
import { createClient } from "@gauntlet/llm";
import type { ClientFactoryOptions } from "@gauntlet/llm";
import { PromptEvolutionEngine } from "@gauntlet/evolution";
import { DurableStore, resolveDbPath, resolveJournalPath } from "@gauntlet/store";
import { EpisodeMemory, loadPolicy, DEFAULT_MIN_SIMILARITY, DEFAULT_TOP_K } from "@gauntlet/memory";
import { MetricsCollector } from "@gauntlet/metrics";
import {
  formatCandidates,
  formatCredentials,
  formatEvent,
  formatHeadToHead,
  formatPolicy,
  formatRecall,
} from "./format.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  io: CliIO;
  openStore?: (path: string) => Promise<DurableStore>;
  openJournal?: (path: string, logger: Logger) => Journal;
  openClient?: (pool: CredentialPool, options: ClientFactoryOptions) => ChatCompleter;
  logger?: Logger;
}

const DEFAULT_EVENT_LIMIT = 20;

function parsePositiveInt(value: string, label: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n < 1) {
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

function parseSimilarity(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < -1 || n > 1) {
    throw new Error(`Invalid min similarity: "${value}" (must be between -1 and 1)`);
  }
  return n;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The `gauntlet` operator CLI. Everything it touches comes through
 * `deps`, so tests drive it with an in-memory store and captured output.
 * Exits surface as CommanderError; the entry point maps them to an exit code.
 */
export function buildProgram(deps: CliDeps): Command {
  const { env, io } = deps;
  const logger = deps.logger ?? new ConsoleLogger("cli");
  const openStore = deps.openStore ?? ((path: string) => DurableStore.open(path));
  const openJournal = deps.openJournal ?? ((path: string, log: Logger) => new Journal(path, { logger: log }));
  const openClient = deps.openClient
    ?? ((pool: CredentialPool, options: ClientFactoryOptions) => createClient(pool, env, options));
  const print = (lines: string[]): void => { for (const line of lines) io.out(line); };

  const program = new Command();
  program.name("gauntlet").description("Self-improving LLM combat agents").version("0.1.0");
  program.exitOverride();
  program.configureOutput({
    writeOut: (s) => io.out(s.replace(/\n$/, "")),
    writeErr: (s) => io.err(s.replace(/\n$/, "")),
  });

  // Commander exits through CommanderError; anything else is reported as a command failure
  const guarded = <A extends unknown[]>(action: (...args: A) => Promise<void> | void) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (err) {
        if (err instanceof CommanderError) throw err;
        logger.debug("command failed", { error: errorMessage(err) });
        program.error(errorMessage(err), { exitCode: 1 });
      }
    };

  const withStore = async (fn: (store: DurableStore) => Promise<void> | void): Promise<void> => {
    const store = await openStore(resolveDbPath(env));
    try {
      await fn(store);
    } finally {
      store.close();
    }
  };

  program.command("status").description("Show credential health, budgets and total cost")
    .action(guarded(() => {
      const pool = CredentialPool.fromEnv(env);
      print(formatCredentials(pool.summary(), pool.totalCostUsd()));
    }));

  program.command("where").description("Show where the database and journal live")
    .action(guarded(() => {
      io.out(`Database: ${resolveDbPath(env)}`);
      io.out(`Journal:  ${resolveJournalPath(env)}`);
    }));

  program.command("agent").description("Show an agent's learned policy").argument("<id>", "Agent ID")
    .action(guarded((agentId: string) => withStore((store) => {
      const memory = loadPolicy(store, agentId);
      if (!memory) throw new Error(`No agent found with id ${agentId}`);
      print(formatPolicy(memory));
    })));

  program.command("candidates").description("List an agent's prompt pool by selection score")
    .argument("<agentId>", "Agent ID")
    .action(guarded((agentId: string) => withStore((store) => {
      print(formatCandidates(store.loadCandidates(agentId)));
    })));

  program.command("recall").description("Find an agent's episodes most similar to a situation")
    .argument("<agentId>", "Agent ID")
    .argument("<text>", "Situation text")
    .option("-k, --top <n>", "Number of episodes", String(DEFAULT_TOP_K))
    .option("--min <similarity>", "Minimum cosine similarity", String(DEFAULT_MIN_SIMILARITY))
    .action(guarded((agentId: string, text: string, opts: { top: string; min: string }) => {
      const top = parsePositiveInt(opts.top, "top");
      const min = parseSimilarity(opts.min);
      return withStore((store) => {
        const episodes = new EpisodeMemory(store, { logger });
        print(formatRecall(episodes.recallSimilar(agentId, text, top, min)));
      });
    }));

  program.command("evolve").description("Ask the model for new prompt variants now")
    .argument("<agentId>", "Agent ID")
    .option("-f, --feedback <text>", "Recent battle summary to steer the rewrite", "")
    .action(guarded((agentId: string, opts: { feedback: string }) => withStore(async (store) => {
      const memory = loadPolicy(store, agentId);
      if (!memory) throw new Error(`No agent found with id ${agentId}`);
      const pool = CredentialPool.fromEnv(env);
      const journal = openJournal(resolveJournalPath(env), logger);
      await journal.init();
      try {
        const client = openClient(pool, { events: journal, logger, scopeId: agentId });
        const engine = new PromptEvolutionEngine({
          store,
          client,
          agentId,
          agentName: memory.name,
          agentClass: memory.agentClass,
          events: journal,
          logger,
        });
        if (!engine.hasCandidates()) throw new Error(`Agent ${agentId} has no prompt candidates to evolve`);
        const added = await engine.evolve(opts.feedback);
        print(added.length > 0 ? formatCandidates(added) : ["No variants accepted."]);
      } finally {
        await journal.close();
      }
    })));

  program.command("h2h").description("Head-to-head record of two agents")
    .argument("<a>", "First agent ID")
    .argument("<b>", "Second agent ID")
    .action(guarded((agentA: string, agentB: string) => withStore((store) => {
      print(formatHeadToHead(agentA, agentB, store.headToHead(agentA, agentB)));
    })));

  program.command("events").description("Show recent journal events")
    .argument("[scope]", "Only events of this agent (or \"system\")")
    .option("-n, --limit <n>", "Number of events", String(DEFAULT_EVENT_LIMIT))
    .action(guarded(async (scope: string | undefined, opts: { limit: string }) => {
      const limit = parsePositiveInt(opts.limit, "limit");
      const journal = openJournal(resolveJournalPath(env), logger);
      const events = scope ? (await journal.readScope(scope)).slice(-limit) : await journal.readAll({ limit });
      if (events.length === 0) {
        io.out(scope ? `No events found for ${scope}` : "No events recorded.");
        return;
      }
      print(events.map(formatEvent));
    }));

  program.command("verify").description("Check the journal's hash chain")
    .action(guarded(async () => {
      const journal = openJournal(resolveJournalPath(env), logger);
      const integrity = await journal.verifyIntegrity();
      if (!integrity.valid) throw new Error(`Journal integrity: BROKEN at event ${integrity.brokenAt}`);
      io.out("Journal integrity: OK");
    }));

  program.command("metrics").description("Replay the journal as Prometheus metrics")
    .action(guarded(async () => {
      const journal = openJournal(resolveJournalPath(env), logger);
      const collector = new MetricsCollector({ collectDefault: false });
      for (const event of await journal.readAll()) collector.handleEvent(event);
      io.out((await collector.getMetrics()).trimEnd());
    }));

  return program;
}
