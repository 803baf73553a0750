import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import { Mutex, validateJournalEventData } from "@gauntlet/schemas";
import type { EventSink, JournalEvent, JournalEventType, Logger } from "@gauntlet/schemas";
import { redactPayload } from "./redact.js";
import { ConsoleLogger } from "./logger.js";

export interface JournalOptions {
  fsync?: boolean;
  redact?: boolean;
  logger?: Logger;
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL event log. Every line carries the sha256 of the
 * previous line, so edits or dropped lines are detectable.
 */
export class Journal implements EventSink {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock = new Mutex();
  private nextSeq = 0;
  private fsync: boolean;
  private redact: boolean;
  private logger: Logger;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.redact = options?.redact ?? true;
    this.logger = options?.logger ?? new ConsoleLogger("journal");
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    if (lines.length > 0) {
      try { JSON.parse(lines[lines.length - 1]); }
      catch {
        lines.pop();
        await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
        this.logger.warn("truncated incomplete last line", { file: this.filePath });
      }
    }

    let maxSeq = -1;
    for (const line of lines) {
      const event = JSON.parse(line) as JournalEvent;
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }
    this.nextSeq = maxSeq + 1;
    const last = lines[lines.length - 1];
    this.lastHash = last !== undefined ? this.hash(last) : undefined;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    scopeId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    return this.writeLock.runExclusive(async () => {
      const redactedPayload = this.redact
        ? redactPayload(payload) as Record<string, unknown>
        : payload;

      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        scope_id: scopeId,
        type,
        payload: redactedPayload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only advance the chain after the write landed
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger.warn("listener threw", { type, error: err instanceof Error ? err.message : String(err) });
        }
      }
      return event;
    });
  }

  /** Like emit, but a failed write is logged instead of thrown. */
  async tryEmit(
    scopeId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(scopeId, type, payload);
    } catch (err) {
      this.logger.error("failed to record event", { type, error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.trim().split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as JournalEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  async readScope(scopeId: string): Promise<JournalEvent[]> {
    const events = await this.readAll();
    return events.filter((e) => e.scope_id === scopeId);
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    if (!existsSync(this.filePath)) return { valid: true };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const event = JSON.parse(lines[i]) as JournalEvent;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(lines[i]);
    }
    return { valid: true };
  }

  /** Wait for pending appends. Call before process exit. */
  async close(): Promise<void> {
    await this.writeLock.drain();
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}
