import { createHash } from "node:crypto";
import { appendFile, mkdir, open, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import { validateRunEventData } from "@tracelock/schemas";
import type { RunEvent, RunEventType } from "@tracelock/schemas";
import { PidLockfile, errorCode } from "./lockfile.js";

export type JournalRecovery = "truncate" | "strict";

export interface RunJournalOptions {
  /** fsync every append. Default: true */
  fsync?: boolean;
  /** Hold `<file>.lock` while open. Default: true */
  lock?: boolean;
  /** Wait this long for another holder of the lock before init() fails. Default: 0 */
  lockWaitMs?: number;
  /** On init, cut an unreadable or unlinked tail ("truncate", default) or refuse to open ("strict"). */
  recovery?: JournalRecovery;
}

export type RunJournalListener = (event: RunEvent) => void;

export interface IntegrityReport {
  valid: boolean;
  events: number;
  brokenAt?: number;
}

interface ChainScan {
  /** Leading lines that parse and link to their predecessor. */
  intact: number;
  lastHash: string | undefined;
  maxSeq: number;
}

function hashLine(line: string): string {
  return createHash("sha256").update(line).digest("hex");
}

function parseEvent(line: string): RunEvent | undefined {
  try {
    return JSON.parse(line) as RunEvent;
  } catch {
    return undefined;
  }
}

function scanChain(lines: readonly string[]): ChainScan {
  let lastHash: string | undefined;
  let maxSeq = -1;
  for (const [i, line] of lines.entries()) {
    const event = parseEvent(line);
    if (!event || (i > 0 && event.hash_prev !== lastHash)) {
      return { intact: i, lastHash, maxSeq };
    }
    lastHash = hashLine(line);
    maxSeq = Math.max(maxSeq, event.seq ?? -1);
  }
  return { intact: lines.length, lastHash, maxSeq };
}

/**
 * Append-only, hash-chained JSONL log of what happened to one run directory:
 * the recording, every replay, every frame export. Each line carries the
 * SHA-256 of the line before it.
 */
export class RunJournal {
  private filePath: string;
  private fsync: boolean;
  private recovery: JournalRecovery;
  private lockfile: PidLockfile | undefined;
  private listeners: RunJournalListener[] = [];
  private tail: Promise<unknown> = Promise.resolve();
  private lastHash: string | undefined;
  private nextSeq = 0;

  constructor(filePath: string, options: RunJournalOptions = {}) {
    this.filePath = filePath;
    this.fsync = options.fsync ?? true;
    this.recovery = options.recovery ?? "truncate";
    this.lockfile = (options.lock ?? true)
      ? new PidLockfile(`${filePath}.lock`, { waitMs: options.lockWaitMs })
      : undefined;
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await this.lockfile?.acquire();
    try {
      await this.resume();
    } catch (err) {
      await this.lockfile?.release();
      throw err;
    }
  }

  on(listener: RunJournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Appends are applied one at a time, in call order. */
  emit(runId: string, type: RunEventType, payload: Record<string, unknown>): Promise<RunEvent> {
    const appended = this.tail.then(() => this.append(runId, type, payload));
    // A failed append rejects `appended` for its caller; later appends still run.
    this.tail = appended.catch(() => undefined);
    return appended;
  }

  /** Like emit(), but a failure is reported on stderr and yields null. */
  async tryEmit(runId: string, type: RunEventType, payload: Record<string, unknown>): Promise<RunEvent | null> {
    try {
      return await this.emit(runId, type, payload);
    } catch (err) {
      console.error(`[tracelock] journal: could not record ${type}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  async readAll(): Promise<RunEvent[]> {
    const events: RunEvent[] = [];
    for (const line of await this.readLines()) {
      const event = parseEvent(line);
      if (event) events.push(event);
    }
    return events;
  }

  async verifyIntegrity(): Promise<IntegrityReport> {
    const lines = await this.readLines();
    const { intact } = scanChain(lines);
    return intact === lines.length
      ? { valid: true, events: lines.length }
      : { valid: false, events: lines.length, brokenAt: intact };
  }

  /** Waits for pending appends, then releases the lockfile. */
  async close(): Promise<void> {
    await this.tail;
    await this.lockfile?.release();
  }

  getFilePath(): string {
    return this.filePath;
  }

  private async resume(): Promise<void> {
    const lines = await this.readLines();
    const scan = scanChain(lines);
    if (scan.intact < lines.length) {
      if (this.recovery === "strict") {
        throw new Error(
          `Journal integrity violation at event ${scan.intact} of ${lines.length} in ${this.filePath}`,
        );
      }
      await this.rewrite(lines.slice(0, scan.intact));
      console.error(
        `[tracelock] journal: dropped ${lines.length - scan.intact} event(s) after event ${scan.intact} in ${this.filePath}`,
      );
    }
    this.lastHash = scan.lastHash;
    this.nextSeq = scan.maxSeq + 1;
  }

  private async append(runId: string, type: RunEventType, payload: Record<string, unknown>): Promise<RunEvent> {
    const event: RunEvent = {
      event_id: uuid(),
      timestamp: new Date().toISOString(),
      run_id: runId,
      type,
      payload,
      ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
      seq: this.nextSeq,
    };
    const validation = validateRunEventData(event);
    if (!validation.valid) {
      throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
    }

    const line = JSON.stringify(event);
    await this.writeLine(line);
    this.lastHash = hashLine(line);
    this.nextSeq++;

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[tracelock] journal listener failed:`, err);
      }
    }
    return event;
  }

  private async writeLine(line: string): Promise<void> {
    if (!this.fsync) {
      await appendFile(this.filePath, line + "\n", "utf-8");
      return;
    }
    const fh = await open(this.filePath, "a");
    try {
      await fh.write(line + "\n", undefined, "utf-8");
      await fh.sync();
    } finally {
      await fh.close();
    }
  }

  private async readLines(): Promise<string[]> {
    try {
      const content = await readFile(this.filePath, "utf-8");
      return content.split("\n").filter((line) => line.trim() !== "");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw err;
    }
  }

  private async rewrite(lines: readonly string[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, lines.map((line) => line + "\n").join(""), "utf-8");
    await rename(tmpPath, this.filePath);
  }
}
