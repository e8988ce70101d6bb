import { open, readFile, unlink } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";

export interface PidLockfileOptions {
  /** How long acquire() keeps retrying while a live process holds the lock. Default: 0 */
  waitMs?: number;
  retryMs?: number;
}

/** owner: pid in the existing lockfile, NaN if unreadable, undefined if empty. */
type LockProbe = { acquired: true } | { acquired: false; owner: number | undefined };

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    if (errorCode(err) === "ESRCH") return false;
    // EPERM: the process exists but belongs to someone else
    if (errorCode(err) === "EPERM") return true;
    throw err;
  }
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (errorCode(err) !== "ENOENT") throw err;
  }
}

/**
 * Advisory lock: a file created with O_EXCL holding the owner's pid. A lock
 * whose owner is gone, or whose content is not a pid, is taken over.
 */
export class PidLockfile {
  readonly path: string;
  private waitMs: number;
  private retryMs: number;
  private held = false;

  constructor(path: string, options: PidLockfileOptions = {}) {
    this.path = path;
    this.waitMs = Math.max(0, options.waitMs ?? 0);
    this.retryMs = Math.max(1, options.retryMs ?? 25);
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held) return;
    const deadline = Date.now() + this.waitMs;
    for (;;) {
      const probe = await this.create();
      if (probe.acquired) {
        this.held = true;
        return;
      }
      const expired = Date.now() >= deadline;
      const { owner } = probe;
      // An empty file is a lock whose creator has not written its pid yet.
      const stale = owner === undefined ? expired : Number.isNaN(owner) || !processAlive(owner);
      if (stale) {
        await unlinkIfPresent(this.path);
        continue;
      }
      if (expired) {
        throw new Error(`Journal is locked by process ${owner ?? "?"} (lockfile: ${this.path})`);
      }
      await delay(this.retryMs);
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await unlinkIfPresent(this.path);
  }

  private async create(): Promise<LockProbe> {
    try {
      const fh = await open(this.path, "wx");
      try {
        await fh.write(String(process.pid), undefined, "utf-8");
      } finally {
        await fh.close();
      }
      return { acquired: true };
    } catch (err) {
      if (errorCode(err) !== "EEXIST") throw err;
    }
    const content = await readFile(this.path, "utf-8").catch((err: unknown) => {
      if (errorCode(err) === "ENOENT") return "";
      throw err;
    });
    const trimmed = content.trim();
    return { acquired: false, owner: trimmed === "" ? undefined : parseInt(trimmed, 10) };
  }
}
