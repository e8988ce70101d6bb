import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { RunEvent } from "@tracelock/schemas";
import { RunJournal } from "./journal.js";

describe("RunJournal", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tracelock-journal-"));
    file = join(dir, "run", "events.jsonl");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates directory and file on init + emit", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    const event = await journal.emit("run-1", "recording.started", { seed: 123 });
    expect(event.event_id).toBeTruthy();
    expect(event.run_id).toBe("run-1");
    expect(event.type).toBe("recording.started");
    expect(event.payload).toEqual({ seed: 123 });
    expect(event.seq).toBe(0);
    expect(existsSync(file)).toBe(true);
  });

  it("chains each event to the previous line", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    const e1 = await journal.emit("run-1", "recording.started", {});
    const e2 = await journal.emit("run-1", "recording.completed", {});

    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true, events: 2 });
  });

  it("writes with fsync enabled", async () => {
    const journal = new RunJournal(file, { lock: false });
    await journal.init();
    await journal.emit("run-1", "replay.started", {});
    expect(await journal.readAll()).toHaveLength(1);
  });

  it("continues the sequence and chain across instances", async () => {
    const first = new RunJournal(file, { fsync: false, lock: false });
    await first.init();
    await first.emit("run-1", "recording.started", {});
    await first.emit("run-1", "recording.completed", {});
    await first.close();

    const second = new RunJournal(file, { fsync: false, lock: false });
    await second.init();
    const event = await second.emit("run-1", "replay.started", {});
    expect(event.seq).toBe(2);
    expect(await second.verifyIntegrity()).toEqual({ valid: true, events: 3 });
  });

  it("detects a tampered entry", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "recording.started", {});
    await journal.emit("run-1", "recording.completed", { total_reward: 10 });
    await journal.emit("run-1", "replay.started", {});

    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    const parsed = JSON.parse(lines[1] ?? "{}") as RunEvent;
    parsed.payload = { total_reward: 9999 };
    lines[1] = JSON.stringify(parsed);
    await writeFile(file, lines.join("\n") + "\n", "utf-8");

    expect(await journal.verifyIntegrity()).toEqual({ valid: false, events: 3, brokenAt: 2 });

    const strict = new RunJournal(file, { fsync: false, lock: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow("Journal integrity violation at event 2");
  });

  it("truncates a broken tail in truncate mode", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "recording.started", {});
    await journal.emit("run-1", "recording.completed", {});
    await journal.emit("run-1", "replay.started", {});

    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    const parsed = JSON.parse(lines[1] ?? "{}") as RunEvent;
    parsed.payload = { edited: true };
    lines[1] = JSON.stringify(parsed);
    await writeFile(file, lines.join("\n") + "\n", "utf-8");

    const repaired = new RunJournal(file, { fsync: false, lock: false });
    await repaired.init();
    expect(await repaired.readAll()).toHaveLength(2);
    const next = await repaired.emit("run-1", "replay.started", {});
    expect(next.seq).toBe(2);
    expect((await repaired.verifyIntegrity()).valid).toBe(true);
  });

  it("drops an incomplete last line left by a crash", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "recording.started", {});
    await appendFile(file, '{"event_id":"torn', "utf-8");

    const repaired = new RunJournal(file, { fsync: false, lock: false });
    await repaired.init();
    expect(await repaired.readAll()).toHaveLength(1);
  });

  it("rejects events that fail schema validation", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    await expect(journal.emit("", "recording.started", {})).rejects.toThrow("Invalid journal event");
    expect(await journal.readAll()).toHaveLength(0);
  });

  it("notifies listeners until unsubscribed", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    const seen: string[] = [];
    const off = journal.on((event) => seen.push(event.type));
    await journal.emit("run-1", "recording.started", {});
    off();
    await journal.emit("run-1", "recording.completed", {});
    expect(seen).toEqual(["recording.started"]);
  });

  it("serializes concurrent emits", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => journal.emit("run-1", "episode.reset", { step: i })),
    );
    const events = await journal.readAll();
    expect(events.map((e) => e.seq)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect((await journal.verifyIntegrity()).valid).toBe(true);
  });

  it("holds an advisory lock until closed", async () => {
    const first = new RunJournal(file, { fsync: false });
    await first.init();
    const second = new RunJournal(file, { fsync: false });
    await expect(second.init()).rejects.toThrow(`Journal is locked by process ${process.pid}`);
    await first.close();
    expect(existsSync(`${file}.lock`)).toBe(false);

    await second.init();
    await second.close();
  });

  it("replaces a stale lockfile", async () => {
    const journal = new RunJournal(file, { fsync: false });
    await new RunJournal(file, { fsync: false, lock: false }).init();
    await writeFile(`${file}.lock`, "not-a-pid", "utf-8");
    await journal.init();
    expect(await readFile(`${file}.lock`, "utf-8")).toBe(String(process.pid));
    await journal.close();
  });

  it("waits for the lock holder when given a wait budget", async () => {
    const first = new RunJournal(file, { fsync: false });
    await first.init();
    const second = new RunJournal(file, { fsync: false, lockWaitMs: 5000 });
    const opening = second.init();
    await first.emit("run-1", "replay.started", {});
    await first.close();
    await opening;

    const event = await second.emit("run-1", "replay.completed", {});
    expect(event.seq).toBe(1);
    await second.close();
    expect(existsSync(`${file}.lock`)).toBe(false);
  });

  it("releases the lock when strict recovery refuses to open", async () => {
    await new RunJournal(file, { fsync: false, lock: false }).init();
    await writeFile(file, '{"torn', "utf-8");
    const strict = new RunJournal(file, { fsync: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow("Journal integrity violation at event 0 of 1");
    expect(existsSync(`${file}.lock`)).toBe(false);
  });

  it("reports a failed best-effort append instead of throwing", async () => {
    const logged = vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    expect(await journal.tryEmit("", "replay.started", {})).toBeNull();
    expect(logged).toHaveBeenCalledTimes(1);
    expect(String(logged.mock.calls[0]?.[0])).toMatch(/^\[tracelock\] journal: could not record replay\.started: Invalid journal event/);
    logged.mockRestore();

    const next = await journal.tryEmit("run-1", "replay.started", {});
    expect(next?.seq).toBe(0);
  });

  it("counts an unreadable line as a break", async () => {
    const journal = new RunJournal(file, { fsync: false, lock: false });
    await journal.init();
    await journal.emit("run-1", "recording.started", {});
    await appendFile(file, "garbage\n", "utf-8");
    expect(await journal.verifyIntegrity()).toEqual({ valid: false, events: 2, brokenAt: 1 });
  });
});
