import { Command } from "commander";
import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { getEnvSpec, listEnvs, makeEnvById } from "@tracelock/envs";
import { RunJournal } from "@tracelock/journal";
import { assertPolicyName, createPolicy, listPolicies } from "@tracelock/policies";
import {
  RunRecorder,
  RunReplayer,
  RunStore,
  captureFrames,
  generateRunId,
  loadRunArtifact,
  loadTelemetry,
  summarizeTelemetry,
  writeFrames,
} from "@tracelock/replay";
import type { EnvOpener } from "@tracelock/replay";
import { ConfigurationError } from "@tracelock/schemas";
import type { RunSpec } from "@tracelock/schemas";
import { DEFAULT_CONFIG, parseInteger, parseProbability } from "./config.js";
import type { TracelockConfig } from "./config.js";
import {
  formatEnvList,
  formatError,
  formatEventLine,
  formatRecordSummary,
  formatReplayReport,
  formatTelemetrySummary,
} from "./format.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_MISMATCH = 2;

export const SIDE_JOURNAL_WAIT_MS = 2000;

export interface ProgramDeps {
  config?: TracelockConfig;
  /** Receives the command's exit status; errors are left to the caller. */
  setExitCode?: (code: number) => void;
  openEnv?: EnvOpener;
  /** How long replay and export-frames wait for a busy journal lock. */
  journalLockWaitMs?: number;
  /** Applied before any command is added, so settings reach subcommands. */
  configure?: (program: Command) => void;
}

const openRegisteredEnv: EnvOpener = (spec) =>
  makeEnvById(spec.env_id, { frameskip: spec.frameskip, repeatActionProbability: spec.repeat_action_probability });

interface RecordOptions {
  env?: string;
  policy?: string;
  seed: string;
  steps: string;
  frameskip: string;
  sticky: string;
  runsDir?: string;
  singleEpisode?: boolean;
}

interface JournalOptions {
  journal: boolean;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const config = deps.config ?? DEFAULT_CONFIG;
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const openEnv = deps.openEnv ?? openRegisteredEnv;
  const sideJournalWaitMs = deps.journalLockWaitMs ?? SIDE_JOURNAL_WAIT_MS;

  async function openJournal(runDir: string, lockWaitMs = 0): Promise<RunJournal> {
    const journal = new RunJournal(join(runDir, "events.jsonl"), { fsync: config.journalFsync, lockWaitMs });
    await journal.init();
    journal.on((event) => console.log(formatEventLine(event)));
    return journal;
  }

  /**
   * Journal for commands that only read a run. A busy or damaged journal is
   * reported on stderr and the command goes on without it.
   */
  async function openSideJournal(runDir: string): Promise<RunJournal | undefined> {
    try {
      return await openJournal(runDir, sideJournalWaitMs);
    } catch (err) {
      console.error(`[tracelock] journal unavailable, continuing without it: ${formatError(err)}`);
      return undefined;
    }
  }

  async function closeSideJournal(journal: RunJournal | undefined): Promise<void> {
    try {
      await journal?.close();
    } catch (err) {
      console.error(`[tracelock] journal close failed: ${formatError(err)}`);
    }
  }

  const program = new Command();
  deps.configure?.(program);
  program.name("tracelock").description("Record and verify deterministic environment replays").version("0.1.0");

  program.command("record").description("Record a run and save its artifact")
    .option("--env <key>", `Environment key (default: ${config.envKey})`)
    .option("--policy <name>", `Action policy (default: ${config.policy})`)
    .option("--seed <n>", "Base seed", "123")
    .option("--steps <n>", "Step budget", "5000")
    .option("--frameskip <n>", "Frames per step", "4")
    .option("--sticky <p>", "Repeat action probability", "0")
    .option("--runs-dir <dir>", `Runs directory (default: ${config.runsDir})`)
    .option("--single-episode", "Stop at the first episode end")
    .action(async (opts: RecordOptions) => {
      const seed = parseInteger(opts.seed, "seed");
      const steps = parseInteger(opts.steps, "steps", 0);
      const frameskip = parseInteger(opts.frameskip, "frameskip", 1);
      const sticky = parseProbability(opts.sticky, "sticky");
      const envSpec = getEnvSpec(opts.env ?? config.envKey);
      const policyName = opts.policy ?? config.policy;
      assertPolicyName(policyName);

      const spec: RunSpec = {
        env_key: envSpec.key,
        env_id: envSpec.env_id,
        obs_type: envSpec.obs_type,
        seed,
        steps,
        policy: policyName,
        frameskip,
        repeat_action_probability: sticky,
        single_episode: opts.singleEpisode ?? false,
      };

      const store = new RunStore(opts.runsDir ?? config.runsDir);
      const runId = generateRunId();
      const runDir = await store.createRunDir(runId);
      const journal = await openJournal(runDir);
      try {
        await journal.emit(runId, "recording.started", { spec });
        const recorder = new RunRecorder({ openEnv, newRunId: () => runId });
        const { artifact, telemetry, resets } = recorder.record(spec, createPolicy(policyName));
        for (const reset of resets) {
          await journal.emit(runId, "episode.reset", { ...reset });
        }
        await store.writeTelemetry(runDir, telemetry);
        const artifactPath = await store.writeArtifact(runDir, artifact);
        await journal.emit(runId, "recording.completed", {
          steps: artifact.actions.length,
          episodes: resets.length + 1,
          total_reward: artifact.total_reward,
          final_obs_hash: artifact.final_obs_hash,
          artifact: artifactPath,
        });
        for (const line of formatRecordSummary(artifact, runDir, resets.length + 1)) console.log(line);
      } finally {
        await journal.close();
      }
      setExitCode(EXIT_OK);
    });

  program.command("replay").description("Replay a run artifact and verify determinism")
    .argument("<run>", "Path to runs/<id>/run.json")
    .option("--no-journal", "Do not append to the run's event journal")
    .action(async (runPath: string, opts: JournalOptions) => {
      const artifact = await loadRunArtifact(runPath);
      const journal = opts.journal ? await openSideJournal(dirname(resolve(runPath))) : undefined;
      try {
        await journal?.tryEmit(artifact.run_id, "replay.started", { steps: artifact.actions.length });
        const report = new RunReplayer({ openEnv }).replay(artifact);
        await journal?.tryEmit(artifact.run_id, "replay.completed", {
          steps_replayed: report.steps_replayed,
          actual_total_reward: report.actual_total_reward,
          actual_final_hash: report.actual_final_hash,
          deterministic: report.deterministic,
        });
        for (const line of formatReplayReport(report)) console.log(line);
        setExitCode(report.deterministic ? EXIT_OK : EXIT_MISMATCH);
      } finally {
        await closeSideJournal(journal);
      }
    });

  program.command("export-frames").description("Replay a run and write its frames as PPM images")
    .argument("<run>", "Path to runs/<id>/run.json")
    .option("--out <dir>", "Output directory (default: <run dir>/frames)")
    .option("--capture-every <n>", "Keep every n-th frame", "1")
    .option("--max-frames <n>", "Stop after this many frames")
    .option("--no-journal", "Do not append to the run's event journal")
    .action(async (runPath: string, opts: JournalOptions & { out?: string; captureEvery: string; maxFrames?: string }) => {
      const captureEvery = parseInteger(opts.captureEvery, "capture-every", 1);
      const maxFrames = opts.maxFrames === undefined ? undefined : parseInteger(opts.maxFrames, "max-frames", 1);
      const artifact = await loadRunArtifact(runPath);
      const runDir = dirname(resolve(runPath));
      const outDir = resolve(opts.out ?? join(runDir, "frames"));

      const frames = captureFrames(artifact, openEnv, { captureEvery, maxFrames });
      const paths = await writeFrames(frames, outDir);

      const journal = opts.journal ? await openSideJournal(runDir) : undefined;
      try {
        await journal?.tryEmit(artifact.run_id, "frames.exported", {
          count: paths.length,
          out_dir: outDir,
          capture_every: captureEvery,
        });
      } finally {
        await closeSideJournal(journal);
      }
      console.log(`Wrote ${paths.length} frames to ${outDir}`);
      setExitCode(EXIT_OK);
    });

  program.command("envs").description("List registered environments").action(() => {
    for (const line of formatEnvList(listEnvs())) console.log(line);
    setExitCode(EXIT_OK);
  });

  program.command("policies").description("List action policies").action(() => {
    for (const name of listPolicies()) console.log(name);
    setExitCode(EXIT_OK);
  });

  program.command("telemetry").description("Summarize a run's telemetry ledger")
    .argument("<run-dir>", "Path to runs/<id>/")
    .option("--json", "Print the full summary as JSON")
    .action(async (runDir: string, opts: { json?: boolean }) => {
      const summary = summarizeTelemetry(await loadTelemetry(runDir));
      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        for (const line of formatTelemetrySummary(summary, runDir)) console.log(line);
      }
      setExitCode(EXIT_OK);
    });

  const journalCmd = program.command("journal").description("Run journal tools");
  journalCmd.command("verify").description("Check a run journal's hash chain")
    .argument("<run-dir>", "Path to runs/<id>/")
    .action(async (runDir: string) => {
      const filePath = join(runDir, "events.jsonl");
      if (!existsSync(filePath)) throw new ConfigurationError(`No journal at ${filePath}`);
      const integrity = await new RunJournal(filePath, { lock: false }).verifyIntegrity();
      if (integrity.valid) {
        console.log(`Journal integrity: OK (${integrity.events} events)`);
        setExitCode(EXIT_OK);
      } else {
        console.log(`Journal integrity: BROKEN at event ${integrity.brokenAt ?? "?"} of ${integrity.events}`);
        setExitCode(EXIT_ERROR);
      }
    });

  return program;
}
