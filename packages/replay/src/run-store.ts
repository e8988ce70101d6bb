import { mkdir, open, readFile, rename } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { ArtifactFormatError, ConfigurationError, parseRunArtifact } from "@tracelock/schemas";
import type { RunArtifact, TelemetryRow } from "@tracelock/schemas";
import { formatTelemetryCsv, parseTelemetryCsv } from "./telemetry.js";
import type { TelemetryRecord } from "./telemetry.js";

export const ARTIFACT_FILE = "run.json";
export const TELEMETRY_FILE = "telemetry.csv";
export const JOURNAL_FILE = "events.jsonl";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** Field order of run.json; anything else on the object is not written. */
export function serializeRunArtifact(artifact: RunArtifact): string {
  const { spec } = artifact;
  const ordered = {
    run_id: artifact.run_id,
    created_unix_s: artifact.created_unix_s,
    spec: {
      env_key: spec.env_key,
      env_id: spec.env_id,
      obs_type: spec.obs_type,
      seed: spec.seed,
      steps: spec.steps,
      policy: spec.policy,
      frameskip: spec.frameskip,
      repeat_action_probability: spec.repeat_action_probability,
      single_episode: spec.single_episode,
    },
    actions: artifact.actions,
    total_reward: artifact.total_reward,
    final_obs_hash: artifact.final_obs_hash,
  };
  return JSON.stringify(ordered, null, 2) + "\n";
}

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpPath = filePath + ".tmp";
  const fh = await open(tmpPath, "w");
  try {
    await fh.writeFile(content, "utf-8");
    await fh.sync();
  } finally {
    await fh.close();
  }
  await rename(tmpPath, filePath);
}

/**
 * On-disk layout of runs: `<runsDir>/<run_id>/{run.json, telemetry.csv, events.jsonl}`.
 */
export class RunStore {
  readonly runsDir: string;

  constructor(runsDir: string) {
    this.runsDir = resolve(runsDir);
  }

  runDir(runId: string): string {
    return join(this.runsDir, runId);
  }

  /** Exclusive: fails if another run already owns the directory. */
  async createRunDir(runId: string): Promise<string> {
    await mkdir(this.runsDir, { recursive: true });
    const dir = this.runDir(runId);
    try {
      await mkdir(dir);
    } catch (err) {
      if (errorCode(err) === "EEXIST") {
        throw new ConfigurationError(`Run directory already exists: ${dir}`);
      }
      throw err;
    }
    return dir;
  }

  async writeArtifact(runDir: string, artifact: RunArtifact): Promise<string> {
    const filePath = join(runDir, ARTIFACT_FILE);
    await writeFileAtomic(filePath, serializeRunArtifact(artifact));
    return filePath;
  }

  async writeTelemetry(runDir: string, rows: readonly TelemetryRow[]): Promise<string> {
    const filePath = join(runDir, TELEMETRY_FILE);
    await writeFileAtomic(filePath, formatTelemetryCsv(rows));
    return filePath;
  }

  journalPath(runDir: string): string {
    return join(runDir, JOURNAL_FILE);
  }
}

/**
 * Load and validate a run artifact. Older files missing optional fields get
 * defaults; a missing run_id falls back to the containing directory's name.
 */
export async function loadRunArtifact(artifactPath: string): Promise<RunArtifact> {
  let content: string;
  try {
    content = await readFile(artifactPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new ConfigurationError(`Run artifact not found: ${artifactPath}`);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ArtifactFormatError("(root)", `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return parseRunArtifact(data, basename(dirname(resolve(artifactPath))));
}

export async function loadTelemetry(runDir: string): Promise<TelemetryRecord[]> {
  const filePath = join(runDir, TELEMETRY_FILE);
  try {
    return parseTelemetryCsv(await readFile(filePath, "utf-8"));
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new ConfigurationError(`Missing telemetry.csv in ${runDir}`);
    }
    throw err;
  }
}
