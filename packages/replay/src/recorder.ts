import { v4 as uuid } from "uuid";
import { fingerprint, initialSeed, isDone, reseedAfterDone } from "@tracelock/determinism";
import { ConfigurationError } from "@tracelock/schemas";
import type {
  ActionPolicy,
  EnvAdapter,
  EpisodeReset,
  RecordingResult,
  RunArtifact,
  RunSpec,
  TelemetryRow,
} from "@tracelock/schemas";
import { actionVocabulary, envCall, withEnvironment } from "./env-session.js";
import type { EnvOpener } from "./env-session.js";

export interface RunRecorderConfig {
  openEnv: EnvOpener;
  /** Wall clock, unix seconds. */
  now?: () => number;
  /** Monotonic clock, milliseconds; times each step. */
  clock?: () => number;
  newRunId?: (nowUnixS: number) => string;
}

/**
 * UTC `YYYYMMDD-HHMMSS` followed by 8 random hex characters. Sorts by time;
 * the suffix keeps concurrent processes from colliding.
 */
export function generateRunId(nowUnixS: number = Date.now() / 1000): string {
  const iso = new Date(Math.floor(nowUnixS * 1000)).toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, "")}-${iso.slice(11, 19).replace(/:/g, "")}`;
  return `${stamp}-${uuid().replace(/-/g, "").slice(0, 8)}`;
}

export function validateRunSpec(spec: RunSpec): void {
  if (!Number.isSafeInteger(spec.seed)) {
    throw new ConfigurationError(`Invalid seed: ${spec.seed} (must be an integer)`);
  }
  if (!Number.isInteger(spec.steps) || spec.steps < 0) {
    throw new ConfigurationError(`Invalid steps: ${spec.steps} (must be a non-negative integer)`);
  }
  if (!Number.isInteger(spec.frameskip) || spec.frameskip < 1) {
    throw new ConfigurationError(`Invalid frameskip: ${spec.frameskip} (must be a positive integer)`);
  }
  if (!(spec.repeat_action_probability >= 0 && spec.repeat_action_probability <= 1)) {
    throw new ConfigurationError(
      `Invalid repeat action probability: ${spec.repeat_action_probability} (must be within [0, 1])`,
    );
  }
}

export class RunRecorder {
  private openEnv: EnvOpener;
  private now: () => number;
  private clock: () => number;
  private newRunId: (nowUnixS: number) => string;

  constructor(config: RunRecorderConfig) {
    this.openEnv = config.openEnv;
    this.now = config.now ?? (() => Date.now() / 1000);
    this.clock = config.clock ?? (() => performance.now());
    this.newRunId = config.newRunId ?? generateRunId;
  }

  /**
   * Record up to `spec.steps` steps with a freshly constructed policy. The
   * environment is opened and closed exactly once, including when recording
   * stops early or fails.
   */
  record(spec: RunSpec, policy: ActionPolicy): RecordingResult {
    validateRunSpec(spec);
    const runId = this.newRunId(this.now());
    return withEnvironment(() => this.openEnv(spec), (env) => this.drive(env, spec, policy, runId));
  }

  private drive(env: EnvAdapter, spec: RunSpec, policy: ActionPolicy, runId: string): RecordingResult {
    policy.reset({ seed: spec.seed, actionNames: actionVocabulary(env), actionCount: env.actionCount });
    let observation = envCall("reset", () => env.reset(initialSeed(spec.seed))).observation;

    const actions: number[] = [];
    const telemetry: TelemetryRow[] = [];
    const resets: EpisodeReset[] = [];
    let totalReward = 0;
    let episodeReturn = 0;
    let lastReward = 0;
    let lastDone = false;
    let episodeId = 0;
    let episodeStep = 0;

    for (let step = 0; step < spec.steps; step++) {
      const action = policy.act(step, observation, lastReward, lastDone);
      if (!Number.isInteger(action) || action < 0 || action >= env.actionCount) {
        throw new RangeError(`Policy ${policy.name} chose action ${action} outside [0, ${env.actionCount})`);
      }
      actions.push(action);

      const t0 = this.clock();
      const result = envCall("step", () => env.step(action));
      const wallMs = this.clock() - t0;

      observation = result.observation;
      totalReward += result.reward;
      episodeReturn += result.reward;
      const done = isDone(result);
      lastReward = result.reward;
      lastDone = done;

      telemetry.push({
        episode_id: episodeId,
        episode_step: episodeStep,
        step,
        action,
        reward: result.reward,
        terminated: result.terminated,
        truncated: result.truncated,
        done,
        episode_return: episodeReturn,
        obs_hash: fingerprint(observation),
        wall_ms: wallMs,
      });
      episodeStep++;

      if (done) {
        if (spec.single_episode) break;

        const seed = reseedAfterDone(spec.seed, step);
        observation = envCall("reset", () => env.reset(seed)).observation;
        episodeId++;
        resets.push({ step, seed, episode_id: episodeId });
        episodeStep = 0;
        episodeReturn = 0;
        lastReward = 0;
        lastDone = false;
      }
    }

    // Whatever observation is current: post-reset if the last step ended an
    // episode in multi-episode mode, the last step's otherwise.
    const artifact: RunArtifact = {
      run_id: runId,
      created_unix_s: this.now(),
      spec: { ...spec },
      actions,
      total_reward: totalReward,
      final_obs_hash: fingerprint(observation),
    };
    return { artifact, telemetry, resets };
  }
}
