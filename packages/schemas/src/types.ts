/**
 * Tracelock Core Types
 *
 * Canonical data models shared by the recorder, the replayer and the CLI.
 * Wire-facing records use snake_case field names; they are written to disk
 * verbatim and read back by later processes.
 */

// ─── Observations ───────────────────────────────────────────────────

export type ObservationData =
  | Uint8Array
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array;

/** A dense tensor in row-major order. `shape` is part of its identity. */
export interface Observation {
  shape: readonly number[];
  data: ObservationData;
}

export interface RgbFrame {
  width: number;
  height: number;
  /** Row-major RGB triples, `width * height * 3` bytes. */
  data: Uint8Array;
}

// ─── Environment ────────────────────────────────────────────────────

export type ObsType = "pixels" | "state";

export interface ResetResult {
  observation: Observation;
  info: Record<string, unknown>;
}

export interface StepResult {
  observation: Observation;
  reward: number;
  terminated: boolean;
  truncated: boolean;
  info: Record<string, unknown>;
}

/** The minimal surface the recorder and replayer need from a simulator. */
export interface EnvAdapter {
  readonly envId: string;
  readonly obsType: ObsType;
  readonly actionCount: number;
  /** Symbolic action names, index-aligned with action ids. */
  readonly actionNames?: readonly string[];
  reset(seed?: number): ResetResult;
  step(action: number): StepResult;
  close(): void;
  renderRgb?(): RgbFrame | null;
}

export interface EnvOptions {
  frameskip?: number;
  repeatActionProbability?: number;
  maxEpisodeSteps?: number;
}

export interface EnvSpec {
  key: string;
  env_id: string;
  obs_type: ObsType;
  description: string;
}

// ─── Policies ───────────────────────────────────────────────────────

export interface PolicyResetOptions {
  seed: number;
  actionNames: readonly string[];
  actionCount: number;
}

export interface ActionPolicy {
  readonly name: string;
  reset(options: PolicyResetOptions): void;
  act(step: number, observation: Observation, lastReward: number, lastDone: boolean): number;
}

// ─── Runs ───────────────────────────────────────────────────────────

export interface RunSpec {
  env_key: string;
  env_id: string;
  obs_type: ObsType;
  seed: number;
  steps: number;
  policy: string;
  frameskip: number;
  repeat_action_probability: number;
  single_episode: boolean;
}

export interface RunArtifact {
  run_id: string;
  created_unix_s: number;
  spec: RunSpec;
  actions: number[];
  total_reward: number;
  final_obs_hash: string;
}

export interface TelemetryRow {
  episode_id: number;
  episode_step: number;
  step: number;
  action: number;
  reward: number;
  terminated: boolean;
  truncated: boolean;
  done: boolean;
  episode_return: number;
  obs_hash: string;
  wall_ms: number;
}

export interface EpisodeReset {
  /** Global index of the step whose result ended the episode. */
  step: number;
  seed: number;
  /** Id of the episode that starts with this reset. */
  episode_id: number;
}

export interface RecordingResult {
  artifact: RunArtifact;
  telemetry: TelemetryRow[];
  resets: EpisodeReset[];
}

export interface ReplayReport {
  run_id: string;
  spec: RunSpec;
  steps: number;
  steps_replayed: number;
  resets: EpisodeReset[];
  expected_total_reward: number;
  actual_total_reward: number;
  expected_final_hash: string;
  actual_final_hash: string;
  deterministic_reward: boolean;
  deterministic_hash: boolean;
  /** Every recorded action was consumed before the replay ended. */
  deterministic_steps: boolean;
  deterministic: boolean;
}

// ─── Journal ────────────────────────────────────────────────────────

export type RunEventType =
  | "recording.started"
  | "episode.reset"
  | "recording.completed"
  | "replay.started"
  | "replay.completed"
  | "frames.exported";

export interface RunEvent {
  event_id: string;
  timestamp: string;
  run_id: string;
  type: RunEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
