import type { ActionPolicy, EnvAdapter, ResetResult, RgbFrame, RunSpec, StepResult } from "@tracelock/schemas";

export interface ScriptedEnvOptions {
  /** Global step indexes (counted across resets) whose result is terminal. */
  doneAt?: number[];
  failStepAt?: number;
  failClose?: boolean;
  renders?: boolean;
}

/**
 * Deterministic stand-in for a simulator. Observation is [seed, episode
 * step] as Int32; reward equals the action taken.
 */
export class ScriptedEnv implements EnvAdapter {
  readonly envId = "Fake/Scripted-v0";
  readonly obsType = "state" as const;
  readonly actionCount = 3;
  readonly resetSeeds: (number | undefined)[] = [];
  closeCalls = 0;
  stepCalls = 0;
  private seed = 0;
  private counter = 0;
  private doneAt: Set<number>;

  constructor(private options: ScriptedEnvOptions = {}) {
    this.doneAt = new Set(options.doneAt ?? []);
  }

  reset(seed?: number): ResetResult {
    this.resetSeeds.push(seed);
    this.seed = seed ?? this.seed;
    this.counter = 0;
    return { observation: this.observe(), info: {} };
  }

  step(action: number): StepResult {
    const index = this.stepCalls++;
    if (index === this.options.failStepAt) throw new Error("emulator crashed");
    this.counter++;
    return {
      observation: this.observe(),
      reward: action,
      terminated: this.doneAt.has(index),
      truncated: false,
      info: {},
    };
  }

  close(): void {
    this.closeCalls++;
    if (this.options.failClose) throw new Error("close failed");
  }

  renderRgb(): RgbFrame | null {
    if (!this.options.renders) return null;
    return { width: 1, height: 1, data: Uint8Array.from([this.seed, this.counter, 0]) };
  }

  private observe() {
    return { shape: [2], data: Int32Array.from([this.seed, this.counter]) };
  }
}

/** Cycles 0, 1, 2 and records the feedback it was given. */
export class CyclingPolicy implements ActionPolicy {
  readonly name = "cycling";
  readonly feedback: [number, boolean][] = [];
  resetSeed: number | undefined;

  reset(options: { seed: number }): void {
    this.resetSeed = options.seed;
    this.feedback.length = 0;
  }

  act(step: number, _observation: unknown, lastReward: number, lastDone: boolean): number {
    this.feedback.push([lastReward, lastDone]);
    return step % 3;
  }
}

export function makeSpec(overrides: Partial<RunSpec> = {}): RunSpec {
  return {
    env_key: "fake",
    env_id: "Fake/Scripted-v0",
    obs_type: "state",
    seed: 7,
    steps: 5,
    policy: "cycling",
    frameskip: 4,
    repeat_action_probability: 0,
    single_episode: false,
    ...overrides,
  };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
