import { describe, it, expect } from "vitest";
import { fingerprint } from "@tracelock/determinism";
import { makeEnvById } from "@tracelock/envs";
import { createPolicy } from "@tracelock/policies";
import { EnvironmentFaultError } from "@tracelock/schemas";
import type { RunSpec } from "@tracelock/schemas";
import { RunRecorder } from "./recorder.js";
import { RunReplayer, compareOutcome } from "./replayer.js";
import { CyclingPolicy, ScriptedEnv, catchError, makeSpec } from "./__fixtures__/scripted-env.js";

const openMaze = (spec: RunSpec) =>
  makeEnvById(spec.env_id, { frameskip: spec.frameskip, repeatActionProbability: spec.repeat_action_probability });

function mazeSpec(overrides: Partial<RunSpec> = {}): RunSpec {
  return {
    env_key: "maze",
    env_id: "Grid/Maze-v1",
    obs_type: "pixels",
    seed: 123,
    steps: 500,
    policy: "sticky_dir",
    frameskip: 4,
    repeat_action_probability: 0,
    single_episode: false,
    ...overrides,
  };
}

describe("RunReplayer", () => {
  it("reproduces a multi-episode recording", () => {
    const recording = new RunRecorder({ openEnv: () => new ScriptedEnv({ doneAt: [1, 3] }) }).record(
      makeSpec({ steps: 6 }),
      new CyclingPolicy(),
    );
    const env = new ScriptedEnv({ doneAt: [1, 3] });
    const report = new RunReplayer({ openEnv: () => env }).replay(recording.artifact);

    expect(report.deterministic).toBe(true);
    expect(report.deterministic_steps).toBe(true);
    expect(report.steps).toBe(6);
    expect(report.steps_replayed).toBe(6);
    expect(report.resets).toEqual(recording.resets);
    expect(env.resetSeeds).toEqual([7, 9, 11]);
    expect(env.closeCalls).toBe(1);
  });

  it("reports a reward mismatch without throwing", () => {
    const { artifact } = new RunRecorder({ openEnv: () => new ScriptedEnv() }).record(makeSpec(), new CyclingPolicy());
    const report = new RunReplayer({ openEnv: () => new ScriptedEnv() }).replay({
      ...artifact,
      total_reward: artifact.total_reward + 1,
    });
    expect(report.deterministic_reward).toBe(false);
    expect(report.deterministic_hash).toBe(true);
    expect(report.deterministic).toBe(false);
    expect(report.expected_total_reward).toBe(5);
    expect(report.actual_total_reward).toBe(4);
  });

  it("reports a hash mismatch", () => {
    const { artifact } = new RunRecorder({ openEnv: () => new ScriptedEnv() }).record(makeSpec(), new CyclingPolicy());
    const report = new RunReplayer({ openEnv: () => new ScriptedEnv() }).replay({
      ...artifact,
      final_obs_hash: "0".repeat(64),
    });
    expect(report.deterministic_reward).toBe(true);
    expect(report.deterministic_hash).toBe(false);
    expect(report.actual_final_hash).toBe(artifact.final_obs_hash);
  });

  it("stops a single-episode replay at the first done", () => {
    const env = new ScriptedEnv({ doneAt: [1] });
    const artifact = {
      run_id: "r",
      created_unix_s: 0,
      spec: makeSpec({ single_episode: true, steps: 4 }),
      actions: [2, 2, 2, 2],
      total_reward: 4,
      final_obs_hash: "0".repeat(64),
    };
    const report = new RunReplayer({ openEnv: () => env }).replay(artifact);
    expect(report.steps_replayed).toBe(2);
    expect(report.actual_total_reward).toBe(4);
    expect(report.deterministic_reward).toBe(true);
    expect(env.resetSeeds).toEqual([7]);
  });

  it("fails the verdict when a single-episode replay ends before its actions run out", () => {
    const artifact = {
      run_id: "r",
      created_unix_s: 0,
      spec: makeSpec({ single_episode: true, steps: 4 }),
      actions: [2, 2, 2, 2],
      total_reward: 4,
      final_obs_hash: fingerprint({ shape: [2], data: Int32Array.from([7, 2]) }),
    };
    const report = new RunReplayer({ openEnv: () => new ScriptedEnv({ doneAt: [1] }) }).replay(artifact);
    expect(report.deterministic_reward).toBe(true);
    expect(report.deterministic_hash).toBe(true);
    expect(report.deterministic_steps).toBe(false);
    expect(report.deterministic).toBe(false);
  });

  it("agrees with the recorder on the last-step done boundary", () => {
    for (const single_episode of [false, true]) {
      const spec = makeSpec({ steps: 3, single_episode });
      const { artifact } = new RunRecorder({ openEnv: () => new ScriptedEnv({ doneAt: [2] }) }).record(
        spec,
        new CyclingPolicy(),
      );
      const report = new RunReplayer({ openEnv: () => new ScriptedEnv({ doneAt: [2] }) }).replay(artifact);
      expect(report.deterministic).toBe(true);
    }
  });

  it("closes the environment when a replayed step fails", () => {
    const env = new ScriptedEnv({ failStepAt: 2 });
    const artifact = {
      run_id: "r",
      created_unix_s: 0,
      spec: makeSpec(),
      actions: [0, 0, 0, 0],
      total_reward: 0,
      final_obs_hash: "0".repeat(64),
    };
    const err = catchError(() => new RunReplayer({ openEnv: () => env }).replay(artifact));
    expect(err).toBeInstanceOf(EnvironmentFaultError);
    expect(env.closeCalls).toBe(1);
  });

  it("replays a maze recording with sticky directions", () => {
    const spec = mazeSpec();
    const { artifact } = new RunRecorder({ openEnv: openMaze }).record(spec, createPolicy(spec.policy));
    expect(artifact.actions).toHaveLength(500);

    const report = new RunReplayer({ openEnv: openMaze }).replay(artifact);
    expect(report.deterministic).toBe(true);
    expect(report.actual_total_reward).toBe(artifact.total_reward);
    expect(report.actual_final_hash).toBe(artifact.final_obs_hash);
  });

  it("replays a maze recording with sticky actions on the state observation", () => {
    const spec = mazeSpec({
      env_key: "maze-state",
      env_id: "Grid/Maze-state-v1",
      obs_type: "state",
      seed: 42,
      steps: 300,
      policy: "random",
      repeat_action_probability: 0.25,
    });
    const { artifact } = new RunRecorder({ openEnv: openMaze }).record(spec, createPolicy(spec.policy));
    const report = new RunReplayer({ openEnv: openMaze }).replay(artifact);
    expect(report.deterministic).toBe(true);
  });

  it("holds for a single-episode maze recording", () => {
    const spec = mazeSpec({ single_episode: true, steps: 2000 });
    const { artifact, telemetry } = new RunRecorder({ openEnv: openMaze }).record(spec, createPolicy(spec.policy));
    expect(artifact.actions.length).toBe(telemetry.length);
    const lastRow = telemetry[telemetry.length - 1];
    if (artifact.actions.length < 2000) expect(lastRow?.done).toBe(true);

    const report = new RunReplayer({ openEnv: openMaze }).replay(artifact);
    expect(report.deterministic).toBe(true);
    expect(report.steps_replayed).toBe(artifact.actions.length);
  });
});

describe("compareOutcome", () => {
  const hash = "a".repeat(64);

  it("tolerates reward drift below 1e-6", () => {
    expect(compareOutcome({ total_reward: 10, final_obs_hash: hash }, { total_reward: 10 + 1e-7, final_obs_hash: hash }))
      .toEqual({ deterministic_reward: true, deterministic_hash: true, deterministic: true });
  });

  it("flags reward drift at or above 1e-5", () => {
    expect(
      compareOutcome({ total_reward: 10, final_obs_hash: hash }, { total_reward: 10.00001, final_obs_hash: hash })
        .deterministic_reward,
    ).toBe(false);
  });

  it("compares hashes exactly", () => {
    expect(
      compareOutcome({ total_reward: 0, final_obs_hash: hash }, { total_reward: 0, final_obs_hash: hash.toUpperCase() })
        .deterministic_hash,
    ).toBe(false);
  });
});
