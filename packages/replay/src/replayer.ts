import { fingerprint, initialSeed, isDone, reseedAfterDone } from "@tracelock/determinism";
import type { EpisodeReset, ReplayReport, RunArtifact } from "@tracelock/schemas";
import { envCall, withEnvironment } from "./env-session.js";
import type { EnvOpener } from "./env-session.js";

/** Rewards are summed in the same order on both sides; the tolerance absorbs representation noise only. */
export const REWARD_TOLERANCE = 1e-6;

export interface OutcomeComparison {
  deterministic_reward: boolean;
  deterministic_hash: boolean;
  deterministic: boolean;
}

export function compareOutcome(
  expected: { total_reward: number; final_obs_hash: string },
  actual: { total_reward: number; final_obs_hash: string },
): OutcomeComparison {
  const deterministicReward = Math.abs(actual.total_reward - expected.total_reward) < REWARD_TOLERANCE;
  const deterministicHash = actual.final_obs_hash === expected.final_obs_hash;
  return {
    deterministic_reward: deterministicReward,
    deterministic_hash: deterministicHash,
    deterministic: deterministicReward && deterministicHash,
  };
}

export interface RunReplayerConfig {
  openEnv: EnvOpener;
}

export class RunReplayer {
  private openEnv: EnvOpener;

  constructor(config: RunReplayerConfig) {
    this.openEnv = config.openEnv;
  }

  /**
   * Step the recorded actions through a fresh environment, reseeding on the
   * same schedule the recorder used. A mismatch is reported, never thrown.
   */
  replay(artifact: RunArtifact): ReplayReport {
    const { spec } = artifact;
    return withEnvironment(() => this.openEnv(spec), (env) => {
      let observation = envCall("reset", () => env.reset(initialSeed(spec.seed))).observation;
      let totalReward = 0;
      let stepsReplayed = 0;
      const resets: EpisodeReset[] = [];

      for (let step = 0; step < artifact.actions.length; step++) {
        const action = artifact.actions[step] ?? 0;
        const result = envCall("step", () => env.step(action));
        stepsReplayed++;
        totalReward += result.reward;
        observation = result.observation;

        if (isDone(result)) {
          // Single-episode recordings stopped here without resetting.
          if (spec.single_episode) break;
          const seed = reseedAfterDone(spec.seed, step);
          observation = envCall("reset", () => env.reset(seed)).observation;
          resets.push({ step, seed, episode_id: resets.length + 1 });
        }
      }

      const actualHash = fingerprint(observation);
      const verdict = compareOutcome(artifact, { total_reward: totalReward, final_obs_hash: actualHash });
      // An episode that ends before the recorded actions run out has diverged.
      const deterministicSteps = stepsReplayed === artifact.actions.length;
      return {
        run_id: artifact.run_id,
        spec,
        steps: artifact.actions.length,
        steps_replayed: stepsReplayed,
        resets,
        expected_total_reward: artifact.total_reward,
        actual_total_reward: totalReward,
        expected_final_hash: artifact.final_obs_hash,
        actual_final_hash: actualHash,
        deterministic_reward: verdict.deterministic_reward,
        deterministic_hash: verdict.deterministic_hash,
        deterministic_steps: deterministicSteps,
        deterministic: verdict.deterministic && deterministicSteps,
      };
    });
  }
}
