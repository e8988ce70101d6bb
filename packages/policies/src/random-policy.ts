import { DeterministicRng } from "@tracelock/determinism";
import type { ActionPolicy, Observation, PolicyResetOptions } from "@tracelock/schemas";

export class RandomPolicy implements ActionPolicy {
  readonly name = "random";
  private rng: DeterministicRng | undefined;
  private actionCount = 0;

  reset(options: PolicyResetOptions): void {
    this.rng = new DeterministicRng(options.seed);
    this.actionCount = options.actionCount;
  }

  act(_step: number, _observation: Observation, _lastReward: number, _lastDone: boolean): number {
    if (!this.rng) throw new Error("RandomPolicy.act() called before reset()");
    return this.rng.nextInt(this.actionCount);
  }
}
