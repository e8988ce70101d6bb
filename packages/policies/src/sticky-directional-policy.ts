import { DeterministicRng } from "@tracelock/determinism";
import { ConfigurationError } from "@tracelock/schemas";
import type { ActionPolicy, Observation, PolicyResetOptions } from "@tracelock/schemas";

export const DIRECTION_NAMES = ["UP", "RIGHT", "DOWN", "LEFT"] as const;

export interface StickyDirectionalOptions {
  /** Non-rewarding steps tolerated before rotating to the next direction. */
  stuckWindow?: number;
  /** Per-step chance of jumping to a random direction. */
  jitterProb?: number;
}

/**
 * Scripted policy that commits to a direction until it stops paying off.
 *
 * Holds the current direction, counts steps without a positive reward and
 * rotates cyclically once the count reaches `stuckWindow`. A jitter draw on
 * every non-terminal step occasionally jumps to a random direction instead.
 * It does not try to play well.
 */
export class StickyDirectionalPolicy implements ActionPolicy {
  readonly name = "sticky_dir";
  readonly stuckWindow: number;
  readonly jitterProb: number;

  private rng: DeterministicRng | undefined;
  private directions: number[] = [];
  private currentIndex = 0;
  private stepsSinceProgress = 0;

  constructor(options: StickyDirectionalOptions = {}) {
    this.stuckWindow = options.stuckWindow ?? 30;
    this.jitterProb = options.jitterProb ?? 0.02;
    if (!Number.isInteger(this.stuckWindow) || this.stuckWindow < 1) {
      throw new ConfigurationError(`Invalid stuck window: ${this.stuckWindow} (must be a positive integer)`);
    }
    if (!(this.jitterProb >= 0 && this.jitterProb <= 1)) {
      throw new ConfigurationError(`Invalid jitter probability: ${this.jitterProb} (must be within [0, 1])`);
    }
  }

  reset(options: PolicyResetOptions): void {
    this.rng = new DeterministicRng(options.seed);
    this.directions = resolveDirections(options.actionNames, options.actionCount);
    this.currentIndex = 0;
    this.stepsSinceProgress = 0;
  }

  get currentDirection(): number {
    return this.directions[this.currentIndex] ?? 0;
  }

  get directionSet(): readonly number[] {
    return this.directions;
  }

  act(_step: number, _observation: Observation, lastReward: number, lastDone: boolean): number {
    const rng = this.rng;
    if (!rng) throw new Error("StickyDirectionalPolicy.act() called before reset()");

    if (lastDone) {
      this.stepsSinceProgress = 0;
      return this.currentDirection;
    }

    if (lastReward > 0) {
      this.stepsSinceProgress = 0;
    } else {
      this.stepsSinceProgress++;
    }

    if (rng.nextFloat() < this.jitterProb) {
      this.currentIndex = rng.nextInt(this.directions.length);
      this.stepsSinceProgress = 0;
      return this.currentDirection;
    }

    if (this.stepsSinceProgress >= this.stuckWindow) {
      this.currentIndex = (this.currentIndex + 1) % this.directions.length;
      this.stepsSinceProgress = 0;
    }

    return this.currentDirection;
  }
}

/**
 * Indices of UP/RIGHT/DOWN/LEFT in that order, or the first (at most four)
 * actions when the vocabulary names none of them.
 */
export function resolveDirections(actionNames: readonly string[], actionCount: number): number[] {
  if (!Number.isInteger(actionCount) || actionCount < 1) {
    throw new ConfigurationError(`Invalid action count: ${actionCount} (must be a positive integer)`);
  }
  const found: number[] = [];
  for (const name of DIRECTION_NAMES) {
    const index = actionNames.indexOf(name);
    if (index !== -1 && index < actionCount) found.push(index);
  }
  if (found.length > 0) return found;
  return Array.from({ length: Math.min(4, actionCount) }, (_, i) => i);
}
