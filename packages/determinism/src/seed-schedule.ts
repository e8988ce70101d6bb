/**
 * Seed used for the reset that opens a run.
 */
export function initialSeed(baseSeed: number): number {
  assertSeed(baseSeed);
  return baseSeed;
}

/**
 * Seed for the reset that follows an episode ending at global step
 * `stepIndex` (0-based). Depends on when the episode ended, not on how many
 * episodes came before.
 */
export function reseedAfterDone(baseSeed: number, stepIndex: number): number {
  assertSeed(baseSeed);
  if (!Number.isInteger(stepIndex) || stepIndex < 0) {
    throw new RangeError(`Step index must be a non-negative integer, got ${stepIndex}`);
  }
  return baseSeed + stepIndex + 1;
}

export function isDone(result: { terminated: boolean; truncated: boolean }): boolean {
  return result.terminated || result.truncated;
}

function assertSeed(seed: number): void {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`Seed must be a safe integer, got ${seed}`);
  }
}
