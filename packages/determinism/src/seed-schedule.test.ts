import { describe, it, expect } from "vitest";
import { initialSeed, isDone, reseedAfterDone } from "./seed-schedule.js";

describe("seed schedule", () => {
  it("uses the base seed unmodified for the first reset", () => {
    expect(initialSeed(123)).toBe(123);
    expect(initialSeed(0)).toBe(0);
  });

  it("reseeds with base + k + 1 for every done step k", () => {
    for (const base of [0, 42, 123, 2 ** 40]) {
      for (const k of [0, 1, 17, 499, 4999]) {
        expect(reseedAfterDone(base, k)).toBe(base + k + 1);
      }
    }
  });

  it("depends on when the episode ended, not how many came before", () => {
    expect(reseedAfterDone(10, 5)).toBe(16);
    expect(reseedAfterDone(10, 5)).toBe(reseedAfterDone(10, 5));
    expect(reseedAfterDone(10, 6)).not.toBe(reseedAfterDone(10, 5));
  });

  it("rejects invalid step indexes and seeds", () => {
    expect(() => reseedAfterDone(1, -1)).toThrow("non-negative integer");
    expect(() => reseedAfterDone(1, 1.5)).toThrow("non-negative integer");
    expect(() => initialSeed(0.5)).toThrow("safe integer");
  });

  it("treats either terminated or truncated as done", () => {
    expect(isDone({ terminated: true, truncated: false })).toBe(true);
    expect(isDone({ terminated: false, truncated: true })).toBe(true);
    expect(isDone({ terminated: false, truncated: false })).toBe(false);
  });
});
