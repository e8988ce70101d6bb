import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { ObservationShapeError } from "@tracelock/schemas";
import { encodeObservation, fingerprint } from "./fingerprint.js";

describe("fingerprint", () => {
  it("is stable for the same observation", () => {
    const obs = { shape: [3], data: new Float64Array([1, 2, 3]) };
    expect(fingerprint(obs)).toBe(fingerprint(obs));
    expect(fingerprint(obs)).toBe(fingerprint({ shape: [3], data: new Float64Array([1, 2, 3]) }));
  });

  it("is a 64-char lowercase hex digest", () => {
    const hash = fingerprint({ shape: [2, 3], data: new Uint8Array([1, 2, 3, 4, 5, 6]) });
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when a single byte changes", () => {
    const a = fingerprint({ shape: [2, 3], data: new Uint8Array([0, 128, 255, 64, 32, 16]) });
    const b = fingerprint({ shape: [2, 3], data: new Uint8Array([0, 128, 255, 64, 32, 17]) });
    expect(a).not.toBe(b);
  });

  it("changes when only the shape changes", () => {
    const bytes = [1, 2, 3, 4, 5, 6];
    const flat = fingerprint({ shape: [6], data: new Uint8Array(bytes) });
    const row = fingerprint({ shape: [1, 6], data: new Uint8Array(bytes) });
    const grid = fingerprint({ shape: [2, 3], data: new Uint8Array(bytes) });
    const transposed = fingerprint({ shape: [3, 2], data: new Uint8Array(bytes) });
    expect(new Set([flat, row, grid, transposed]).size).toBe(4);
  });

  it("hashes the documented canonical encoding", () => {
    const obs = { shape: [2], data: new Uint8Array([7, 9]) };
    const expected = Buffer.from([
      2, 0, 0, 0,
      2, 0, 0, 0,
      2, 0, 0, 0, 0, 0, 0, 0,
      7, 9,
    ]);
    expect(encodeObservation(obs).equals(expected)).toBe(true);
    expect(fingerprint(obs)).toBe(createHash("sha256").update(expected).digest("hex"));
  });

  it("encodes only the viewed region of a sliced typed array", () => {
    const backing = new Uint8Array([9, 9, 1, 2, 3, 9]);
    const view = backing.subarray(2, 5);
    expect(fingerprint({ shape: [3], data: view })).toBe(fingerprint({ shape: [3], data: new Uint8Array([1, 2, 3]) }));
  });

  it("rejects a shape that does not match the data", () => {
    expect(() => fingerprint({ shape: [2, 2], data: new Uint8Array(3) })).toThrow(ObservationShapeError);
    expect(() => fingerprint({ shape: [-1], data: new Uint8Array(0) })).toThrow("Invalid observation dimension -1");
  });
});
