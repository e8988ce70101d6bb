import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { initialSeed, isDone, reseedAfterDone } from "@tracelock/determinism";
import { ConfigurationError } from "@tracelock/schemas";
import type { EnvAdapter, RgbFrame, RunArtifact } from "@tracelock/schemas";
import { envCall, withEnvironment } from "./env-session.js";
import type { EnvOpener } from "./env-session.js";

export interface CaptureOptions {
  /** Keep every n-th frame index. */
  captureEvery?: number;
  maxFrames?: number;
}

export interface CapturedFrame {
  index: number;
  frame: RgbFrame;
}

function validateCaptureOptions(options: CaptureOptions): { captureEvery: number; maxFrames: number } {
  const captureEvery = options.captureEvery ?? 1;
  if (!Number.isInteger(captureEvery) || captureEvery < 1) {
    throw new ConfigurationError(`Invalid capture interval: ${captureEvery} (must be a positive integer)`);
  }
  const maxFrames = options.maxFrames ?? Number.POSITIVE_INFINITY;
  if (options.maxFrames !== undefined && (!Number.isInteger(maxFrames) || maxFrames < 1)) {
    throw new ConfigurationError(`Invalid max frames: ${options.maxFrames} (must be a positive integer)`);
  }
  return { captureEvery, maxFrames };
}

function renderFrom(env: EnvAdapter): () => RgbFrame | null {
  const render = env.renderRgb?.bind(env);
  if (!render) {
    throw new ConfigurationError(`Environment ${env.envId} cannot render RGB frames`);
  }
  return () => envCall("render", render);
}

/**
 * Replay an artifact and collect rendered frames. Index 0 is the initial
 * reset, index k + 1 follows step k, and a mid-run reset adds index k + 2.
 */
export function captureFrames(
  artifact: RunArtifact,
  openEnv: EnvOpener,
  options: CaptureOptions = {},
): CapturedFrame[] {
  const { captureEvery, maxFrames } = validateCaptureOptions(options);
  const { spec } = artifact;

  const frames = withEnvironment(() => openEnv(spec), (env) => {
    const render = renderFrom(env);
    const held: CapturedFrame[] = [];
    const capture = (index: number): void => {
      if (index % captureEvery !== 0 || held.length >= maxFrames) return;
      const frame = render();
      if (frame) held.push({ index, frame });
    };

    envCall("reset", () => env.reset(initialSeed(spec.seed)));
    capture(0);

    for (let step = 0; step < artifact.actions.length; step++) {
      if (held.length >= maxFrames) break;
      const action = artifact.actions[step] ?? 0;
      const result = envCall("step", () => env.step(action));
      capture(step + 1);
      if (isDone(result)) {
        if (spec.single_episode) break;
        envCall("reset", () => env.reset(reseedAfterDone(spec.seed, step)));
        capture(step + 2);
      }
    }
    return held;
  });

  if (frames.length === 0) {
    throw new ConfigurationError("No frames captured; check --capture-every and --max-frames");
  }
  return frames;
}

/** Binary PPM (P6) image. */
export function encodePpm(frame: RgbFrame): Buffer {
  const expected = frame.width * frame.height * 3;
  if (frame.data.length !== expected) {
    throw new ConfigurationError(
      `Frame data has ${frame.data.length} bytes, expected ${expected} for ${frame.width}x${frame.height} RGB`,
    );
  }
  const header = Buffer.from(`P6\n${frame.width} ${frame.height}\n255\n`, "ascii");
  return Buffer.concat([header, frame.data]);
}

export function frameFileName(position: number): string {
  return `frame-${String(position).padStart(6, "0")}.ppm`;
}

/** Writes frames in capture order; returns the written paths. */
export async function writeFrames(frames: readonly CapturedFrame[], outDir: string): Promise<string[]> {
  await mkdir(outDir, { recursive: true });
  const paths: string[] = [];
  for (const [position, { frame }] of frames.entries()) {
    const filePath = join(outDir, frameFileName(position));
    await writeFile(filePath, encodePpm(frame));
    paths.push(filePath);
  }
  return paths;
}
