import { EnvironmentFaultError, TracelockError } from "@tracelock/schemas";
import type { EnvAdapter, EnvironmentOperation, RunSpec } from "@tracelock/schemas";

/** Builds a fresh environment for a run; never returns a shared instance. */
export type EnvOpener = (spec: RunSpec) => EnvAdapter;

/**
 * Run one environment operation, surfacing simulator exceptions as
 * EnvironmentFaultError. Errors already in the taxonomy pass through.
 */
export function envCall<T>(operation: EnvironmentOperation, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof TracelockError) throw err;
    throw new EnvironmentFaultError(operation, err);
  }
}

/**
 * Open an environment, hand it to `body`, and close it exactly once on every
 * exit path. A close failure after `body` already threw is logged so the
 * original error is the one that propagates.
 */
export function withEnvironment<T>(open: () => EnvAdapter, body: (env: EnvAdapter) => T): T {
  const env = envCall("open", open);
  let failed = false;
  try {
    return body(env);
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    try {
      env.close();
    } catch (closeErr) {
      if (!failed) throw new EnvironmentFaultError("close", closeErr);
      console.error(`[tracelock] environment close failed after an earlier error:`, closeErr);
    }
  }
}

export function actionVocabulary(env: EnvAdapter): readonly string[] {
  return env.actionNames ?? Array.from({ length: env.actionCount }, (_, i) => String(i));
}
