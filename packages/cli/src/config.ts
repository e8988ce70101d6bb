import { ConfigurationError } from "@tracelock/schemas";

export interface TracelockConfig {
  runsDir: string;
  envKey: string;
  policy: string;
  journalFsync: boolean;
}

export const DEFAULT_CONFIG: TracelockConfig = {
  runsDir: "runs",
  envKey: "maze",
  policy: "sticky_dir",
  journalFsync: true,
};

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Reads TRACELOCK_* variables; CLI flags override the result. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TracelockConfig {
  const fsyncFlag = nonEmpty(env.TRACELOCK_JOURNAL_FSYNC)?.toLowerCase();
  return {
    runsDir: nonEmpty(env.TRACELOCK_RUNS_DIR) ?? DEFAULT_CONFIG.runsDir,
    envKey: nonEmpty(env.TRACELOCK_ENV) ?? DEFAULT_CONFIG.envKey,
    policy: nonEmpty(env.TRACELOCK_POLICY) ?? DEFAULT_CONFIG.policy,
    journalFsync: fsyncFlag === undefined ? DEFAULT_CONFIG.journalFsync : fsyncFlag !== "0" && fsyncFlag !== "false",
  };
}

export function parseInteger(value: string, label: string, min = Number.MIN_SAFE_INTEGER): number {
  const trimmed = value.trim();
  const n = Number(trimmed);
  if (!/^[+-]?\d+$/.test(trimmed) || !Number.isSafeInteger(n) || n < min) {
    const bound = min === Number.MIN_SAFE_INTEGER ? "an integer" : min === 0 ? "a non-negative integer" : `an integer >= ${min}`;
    throw new ConfigurationError(`Invalid ${label}: "${value}" (must be ${bound})`);
  }
  return n;
}

export function parseProbability(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new ConfigurationError(`Invalid ${label}: "${value}" (must be a number within [0, 1])`);
  }
  return n;
}
