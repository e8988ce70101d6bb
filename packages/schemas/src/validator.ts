import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { RunArtifactSchema } from "./run-artifact.schema.js";
import { RunEventSchema } from "./run-event.schema.js";
import { ArtifactFormatError } from "./errors.js";
import type { ObsType, RunArtifact, RunSpec } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateRunArtifact = ajv.compile(RunArtifactSchema);
const validateRunEvent = ajv.compile(RunEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Defaults substituted when an older artifact omits a spec field. */
export const ARTIFACT_DEFAULTS = {
  frameskip: 4,
  repeat_action_probability: 0.0,
  single_episode: false,
  obs_type: "pixels",
  env_key: "n/a",
  policy: "n/a",
} as const;

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

/** "/spec/seed" → "spec.seed"; a missing property is appended to its parent path. */
export function errorField(error: ErrorObject): string {
  const segments = error.instancePath.split("/").filter(Boolean);
  const missing: unknown = error.params["missingProperty"];
  if (error.keyword === "required" && typeof missing === "string") {
    segments.push(missing);
  }
  return segments.length > 0 ? segments.join(".") : "(root)";
}

export function validateRunArtifactData(data: unknown): ValidationResult {
  const valid = validateRunArtifact(data);
  return toResult(valid, validateRunArtifact.errors);
}

export function validateRunEventData(data: unknown): ValidationResult {
  const valid = validateRunEvent(data);
  return toResult(valid, validateRunEvent.errors);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick<T>(source: Record<string, unknown>, key: string, guard: (v: unknown) => v is T, fallback: T): T {
  const value = source[key];
  return guard(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isObsType = (v: unknown): v is ObsType => v === "pixels" || v === "state";
const isIntegerArray = (v: unknown): v is number[] => Array.isArray(v) && v.every((x) => Number.isInteger(x));

/**
 * Validate a decoded run.json and fill documented defaults for optional
 * fields. Throws ArtifactFormatError naming the first offending field.
 *
 * @param fallbackRunId used when the artifact predates `run_id`
 */
export function parseRunArtifact(data: unknown, fallbackRunId = "unknown"): RunArtifact {
  if (!validateRunArtifact(data)) {
    const first = validateRunArtifact.errors?.[0];
    if (!first) throw new ArtifactFormatError("(root)", "validation failed");
    throw new ArtifactFormatError(errorField(first), first.message ?? "invalid value");
  }
  if (!isRecord(data) || !isRecord(data.spec)) {
    throw new ArtifactFormatError("spec", "must be an object");
  }
  const raw = data.spec;
  const actions = pick(data, "actions", isIntegerArray, []);

  const spec: RunSpec = {
    env_key: pick(raw, "env_key", isString, ARTIFACT_DEFAULTS.env_key),
    env_id: pick(raw, "env_id", isString, ""),
    obs_type: pick(raw, "obs_type", isObsType, ARTIFACT_DEFAULTS.obs_type),
    seed: pick(raw, "seed", isNumber, 0),
    steps: pick(raw, "steps", isNumber, actions.length),
    policy: pick(raw, "policy", isString, ARTIFACT_DEFAULTS.policy),
    frameskip: pick(raw, "frameskip", isNumber, ARTIFACT_DEFAULTS.frameskip),
    repeat_action_probability: pick(raw, "repeat_action_probability", isNumber, ARTIFACT_DEFAULTS.repeat_action_probability),
    single_episode: pick(raw, "single_episode", isBoolean, ARTIFACT_DEFAULTS.single_episode),
  };

  return {
    run_id: pick(data, "run_id", isString, fallbackRunId),
    created_unix_s: pick(data, "created_unix_s", isNumber, 0),
    spec,
    actions,
    total_reward: pick(data, "total_reward", isNumber, 0),
    final_obs_hash: pick(data, "final_obs_hash", isString, ""),
  };
}
