export * from "./types.js";
export * from "./errors.js";
export { RunArtifactSchema } from "./run-artifact.schema.js";
export { RunEventSchema } from "./run-event.schema.js";
export {
  ARTIFACT_DEFAULTS,
  errorField,
  parseRunArtifact,
  validateRunArtifactData,
  validateRunEventData,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
