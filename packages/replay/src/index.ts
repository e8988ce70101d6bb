export { RunRecorder, generateRunId, validateRunSpec } from "./recorder.js";
export type { RunRecorderConfig } from "./recorder.js";
export { RunReplayer, compareOutcome, REWARD_TOLERANCE } from "./replayer.js";
export type { OutcomeComparison, RunReplayerConfig } from "./replayer.js";
export { withEnvironment, envCall, actionVocabulary } from "./env-session.js";
export type { EnvOpener } from "./env-session.js";
export {
  RunStore,
  loadRunArtifact,
  loadTelemetry,
  serializeRunArtifact,
  ARTIFACT_FILE,
  TELEMETRY_FILE,
  JOURNAL_FILE,
} from "./run-store.js";
export {
  TELEMETRY_COLUMNS,
  formatTelemetryCsv,
  formatTelemetryRow,
  numericCell,
  parseTelemetryCsv,
  summarizeTelemetry,
} from "./telemetry.js";
export type { EpisodeSummary, TelemetryRecord, TelemetrySummary } from "./telemetry.js";
export { captureFrames, encodePpm, frameFileName, writeFrames } from "./frames.js";
export type { CaptureOptions, CapturedFrame } from "./frames.js";
