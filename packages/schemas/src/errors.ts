export type TracelockErrorCode = "CONFIGURATION" | "ENVIRONMENT_FAULT" | "ARTIFACT_FORMAT";

export class TracelockError extends Error {
  readonly code: TracelockErrorCode;

  constructor(code: TracelockErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "TracelockError";
  }
}

/** Bad input detected before any environment is opened. */
export class ConfigurationError extends TracelockError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export class UnknownEnvironmentError extends ConfigurationError {
  readonly valid: readonly string[];

  constructor(kind: "key" | "id", value: string, valid: readonly string[]) {
    super(`Unknown env ${kind} '${value}'. Valid: ${valid.join(", ")}`);
    this.name = "UnknownEnvironmentError";
    this.valid = valid;
  }
}

export class UnknownPolicyError extends ConfigurationError {
  readonly valid: readonly string[];

  constructor(name: string, valid: readonly string[]) {
    super(`Unknown policy '${name}'. Valid: ${valid.join(", ")}`);
    this.name = "UnknownPolicyError";
    this.valid = valid;
  }
}

export class ObservationShapeError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = "ObservationShapeError";
  }
}

export type EnvironmentOperation = "open" | "reset" | "step" | "close" | "render";

/** The simulator raised during an operation. Never retried. */
export class EnvironmentFaultError extends TracelockError {
  readonly operation: EnvironmentOperation;

  constructor(operation: EnvironmentOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("ENVIRONMENT_FAULT", `Environment ${operation} failed: ${detail}`, { cause });
    this.name = "EnvironmentFaultError";
    this.operation = operation;
  }
}

export class ArtifactFormatError extends TracelockError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("ARTIFACT_FORMAT", `Invalid run artifact field '${field}': ${message}`);
    this.name = "ArtifactFormatError";
    this.field = field;
  }
}
