export type ErrorCode =
  | "VALIDATION_FAILED"
  | "MISSING_TASK_ID"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_TEMPLATE"
  | "BATCH_IN_PROGRESS"
  | "PARSE_FAILED"
  | "CONFIG_INVALID";

export class RunnerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RunnerError";
    this.code = code;
  }
}

/** A task definition or task file failed validation. */
export class ValidationError extends RunnerError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ValidationError";
  }
}

export class ConfigError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

/** Input that is not valid JSON. */
export class ParseError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
