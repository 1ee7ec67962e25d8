/**
 * Error hierarchy for the report pipeline. Every failure the CLI can report
 * carries a machine-readable code; scoring itself never throws.
 *
 *   Error
 *     └── ReportError
 *           ├── InputError   (INPUT_NOT_FOUND, INPUT_UNREADABLE, INPUT_MALFORMED)
 *           └── ConfigError  (CONFIG_INVALID)
 */

export type InputErrorCode = "INPUT_NOT_FOUND" | "INPUT_UNREADABLE" | "INPUT_MALFORMED";
export type ConfigErrorCode = "CONFIG_INVALID";
export type ReportErrorCode = InputErrorCode | ConfigErrorCode | "USAGE";

export class ReportError extends Error {
  constructor(
    message: string,
    public code: ReportErrorCode,
    public details: string[] = [],
  ) {
    super(message);
    this.name = "ReportError";
  }
}

/** The input batch could not be located, read or parsed. */
export class InputError extends ReportError {
  constructor(message: string, code: InputErrorCode, details: string[] = []) {
    super(message, code, details);
    this.name = "InputError";
  }
}

/** A thresholds file is malformed or its values contradict each other. */
export class ConfigError extends ReportError {
  constructor(message: string, details: string[] = []) {
    super(message, "CONFIG_INVALID", details);
    this.name = "ConfigError";
  }
}

export class UsageError extends ReportError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof ReportError) {
    return {
      code: error.code,
      error: error.message,
      ...(error.details.length > 0 ? { details: error.details } : {})
    };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}
