/**
 * Standard error classes for regsynth
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  SYNTAX_ERROR = "SYNTAX_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  GENERATION_FAULT = "GENERATION_FAULT",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class RegsynthError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RegsynthError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Pattern text does not follow the grammar
 */
export class PatternSyntaxError extends RegsynthError {
  constructor(
    reason: string,
    public readonly position: number,
    public readonly expected: string,
  ) {
    super(
      ErrorCode.SYNTAX_ERROR,
      `Syntax error at position ${position}: ${reason}`,
      { position, expected },
    );
    this.name = "PatternSyntaxError";
  }
}

/**
 * Pattern is well-formed but declares an invalid distribution or bound
 */
export class PatternValidationError extends RegsynthError {
  constructor(
    reason: string,
    public readonly position: number,
    public readonly construct: string,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.VALIDATION_ERROR,
      `Invalid ${construct} at position ${position}: ${reason}`,
      { position, construct },
      options,
    );
    this.name = "PatternValidationError";
  }
}

/**
 * A distribution constructor rejected its parameters
 */
export class DistributionError extends RegsynthError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.VALIDATION_ERROR, message, details);
    this.name = "DistributionError";
  }
}

/**
 * An invariant the parser guarantees did not hold at render time.
 * This is a defect, never a user error.
 */
export class GenerationFault extends RegsynthError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.GENERATION_FAULT, message, details);
    this.name = "GenerationFault";
  }
}

export class ConfigError extends RegsynthError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends RegsynthError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}
