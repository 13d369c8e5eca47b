export const ExitCode = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  USAGE: 2,
  FILE_NOT_FOUND: 3,
  INVALID_INPUT: 4,
  SHUFFLE_FAILED: 5,
  WRITE_FAILED: 6
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export const ErrorCode = {
  UNEXPECTED: "unexpected_error",
  USAGE: "usage_error",
  FILE_NOT_FOUND: "file_not_found",
  INVALID_INPUT: "invalid_input",
  SHUFFLE_FAILED: "shuffle_failed",
  WRITE_FAILED: "write_failed"
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export type StructuredError = {
  error: {
    code: ErrorCodeValue;
    message: string;
    exitCode: ExitCodeValue;
    details?: Record<string, unknown>;
    cause?: string;
  };
};

export type ScrambleErrorOptions = {
  details?: Record<string, unknown>;
  cause?: unknown;
};

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * Base class for every failure the run reports. `label` is the prefix used
 * when the runner logs the error.
 */
export class ScrambleError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: ExitCodeValue;
  readonly label: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCodeValue,
    exitCode: ExitCodeValue,
    label: string,
    options: ScrambleErrorOptions = {}
  ) {
    super(message);
    this.name = "ScrambleError";
    this.code = code;
    this.exitCode = exitCode;
    this.label = label;
    this.details = options.details;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toJSON(): StructuredError {
    return {
      error: {
        code: this.code,
        message: this.message,
        exitCode: this.exitCode,
        ...(this.details && { details: this.details }),
        ...(this.cause !== undefined && { cause: describeCause(this.cause) })
      }
    };
  }
}

export class UsageError extends ScrambleError {
  constructor(message: string, options: ScrambleErrorOptions = {}) {
    super(message, ErrorCode.USAGE, ExitCode.USAGE, "Usage error", options);
    this.name = "UsageError";
  }
}

export class FileNotFoundError extends ScrambleError {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, ExitCode.FILE_NOT_FOUND, "File error", {
      details: { path }
    });
    this.name = "FileNotFoundError";
    this.path = path;
  }
}

export class InvalidInputError extends ScrambleError {
  constructor(message: string, options: ScrambleErrorOptions = {}) {
    super(message, ErrorCode.INVALID_INPUT, ExitCode.INVALID_INPUT, "Input error", options);
    this.name = "InvalidInputError";
  }

  static noColumns(): InvalidInputError {
    return new InvalidInputError("No columns provided to scramble.");
  }

  static emptyFile(path: string, cause?: unknown): InvalidInputError {
    return new InvalidInputError(`CSV file is empty: ${path}`, { details: { path }, cause });
  }

  static columnOutOfRange(column: number, path: string, columnCount: number): InvalidInputError {
    return new InvalidInputError(`Column index ${column} is out of range for file ${path}.`, {
      details: { column, path, columnCount }
    });
  }

  static wrap(cause: unknown): InvalidInputError {
    return new InvalidInputError(`Error validating file or columns. Details ${describeCause(cause)}`, {
      cause
    });
  }
}

export class ShuffleError extends ScrambleError {
  constructor(message: string, options: ScrambleErrorOptions = {}) {
    super(message, ErrorCode.SHUFFLE_FAILED, ExitCode.SHUFFLE_FAILED, "Scramble error", options);
    this.name = "ShuffleError";
  }
}

export class WriteError extends ScrambleError {
  constructor(path: string, cause: unknown) {
    super(
      `Could not write ${path}: ${describeCause(cause)}`,
      ErrorCode.WRITE_FAILED,
      ExitCode.WRITE_FAILED,
      "Write error",
      { details: { path }, cause }
    );
    this.name = "WriteError";
  }
}

export const toScrambleError = (error: unknown): ScrambleError => {
  if (error instanceof ScrambleError) {
    return error;
  }
  return new ScrambleError(
    describeCause(error),
    ErrorCode.UNEXPECTED,
    ExitCode.UNEXPECTED,
    "An unexpected error occurred",
    { cause: error }
  );
};
