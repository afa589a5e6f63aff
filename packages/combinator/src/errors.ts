/**
 * Error Types
 *
 * Every failure the combinator reports carries a stable code and optional
 * context so callers can route it without matching on message text.
 *
 * - `ParseFailure` and `ClassificationRejection` are recovered locally:
 *   the input lands in the rejected list and the scan continues.
 * - `InvalidArgument` is fatal to the call that raised it.
 * - `ExportFailure` is recorded per combination; the batch continues.
 */

export const ErrorCodes = {
  PARSE_FAILURE: "PARSE_FAILURE",
  CLASSIFICATION_REJECTED: "CLASSIFICATION_REJECTED",
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  EXPORT_FAILURE: "EXPORT_FAILURE",
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error with code and context
 */
export class OutfitError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = "OutfitError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert to a JSON-serializable format
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause:
        this.cause instanceof Error
          ? { message: this.cause.message, stack: this.cause.stack }
          : undefined,
      stack: this.stack,
    };
  }
}

/**
 * A raw identifier that cannot be turned into a part descriptor.
 */
export class ParseFailure extends OutfitError {
  constructor(
    public readonly identifier: string,
    public readonly category: string,
    public readonly source: string,
    reason: string,
  ) {
    super(`Cannot parse "${identifier}": ${reason}`, ErrorCodes.PARSE_FAILURE, {
      identifier,
      category,
      source,
    });
    this.name = "ParseFailure";
  }
}

/**
 * A parsed descriptor that cannot be grouped by skeleton.
 */
export class ClassificationRejection extends OutfitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.CLASSIFICATION_REJECTED, context);
    this.name = "ClassificationRejection";
  }
}

export class InvalidArgument extends OutfitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_ARGUMENT, context);
    this.name = "InvalidArgument";
  }
}

/**
 * The host could not assemble or write one combination.
 */
export class ExportFailure extends OutfitError {
  constructor(
    public readonly combinationName: string,
    public readonly reason: string,
    cause?: Error,
  ) {
    super(
      `Export of ${combinationName} failed: ${reason}`,
      ErrorCodes.EXPORT_FAILURE,
      { combinationName },
      cause,
    );
    this.name = "ExportFailure";
  }
}

/**
 * Get a readable message from any thrown value
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
