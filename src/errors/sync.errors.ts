import { AppError } from "./app.error";

/**
 * Who caused a failure: the caller (bad input), a dependency
 * (ShotGrid / FileMaker), or this service itself.
 */
export type ErrorKind = "client" | "dependency" | "internal";

export type SyncErrorCode =
  | "VALIDATION_ERROR"
  | "CONFIGURATION_ERROR"
  | "UPSTREAM_QUERY_ERROR"
  | "SESSION_ACQUISITION_ERROR"
  | "TRANSFORM_ERROR"
  | "SUBMISSION_ERROR"
  | "SESSION_RELEASE_ERROR";

export interface SyncErrorBody {
  code: SyncErrorCode;
  message: string;
  kind: ErrorKind;
  attempted?: number;
}

/**
 * Base class for every failure of the plate sync pipeline.
 */
export abstract class SyncError extends AppError {
  abstract readonly code: SyncErrorCode;
  abstract readonly kind: ErrorKind;

  constructor(statusCode: number, message: string, cause?: unknown) {
    super(statusCode, message);
    this.name = new.target.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SyncErrorBody {
    return { code: this.code, message: this.message, kind: this.kind };
  }
}

export class ValidationError extends SyncError {
  readonly code = "VALIDATION_ERROR";
  readonly kind = "client";

  constructor(
    message: string,
    public readonly details: { field: string; message: string }[] = [],
  ) {
    super(400, message);
  }
}

export class ConfigurationError extends SyncError {
  readonly code = "CONFIGURATION_ERROR";
  readonly kind = "internal";

  constructor(message: string) {
    super(500, message);
  }
}

/** ShotGrid unreachable, rejected the query, or answered with garbage. */
export class UpstreamQueryError extends SyncError {
  readonly code = "UPSTREAM_QUERY_ERROR";
  readonly kind = "dependency";

  constructor(message: string, cause?: unknown) {
    super(502, message, cause);
  }
}

export class SessionAcquisitionError extends SyncError {
  readonly code = "SESSION_ACQUISITION_ERROR";
  readonly kind = "dependency";

  constructor(message: string, cause?: unknown) {
    super(502, message, cause);
  }
}

/** Field-local; caught by the record builder and never surfaced. */
export class TransformError extends SyncError {
  readonly code = "TRANSFORM_ERROR";
  readonly kind = "internal";

  constructor(
    public readonly sourceFieldCode: string,
    cause?: unknown,
  ) {
    super(
      500,
      `Transform failed for field ${sourceFieldCode}: ${describeError(cause)}`,
      cause,
    );
  }
}

export class SubmissionError extends SyncError {
  readonly code = "SUBMISSION_ERROR";
  readonly kind = "dependency";

  constructor(
    message: string,
    public readonly attempted: number,
    cause?: unknown,
  ) {
    super(502, message, cause);
  }

  toJSON(): SyncErrorBody {
    return { ...super.toJSON(), attempted: this.attempted };
  }
}

/** Logged only; never changes the reported result. */
export class SessionReleaseError extends SyncError {
  readonly code = "SESSION_RELEASE_ERROR";
  readonly kind = "dependency";

  constructor(message: string, cause?: unknown) {
    super(502, message, cause);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
