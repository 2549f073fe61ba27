/**
 * Error taxonomy for the synthesis pipeline. Every error carries a stable
 * `code` and the HTTP status the routes answer with.
 */
export abstract class SynthesisError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller supplied unusable text (empty, too long) or settings. */
export class InvalidInputError extends SynthesisError {
  readonly code = "INVALID_INPUT";
  readonly statusCode = 400;
}

/** A request parameter is outside its allowed set or range. */
export class InvalidParameterError extends SynthesisError {
  readonly code = "INVALID_PARAMETER";
  readonly statusCode = 400;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
  }
}

/** The external speech model failed for one chunk; the whole job is aborted. */
export class SynthesisBackendError extends SynthesisError {
  readonly code = "SYNTHESIS_BACKEND";
  readonly statusCode = 502;

  constructor(
    readonly chunkIndex: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class FormatMismatchError extends SynthesisError {
  readonly code = "FORMAT_MISMATCH";
  readonly statusCode = 500;
}

export class NotFoundError extends SynthesisError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;
}

export function isSynthesisError(error: unknown): error is SynthesisError {
  return error instanceof SynthesisError;
}
