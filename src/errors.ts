import type { FieldKey } from "./types";

export type ScreeningErrorCode =
  | "ARTIFACT_LOAD_FAILED"
  | "VALIDATION_FAILED"
  | "PREDICTION_FAILED";

/**
 * Base class for the failures the page and API report to the user.
 *
 * Anything else reaching a handler is treated as an internal error.
 */
export class ScreeningError extends Error {
  readonly code: ScreeningErrorCode;

  constructor(
    code: ScreeningErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ScreeningError";
    this.code = code;
  }
}

/**
 * The model or scaler file is missing, unreadable, or not a valid export.
 */
export class ArtifactLoadError extends ScreeningError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("ARTIFACT_LOAD_FAILED", message, options);
    this.name = "ArtifactLoadError";
    this.path = path;
  }
}

export class ValidationError extends ScreeningError {
  readonly field: FieldKey;

  constructor(field: FieldKey, message: string) {
    super("VALIDATION_FAILED", message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * The scaler or model rejected the feature vector or returned something that
 * is not a two-class prediction. Deterministic, so never retried.
 */
export class PredictionError extends ScreeningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PREDICTION_FAILED", message, options);
    this.name = "PredictionError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
