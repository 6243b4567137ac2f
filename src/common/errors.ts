import type { FailureStage, MetricSummary } from "../types.js";

export type HarnessErrorCode =
  | "CONFIGURATION"
  | "INSUFFICIENT_DATA"
  | "DATA_SHAPE"
  | "FIT_FAILURE"
  | "PREDICT_FAILURE"
  | "METRIC_FAILURE"
  | "ALL_POINTS_FAILED"
  | "ABORTED";

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;

  constructor(code: HarnessErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid split, fold, grid or metric settings. Raised before any unit runs. */
export class ConfigurationError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}

export class InsufficientDataError extends HarnessError {
  constructor(message: string) {
    super("INSUFFICIENT_DATA", message);
  }
}

export class DataShapeError extends HarnessError {
  constructor(message: string) {
    super("DATA_SHAPE", message);
  }
}

export class FitFailure extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FIT_FAILURE", message, options);
  }
}

export class PredictFailure extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PREDICT_FAILURE", message, options);
  }
}

export class MetricFailure extends HarnessError {
  constructor(message: string) {
    super("METRIC_FAILURE", message);
  }
}

export class AllPointsFailedError extends HarnessError {
  readonly summaries: MetricSummary[];

  constructor(summaries: MetricSummary[]) {
    super(
      "ALL_POINTS_FAILED",
      `No hyperparameter point has a successful fold (points=${summaries.length}).`,
    );
    this.summaries = summaries;
  }
}

/**
 * Thrown when a run is cancelled. `partial` holds the summaries of every point
 * whose folds all finished before the signal fired.
 */
export class HarnessAbortedError extends HarnessError {
  readonly partial: MetricSummary[];

  constructor(partial: MetricSummary[]) {
    super("ABORTED", `Run aborted after ${partial.length} completed point(s).`);
    this.partial = partial;
  }
}

export function failureStageOf(error: unknown): FailureStage {
  if (error instanceof FitFailure) {
    return "fit";
  }
  if (error instanceof PredictFailure) {
    return "predict";
  }
  if (error instanceof MetricFailure) {
    return "metric";
  }
  return "preprocess";
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

export function isAbortError(value: unknown): boolean {
  return (
    value instanceof HarnessAbortedError ||
    (value instanceof Error && value.name === "AbortError")
  );
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) {
    return;
  }
  const error = new Error("Run aborted");
  error.name = "AbortError";
  throw error;
}
