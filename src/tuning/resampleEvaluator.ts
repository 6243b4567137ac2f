import {
  FitFailure,
  MetricFailure,
  PredictFailure,
  failureStageOf,
  stringifyError,
} from "../common/errors.js";
import { isFiniteNumber } from "../common/math.js";
import { labelsAt, toFeatureMatrix } from "../data/dataset.js";
import { METRICS, computeMetrics } from "../metrics/classification.js";
import type { ModelPlugin } from "../models/types.js";
import { applyPipeline, fitPipeline, type PipelineState } from "../preprocess/pipeline.js";
import type { PreprocessStep } from "../preprocess/steps.js";
import type {
  Dataset,
  Fold,
  HyperparameterPoint,
  Label,
  MetricName,
  MetricRecord,
  Partition,
} from "../types.js";

export interface EvaluationContext {
  dataset: Dataset;
  featureNames: readonly string[];
  /** Every label of the dataset, sorted. */
  labels: readonly Label[];
  positiveLabel: Label;
  steps: readonly PreprocessStep[];
  metrics: readonly MetricName[];
}

export interface WorkItem {
  point: HyperparameterPoint;
  pointKey: string;
  fold: Fold;
}

export interface UnitOutcome {
  pipeline: PipelineState;
  fitted: unknown;
  predicted: Label[];
  actual: Label[];
  scores?: number[];
  metrics: Partial<Record<MetricName, number>>;
}

function validatePredictions(predicted: unknown, expected: number, labels: readonly Label[]): Label[] {
  if (!Array.isArray(predicted) || predicted.length !== expected) {
    throw new PredictFailure(
      `predict returned ${Array.isArray(predicted) ? predicted.length : typeof predicted} values for ${expected} rows.`,
    );
  }
  const known = new Set(labels);
  return predicted.map((value, row) => {
    if (typeof value !== "string" || !known.has(value)) {
      throw new PredictFailure(`predict returned unknown label ${JSON.stringify(value)} at row ${row}.`);
    }
    return value;
  });
}

async function positiveScores(
  plugin: ModelPlugin,
  fitted: unknown,
  rows: readonly (readonly number[])[],
  positiveLabel: Label,
): Promise<number[]> {
  if (!plugin.predictProbabilities) {
    throw new PredictFailure(`Model "${plugin.kind}" does not provide probabilities.`);
  }
  let probabilities: unknown;
  try {
    probabilities = await plugin.predictProbabilities(fitted, rows);
  } catch (error) {
    throw new PredictFailure(`predictProbabilities failed: ${stringifyError(error)}`, { cause: error });
  }
  if (!Array.isArray(probabilities) || probabilities.length !== rows.length) {
    throw new PredictFailure(`predictProbabilities returned the wrong number of rows.`);
  }
  return probabilities.map((entry: unknown, row) => {
    // A row without the positive label gives it probability 0.
    const score =
      entry && typeof entry === "object" ? Reflect.get(entry, positiveLabel) ?? 0 : undefined;
    if (!isFiniteNumber(score)) {
      throw new PredictFailure(
        `predictProbabilities row ${row} is not an object or its "${positiveLabel}" score is not finite.`,
      );
    }
    return score;
  });
}

/**
 * Fits the pipeline and the model on `train` only, then scores `evaluate`.
 * Errors carry the stage they came from.
 */
export async function fitAndScore(
  plugin: ModelPlugin,
  point: HyperparameterPoint,
  train: Partition,
  evaluate: Partition,
  context: EvaluationContext,
): Promise<UnitOutcome> {
  const trainMatrix = toFeatureMatrix(context.dataset, train, context.featureNames);
  const pipeline = fitPipeline(context.steps, trainMatrix);
  const trainRows = applyPipeline(pipeline, trainMatrix).rows;
  const evalRows = applyPipeline(pipeline, toFeatureMatrix(context.dataset, evaluate, context.featureNames)).rows;

  let fitted: unknown;
  try {
    const handle = plugin.create(point);
    fitted = await plugin.fit(handle, trainRows, labelsAt(context.dataset, train));
  } catch (error) {
    if (error instanceof FitFailure) {
      throw error;
    }
    throw new FitFailure(`${plugin.kind} fit failed: ${stringifyError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = await plugin.predict(fitted, evalRows);
  } catch (error) {
    if (error instanceof PredictFailure) {
      throw error;
    }
    throw new PredictFailure(`${plugin.kind} predict failed: ${stringifyError(error)}`, { cause: error });
  }
  const predicted = validatePredictions(raw, evalRows.length, context.labels);
  const actual = labelsAt(context.dataset, evaluate);

  const needsScores = context.metrics.some((name) => METRICS[name].needsScores);
  const scores = needsScores
    ? await positiveScores(plugin, fitted, evalRows, context.positiveLabel)
    : undefined;

  let metrics: Partial<Record<MetricName, number>>;
  try {
    metrics = computeMetrics(context.metrics, {
      predicted,
      actual,
      labels: context.labels,
      positiveLabel: context.positiveLabel,
      scores,
    });
  } catch (error) {
    if (error instanceof MetricFailure) {
      throw error;
    }
    throw new MetricFailure(stringifyError(error));
  }

  return { pipeline, fitted, predicted, actual, scores, metrics };
}

/**
 * Evaluates one (point, fold) unit. Never throws: a failure becomes a record
 * with `ok: false` and the stage that failed.
 */
export async function evaluateUnit(
  plugin: ModelPlugin,
  item: WorkItem,
  context: EvaluationContext,
): Promise<MetricRecord> {
  try {
    const outcome = await fitAndScore(plugin, item.point, item.fold.train, item.fold.heldOut, context);
    return {
      foldIndex: item.fold.index,
      point: item.point,
      pointKey: item.pointKey,
      ok: true,
      metrics: outcome.metrics,
    };
  } catch (error) {
    return {
      foldIndex: item.fold.index,
      point: item.point,
      pointKey: item.pointKey,
      ok: false,
      metrics: {},
      failure: {
        stage: failureStageOf(error),
        message: stringifyError(error),
      },
    };
  }
}
