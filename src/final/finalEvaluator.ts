import { confusionTable } from "../metrics/classification.js";
import type { ModelPlugin } from "../models/types.js";
import type { PipelineState } from "../preprocess/pipeline.js";
import { pointKey } from "../tuning/grid.js";
import { fitAndScore, type EvaluationContext } from "../tuning/resampleEvaluator.js";
import type { FinalReport, HyperparameterPoint, Partition } from "../types.js";

export interface FinalizeOptions {
  plugin: ModelPlugin;
  point: HyperparameterPoint;
  train: Partition;
  test: Partition;
  context: EvaluationContext;
}

export interface FinalEvaluation {
  report: FinalReport;
  /** The model fitted on the whole train partition. */
  fitted: unknown;
  pipeline: PipelineState;
}

/**
 * Refits the pipeline and the model once on the whole train partition and
 * scores the test partition once. Unlike tuning, any failure here propagates.
 */
export async function finalize(options: FinalizeOptions): Promise<FinalEvaluation> {
  const { plugin, point, train, test, context } = options;
  const outcome = await fitAndScore(plugin, point, train, test, context);
  return {
    report: {
      point,
      pointKey: pointKey(point),
      trainSize: train.length,
      testSize: test.length,
      metrics: outcome.metrics,
      confusion: confusionTable(outcome.predicted, outcome.actual, context.labels),
    },
    fitted: outcome.fitted,
    pipeline: outcome.pipeline,
  };
}
