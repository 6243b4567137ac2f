export {
  AllPointsFailedError,
  ConfigurationError,
  DataShapeError,
  FitFailure,
  HarnessAbortedError,
  HarnessError,
  InsufficientDataError,
  MetricFailure,
  PredictFailure,
} from "./common/errors.js";
export { createRng, deriveSeed, shuffleInPlace } from "./common/random.js";
export { HarnessConfigSchema, parseHarnessConfig, type HarnessConfig } from "./config.js";
export { describeDataset, parseDataset, toFeatureMatrix } from "./data/dataset.js";
export { finalize, type FinalEvaluation } from "./final/finalEvaluator.js";
export { runHarness, type HarnessOptions, type HarnessResult } from "./harness.js";
export { Logger, type LoggerOptions } from "./logger.js";
export { METRICS, computeMetrics, confusionTable, type MetricInput } from "./metrics/classification.js";
export { createModelRegistry, defaultModelRegistry, type ModelRegistry } from "./models/registry.js";
export type { ClassProbabilities, FeatureRows, ModelPlugin } from "./models/types.js";
export { applyPipeline, fitPipeline, validatePipeline, type PipelineState } from "./preprocess/pipeline.js";
export type { PreprocessStep } from "./preprocess/steps.js";
export { formatReportMd } from "./report/format.js";
export { parseReport, serializeReport, type HarnessReport } from "./report/report.js";
export { makeFolds, split } from "./split/splitter.js";
export { aggregate, rankSummaries, selectBest } from "./tuning/aggregator.js";
export { expandGrid, pointKey } from "./tuning/grid.js";
export { buildWorkItems, tune, type TuneResult } from "./tuning/gridSearch.js";
export { evaluateUnit, type EvaluationContext } from "./tuning/resampleEvaluator.js";
export * from "./types.js";
