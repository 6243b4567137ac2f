import { ConfigurationError, HarnessAbortedError, throwIfAborted } from "./common/errors.js";
import { deriveSeed } from "./common/random.js";
import type { HarnessConfig } from "./config.js";
import { describeDataset } from "./data/dataset.js";
import { finalize } from "./final/finalEvaluator.js";
import { Logger } from "./logger.js";
import { METRICS } from "./metrics/classification.js";
import { defaultModelRegistry, type ModelRegistry } from "./models/registry.js";
import type { ModelPlugin } from "./models/types.js";
import { validatePipeline, type PipelineState } from "./preprocess/pipeline.js";
import { REPORT_FORMAT_VERSION, type HarnessReport } from "./report/report.js";
import { makeFolds, split } from "./split/splitter.js";
import { rankSummaries, selectBest } from "./tuning/aggregator.js";
import { expandGrid, formatPoint, pointKey } from "./tuning/grid.js";
import { tune, type TuneResult } from "./tuning/gridSearch.js";
import type { EvaluationContext } from "./tuning/resampleEvaluator.js";
import type { Dataset, Label, MetricName } from "./types.js";

export interface HarnessOptions {
  registry?: ModelRegistry;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface HarnessResult {
  report: HarnessReport;
  tuning: TuneResult;
  /** Model refitted on the whole train partition for the selected point. */
  fitted: unknown;
  pipeline: PipelineState;
}

function resolvePositiveLabel(labels: readonly Label[], requested?: Label): Label {
  if (requested !== undefined) {
    if (!labels.includes(requested)) {
      throw new ConfigurationError(
        `positiveLabel "${requested}" is not a dataset label [${labels.join(", ")}].`,
      );
    }
    return requested;
  }
  // Binary default: the second label in sorted order ("1" over "0", "yes" over "no").
  return labels.length === 2 ? labels[1] : labels[0];
}

function assertMetricsSupported(
  metrics: readonly MetricName[],
  plugin: ModelPlugin,
  labels: readonly Label[],
): void {
  for (const name of metrics) {
    const definition = METRICS[name];
    if (definition.binaryOnly && labels.length !== 2) {
      throw new ConfigurationError(`${name} needs exactly two labels, dataset has ${labels.length}.`);
    }
    if (definition.needsScores && !plugin.predictProbabilities) {
      throw new ConfigurationError(`${name} needs probabilities but model "${plugin.kind}" has none.`);
    }
  }
}

export async function runHarness(
  dataset: Dataset,
  config: HarnessConfig,
  options: HarnessOptions = {},
): Promise<HarnessResult> {
  const { signal } = options;
  const logger = options.logger ?? new Logger();
  const registry = options.registry ?? defaultModelRegistry();
  throwIfAborted(signal);

  const shape = describeDataset(dataset);
  const plugin = registry.get(config.model);
  const positiveLabel = resolvePositiveLabel(shape.labels, config.positiveLabel);
  assertMetricsSupported(config.metrics, plugin, shape.labels);
  validatePipeline(config.preprocess, shape.featureNames);
  const points = expandGrid(config.grid);

  const { train, test } = split(dataset, {
    testFraction: config.testFraction,
    stratify: config.stratify,
    seed: deriveSeed(config.seed, "test-split"),
  });
  const foldSet = makeFolds(dataset, train, {
    foldCount: config.foldCount,
    stratify: config.stratify,
    seed: deriveSeed(config.seed, "folds"),
  });
  logger.info(
    `Split: records=${dataset.length} train=${train.length} test=${test.length} ` +
      `folds=${foldSet.foldCount} stratify=${config.stratify} seed=${config.seed}`,
  );

  const context: EvaluationContext = {
    dataset,
    featureNames: shape.featureNames,
    labels: shape.labels,
    positiveLabel,
    steps: config.preprocess,
    metrics: config.metrics,
  };

  const tuning = await tune({
    plugin,
    grid: points,
    foldSet,
    context,
    concurrency: config.concurrency,
    signal,
    logger,
  });
  if (tuning.cancelled) {
    throw new HarnessAbortedError(tuning.summaries);
  }

  const ranked = rankSummaries(tuning.summaries, config.primaryMetric, config.tieBreak);
  const selectedPoint = selectBest(tuning.summaries, config.primaryMetric, config.tieBreak);
  const selectedKey = pointKey(selectedPoint);
  const selectedSummary = ranked.find((summary) => summary.pointKey === selectedKey);
  const cvMean = selectedSummary?.metrics[config.primaryMetric]?.mean;
  if (!selectedSummary || typeof cvMean !== "number") {
    throw new ConfigurationError(`Selected point ${selectedKey} has no ${config.primaryMetric} summary.`);
  }
  logger.info(
    `Selected {${formatPoint(selectedPoint)}}: cv ${config.primaryMetric}=${cvMean.toFixed(4)} ` +
      `(folds ok ${selectedSummary.successfulFoldCount}/${selectedSummary.attemptedFoldCount})`,
  );

  // Every point finished, so a late abort still reports them.
  if (signal?.aborted) {
    throw new HarnessAbortedError(tuning.summaries);
  }
  const final = await finalize({ plugin, point: selectedPoint, train, test, context });
  logger.info(
    `Held-out ${config.metrics
      .map((name) => `${name}=${(final.report.metrics[name] ?? Number.NaN).toFixed(4)}`)
      .join(" ")}`,
  );

  const report: HarnessReport = {
    formatVersion: REPORT_FORMAT_VERSION,
    model: plugin.kind,
    config: {
      testFraction: config.testFraction,
      foldCount: config.foldCount,
      stratify: config.stratify,
      seed: config.seed,
      metrics: [...config.metrics],
      primaryMetric: config.primaryMetric,
      tieBreak: config.tieBreak,
      positiveLabel,
      preprocess: config.preprocess.map((step) => ({ ...step })),
      grid: points,
    },
    dataset: {
      size: shape.size,
      featureNames: shape.featureNames,
      labels: shape.labels,
    },
    split: {
      trainSize: train.length,
      testSize: test.length,
      heldOutSizes: foldSet.folds.map((fold) => fold.heldOut.length),
    },
    tuning: {
      primaryMetric: config.primaryMetric,
      tieBreak: config.tieBreak,
      summaries: ranked,
      selected: {
        point: selectedPoint,
        pointKey: selectedKey,
        cvMean,
        successfulFoldCount: selectedSummary.successfulFoldCount,
      },
    },
    final: final.report,
  };

  return {
    report,
    tuning,
    fitted: final.fitted,
    pipeline: final.pipeline,
  };
}
