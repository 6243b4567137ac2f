import { MetricFailure } from "../common/errors.js";
import { safeRate } from "../common/math.js";
import type { ConfusionTable, Label, MetricName } from "../types.js";

export interface MetricInput {
  predicted: readonly Label[];
  actual: readonly Label[];
  /** Every label of the dataset, sorted. */
  labels: readonly Label[];
  positiveLabel: Label;
  /** Positive-class probability per row, when the model provides one. */
  scores?: readonly number[];
}

export type MetricFn = (input: MetricInput) => number;

export interface MetricDefinition {
  name: MetricName;
  needsScores: boolean;
  binaryOnly: boolean;
  compute: MetricFn;
}

interface ClassCounts {
  tp: number;
  fp: number;
  fn: number;
  support: number;
}

export function confusionTable(
  predicted: readonly Label[],
  actual: readonly Label[],
  labels: readonly Label[],
): ConfusionTable {
  if (predicted.length !== actual.length) {
    throw new MetricFailure(
      `predicted has ${predicted.length} labels but actual has ${actual.length}.`,
    );
  }
  const position = new Map(labels.map((label, index) => [label, index]));
  const counts = labels.map(() => labels.map(() => 0));
  for (let row = 0; row < actual.length; row += 1) {
    const a = position.get(actual[row]);
    const p = position.get(predicted[row]);
    if (a === undefined || p === undefined) {
      throw new MetricFailure(`Row ${row} uses a label outside [${labels.join(",")}].`);
    }
    counts[a][p] += 1;
  }
  return { labels: [...labels], counts };
}

function classCounts(table: ConfusionTable, classIndex: number): ClassCounts {
  let fp = 0;
  let fn = 0;
  let support = 0;
  for (let i = 0; i < table.labels.length; i += 1) {
    support += table.counts[classIndex][i];
    if (i === classIndex) {
      continue;
    }
    fp += table.counts[i][classIndex];
    fn += table.counts[classIndex][i];
  }
  return { tp: table.counts[classIndex][classIndex], fp, fn, support };
}

function perClass(input: MetricInput, score: (counts: ClassCounts) => number): number {
  const table = confusionTable(input.predicted, input.actual, input.labels);
  if (table.labels.length === 2) {
    const positive = table.labels.indexOf(input.positiveLabel);
    if (positive < 0) {
      throw new MetricFailure(`positive label "${input.positiveLabel}" is not among the labels.`);
    }
    return score(classCounts(table, positive));
  }
  // Macro average for more than two classes.
  let total = 0;
  for (let i = 0; i < table.labels.length; i += 1) {
    total += score(classCounts(table, i));
  }
  return safeRate(total, table.labels.length);
}

const precisionOf = (c: ClassCounts): number => safeRate(c.tp, c.tp + c.fp);
const recallOf = (c: ClassCounts): number => safeRate(c.tp, c.tp + c.fn);

export const accuracy: MetricFn = ({ predicted, actual }) => {
  if (predicted.length !== actual.length) {
    throw new MetricFailure(
      `predicted has ${predicted.length} labels but actual has ${actual.length}.`,
    );
  }
  let hit = 0;
  for (let row = 0; row < actual.length; row += 1) {
    if (predicted[row] === actual[row]) {
      hit += 1;
    }
  }
  return safeRate(hit, actual.length);
};

export const precision: MetricFn = (input) => perClass(input, precisionOf);

export const recall: MetricFn = (input) => perClass(input, recallOf);

export const f1: MetricFn = (input) =>
  perClass(input, (c) => {
    const p = precisionOf(c);
    const r = recallOf(c);
    return p + r > 0 ? (2 * p * r) / (p + r) : 0;
  });

/** Mean recall over the classes present in `actual`. */
export const balancedAccuracy: MetricFn = (input) => {
  const table = confusionTable(input.predicted, input.actual, input.labels);
  let total = 0;
  let present = 0;
  for (let i = 0; i < table.labels.length; i += 1) {
    const counts = classCounts(table, i);
    if (counts.support === 0) {
      continue;
    }
    total += recallOf(counts);
    present += 1;
  }
  return safeRate(total, present);
};

/** Mann-Whitney form of the ROC area; tied scores share their average rank. */
export const rocAuc: MetricFn = ({ actual, scores, positiveLabel }) => {
  if (!scores) {
    throw new MetricFailure("rocAuc needs positive-class scores.");
  }
  if (scores.length !== actual.length) {
    throw new MetricFailure(`scores has ${scores.length} entries but actual has ${actual.length}.`);
  }
  const order = scores
    .map((score, index) => ({ score, positive: actual[index] === positiveLabel }))
    .sort((a, b) => a.score - b.score);
  let positives = 0;
  let rankSum = 0;
  let start = 0;
  while (start < order.length) {
    let end = start;
    while (end + 1 < order.length && order[end + 1].score === order[start].score) {
      end += 1;
    }
    const averageRank = (start + end) / 2 + 1;
    for (let i = start; i <= end; i += 1) {
      if (order[i].positive) {
        positives += 1;
        rankSum += averageRank;
      }
    }
    start = end + 1;
  }
  const negatives = order.length - positives;
  if (positives === 0 || negatives === 0) {
    throw new MetricFailure(
      `rocAuc is undefined with ${positives} positive and ${negatives} negative rows.`,
    );
  }
  return (rankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
};

export const METRICS: Readonly<Record<MetricName, MetricDefinition>> = {
  accuracy: { name: "accuracy", needsScores: false, binaryOnly: false, compute: accuracy },
  balancedAccuracy: {
    name: "balancedAccuracy",
    needsScores: false,
    binaryOnly: false,
    compute: balancedAccuracy,
  },
  precision: { name: "precision", needsScores: false, binaryOnly: false, compute: precision },
  recall: { name: "recall", needsScores: false, binaryOnly: false, compute: recall },
  f1: { name: "f1", needsScores: false, binaryOnly: false, compute: f1 },
  rocAuc: { name: "rocAuc", needsScores: true, binaryOnly: true, compute: rocAuc },
};

export function computeMetrics(
  names: readonly MetricName[],
  input: MetricInput,
): Partial<Record<MetricName, number>> {
  const out: Partial<Record<MetricName, number>> = {};
  for (const name of names) {
    const value = METRICS[name].compute(input);
    if (!Number.isFinite(value)) {
      throw new MetricFailure(`${name} produced a non-finite value.`);
    }
    out[name] = value;
  }
  return out;
}
