import { AllPointsFailedError } from "../common/errors.js";
import { summarize } from "../common/math.js";
import {
  METRIC_NAMES,
  type FoldFailure,
  type HyperparameterPoint,
  type MetricName,
  type MetricRecord,
  type MetricStat,
  type MetricSummary,
  type RankedSummary,
  type TieBreakRule,
} from "../types.js";
import { comparePoints, comparePointsLexicographic } from "./grid.js";

function byFold(a: MetricRecord, b: MetricRecord): number {
  return a.foldIndex - b.foldIndex;
}

function metricNamesIn(records: readonly MetricRecord[]): MetricName[] {
  const present = new Set<MetricName>();
  for (const record of records) {
    if (!record.ok) {
      continue;
    }
    for (const name of METRIC_NAMES) {
      if (typeof record.metrics[name] === "number") {
        present.add(name);
      }
    }
  }
  return METRIC_NAMES.filter((name) => present.has(name));
}

/**
 * Groups records by point and averages each metric over successful folds only.
 * Values are summed in fold order and summaries come out in point order, so
 * the input order never changes the result.
 */
export function aggregate(records: readonly MetricRecord[]): MetricSummary[] {
  const names = metricNamesIn(records);
  const groups = new Map<string, MetricRecord[]>();
  for (const record of records) {
    const group = groups.get(record.pointKey);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.pointKey, [record]);
    }
  }

  const summaries: MetricSummary[] = [];
  for (const [key, group] of groups) {
    const ordered = [...group].sort(byFold);
    const successful = ordered.filter((record) => record.ok);
    const metrics: Partial<Record<MetricName, MetricStat>> = {};
    for (const name of names) {
      const values: number[] = [];
      for (const record of successful) {
        const value = record.metrics[name];
        if (typeof value === "number") {
          values.push(value);
        }
      }
      const stats = summarize(values);
      metrics[name] = { mean: stats.mean, sd: stats.sd, successfulFoldCount: stats.n };
    }
    const failures: FoldFailure[] = [];
    for (const record of ordered) {
      if (!record.ok && record.failure) {
        failures.push({ foldIndex: record.foldIndex, ...record.failure });
      }
    }
    summaries.push({
      point: ordered[0].point,
      pointKey: key,
      attemptedFoldCount: ordered.length,
      successfulFoldCount: successful.length,
      metrics,
      failures,
    });
  }

  return summaries.sort((a, b) => comparePointsLexicographic(a.point, b.point));
}

function primaryMean(summary: MetricSummary, primaryMetric: MetricName): number | null {
  if (summary.successfulFoldCount === 0) {
    return null;
  }
  return summary.metrics[primaryMetric]?.mean ?? null;
}

/**
 * Orders points by mean primary metric (highest first), breaking exact ties
 * with `tieBreak`. Points without a successful fold get `rank: null` and trail.
 */
export function rankSummaries(
  summaries: readonly MetricSummary[],
  primaryMetric: MetricName,
  tieBreak: TieBreakRule,
): RankedSummary[] {
  const scored = summaries.map((summary) => ({ summary, mean: primaryMean(summary, primaryMetric) }));
  const eligible = scored
    .filter((entry): entry is { summary: MetricSummary; mean: number } => entry.mean !== null)
    .sort((a, b) => {
      if (b.mean !== a.mean) return b.mean - a.mean;
      return comparePoints(a.summary.point, b.summary.point, tieBreak);
    });
  const excluded = scored
    .filter((entry) => entry.mean === null)
    .sort((a, b) => comparePointsLexicographic(a.summary.point, b.summary.point));

  return [
    ...eligible.map((entry, index) => ({ ...entry.summary, rank: index + 1 })),
    ...excluded.map((entry) => ({ ...entry.summary, rank: null })),
  ];
}

export function selectBest(
  summaries: readonly MetricSummary[],
  primaryMetric: MetricName,
  tieBreak: TieBreakRule,
): HyperparameterPoint {
  const [top] = rankSummaries(summaries, primaryMetric, tieBreak);
  if (!top || top.rank === null) {
    throw new AllPointsFailedError([...summaries]);
  }
  return top.point;
}
