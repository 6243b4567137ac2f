import { setImmediate as yieldToLoop } from "node:timers/promises";

import { Logger } from "../logger.js";
import type { ModelPlugin } from "../models/types.js";
import type {
  FoldSet,
  HyperparameterGrid,
  HyperparameterPoint,
  MetricRecord,
  MetricSummary,
} from "../types.js";
import { aggregate } from "./aggregator.js";
import { expandGrid, formatPoint, pointKey } from "./grid.js";
import { defaultConcurrency, runPool } from "./pool.js";
import { evaluateUnit, type EvaluationContext, type WorkItem } from "./resampleEvaluator.js";

export interface TuneOptions {
  plugin: ModelPlugin;
  grid: HyperparameterGrid;
  foldSet: FoldSet;
  context: EvaluationContext;
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface TuneResult {
  points: HyperparameterPoint[];
  records: MetricRecord[];
  /** Only points whose folds all ran; each one is final. */
  summaries: MetricSummary[];
  completedPoints: number;
  cancelled: boolean;
}

/** Flat (point × fold) list, point-major, so a cancel lands between points where it can. */
export function buildWorkItems(points: readonly HyperparameterPoint[], foldSet: FoldSet): WorkItem[] {
  const items: WorkItem[] = [];
  for (const point of points) {
    const key = pointKey(point);
    for (const fold of foldSet.folds) {
      items.push({ point, pointKey: key, fold });
    }
  }
  return items;
}

export async function tune(options: TuneOptions): Promise<TuneResult> {
  const { plugin, foldSet, context, signal } = options;
  const logger = options.logger ?? new Logger();
  const concurrency = options.concurrency ?? defaultConcurrency();
  const points = expandGrid(options.grid);
  const items = buildWorkItems(points, foldSet);

  logger.info(
    `Tuning ${plugin.kind}: points=${points.length} folds=${foldSet.foldCount} ` +
      `units=${items.length} concurrency=${concurrency}`,
  );

  const outcomes = await runPool(
    items.map((item) => async (): Promise<MetricRecord | undefined> => {
      await yieldToLoop();
      if (signal?.aborted) {
        return undefined;
      }
      return evaluateUnit(plugin, item, context);
    }),
    concurrency,
  );

  const finishedByPoint = new Map<string, MetricRecord[]>();
  let skipped = 0;
  for (const record of outcomes) {
    if (!record) {
      skipped += 1;
      continue;
    }
    const list = finishedByPoint.get(record.pointKey) ?? [];
    list.push(record);
    finishedByPoint.set(record.pointKey, list);
  }

  const records: MetricRecord[] = [];
  for (const point of points) {
    const list = finishedByPoint.get(pointKey(point)) ?? [];
    if (list.length === foldSet.foldCount) {
      records.push(...list);
    }
  }
  for (const record of records) {
    if (record.failure) {
      logger.warn(
        `Unit failed: point={${formatPoint(record.point)}} fold=${record.foldIndex} ` +
          `stage=${record.failure.stage}: ${record.failure.message}`,
      );
    }
  }

  const summaries = aggregate(records);
  for (const summary of summaries) {
    logger.debug(
      `Point {${formatPoint(summary.point)}}: ok=${summary.successfulFoldCount}/${summary.attemptedFoldCount}`,
    );
  }
  if (skipped > 0) {
    logger.warn(`Tuning cancelled: ${skipped} unit(s) skipped, ${summaries.length} point(s) complete.`);
  }

  return {
    points,
    records,
    summaries,
    completedPoints: summaries.length,
    cancelled: skipped > 0,
  };
}
