import { z } from "zod";

import { ConfigurationError } from "../common/errors.js";
import type { PreprocessStep } from "../preprocess/steps.js";
import {
  TIE_BREAK_RULES,
  METRIC_NAMES,
  type FinalReport,
  type HyperparameterPoint,
  type Label,
  type MetricName,
  type RankedSummary,
  type TieBreakRule,
} from "../types.js";

export const REPORT_FORMAT_VERSION = 1;

export interface SelectedPoint {
  point: HyperparameterPoint;
  pointKey: string;
  /** Cross-validation mean of the primary metric; a selection signal, not a performance estimate. */
  cvMean: number;
  successfulFoldCount: number;
}

export interface HarnessReport {
  formatVersion: typeof REPORT_FORMAT_VERSION;
  model: string;
  config: {
    testFraction: number;
    foldCount: number;
    stratify: boolean;
    seed: number;
    metrics: MetricName[];
    primaryMetric: MetricName;
    tieBreak: TieBreakRule;
    positiveLabel: Label;
    preprocess: PreprocessStep[];
    grid: HyperparameterPoint[];
  };
  dataset: {
    size: number;
    featureNames: string[];
    labels: Label[];
  };
  split: {
    trainSize: number;
    testSize: number;
    heldOutSizes: number[];
  };
  tuning: {
    primaryMetric: MetricName;
    tieBreak: TieBreakRule;
    summaries: RankedSummary[];
    selected: SelectedPoint;
  };
  final: FinalReport;
}

const metricName = z.enum(METRIC_NAMES);
const pointSchema = z.record(z.string(), z.union([z.number(), z.string(), z.boolean()]));

function perMetric<T extends z.ZodTypeAny>(value: T) {
  return z
    .object({
      accuracy: value.optional(),
      balancedAccuracy: value.optional(),
      precision: value.optional(),
      recall: value.optional(),
      f1: value.optional(),
      rocAuc: value.optional(),
    })
    .strict();
}

const statSchema = z
  .object({
    mean: z.number().nullable(),
    sd: z.number().nullable(),
    successfulFoldCount: z.number().int().nonnegative(),
  })
  .strict();

const summarySchema = z
  .object({
    point: pointSchema,
    pointKey: z.string(),
    attemptedFoldCount: z.number().int().nonnegative(),
    successfulFoldCount: z.number().int().nonnegative(),
    metrics: perMetric(statSchema),
    failures: z.array(
      z
        .object({
          foldIndex: z.number().int().nonnegative(),
          stage: z.enum(["preprocess", "fit", "predict", "metric"]),
          message: z.string(),
        })
        .strict(),
    ),
    rank: z.number().int().positive().nullable(),
  })
  .strict();

const stepSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("standardize") }).strict(),
  z.object({ kind: z.literal("minMax") }).strict(),
  z.object({ kind: z.literal("pca"), components: z.number().int().positive() }).strict(),
  z.object({ kind: z.literal("select"), features: z.array(z.string()) }).strict(),
]);

export const HarnessReportSchema = z
  .object({
    formatVersion: z.literal(REPORT_FORMAT_VERSION),
    model: z.string(),
    config: z
      .object({
        testFraction: z.number(),
        foldCount: z.number().int(),
        stratify: z.boolean(),
        seed: z.number().int(),
        metrics: z.array(metricName),
        primaryMetric: metricName,
        tieBreak: z.enum(TIE_BREAK_RULES),
        positiveLabel: z.string(),
        preprocess: z.array(stepSchema),
        grid: z.array(pointSchema),
      })
      .strict(),
    dataset: z
      .object({
        size: z.number().int(),
        featureNames: z.array(z.string()),
        labels: z.array(z.string()),
      })
      .strict(),
    split: z
      .object({
        trainSize: z.number().int(),
        testSize: z.number().int(),
        heldOutSizes: z.array(z.number().int()),
      })
      .strict(),
    tuning: z
      .object({
        primaryMetric: metricName,
        tieBreak: z.enum(TIE_BREAK_RULES),
        summaries: z.array(summarySchema),
        selected: z
          .object({
            point: pointSchema,
            pointKey: z.string(),
            cvMean: z.number(),
            successfulFoldCount: z.number().int(),
          })
          .strict(),
      })
      .strict(),
    final: z
      .object({
        point: pointSchema,
        pointKey: z.string(),
        trainSize: z.number().int(),
        testSize: z.number().int(),
        metrics: perMetric(z.number()),
        confusion: z
          .object({
            labels: z.array(z.string()),
            counts: z.array(z.array(z.number().int().nonnegative())),
          })
          .strict(),
      })
      .strict(),
  })
  .strict();

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(Reflect.get(value, key));
    }
    return out;
  }
  return value;
}

/** JSON with recursively sorted keys; re-serializing a parsed report gives the same bytes. */
export function serializeReport(report: HarnessReport): string {
  return `${JSON.stringify(sortKeys(report), null, 2)}\n`;
}

export function parseReport(text: string): HarnessReport {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError("Report is not valid JSON.", { cause: error });
  }
  const parsed = HarnessReportSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Report does not match format ${REPORT_FORMAT_VERSION}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim(),
    );
  }
  return parsed.data;
}
