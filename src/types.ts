export type Label = string;

export interface DataRecord {
  features: Record<string, number>;
  label: Label;
}

export type Dataset = readonly DataRecord[];

/** Ascending, duplicate-free row indices into a Dataset. */
export type Partition = readonly number[];

export interface FeatureMatrix {
  featureNames: readonly string[];
  rows: readonly (readonly number[])[];
}

export interface Fold {
  index: number;
  train: Partition;
  heldOut: Partition;
}

export interface FoldSet {
  foldCount: number;
  stratified: boolean;
  folds: readonly Fold[];
}

export interface SplitResult {
  train: Partition;
  test: Partition;
}

export type HyperparameterValue = number | string | boolean;

export type HyperparameterPoint = Readonly<Record<string, HyperparameterValue>>;

export interface CartesianGrid {
  axes: Record<string, HyperparameterValue[]>;
}

export type HyperparameterGrid = HyperparameterPoint[] | CartesianGrid;

export const TIE_BREAK_RULES = ["lexicographic", "fewestParameters"] as const;
export type TieBreakRule = (typeof TIE_BREAK_RULES)[number];

export const METRIC_NAMES = [
  "accuracy",
  "balancedAccuracy",
  "precision",
  "recall",
  "f1",
  "rocAuc",
] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

export type FailureStage = "preprocess" | "fit" | "predict" | "metric";

export interface UnitFailure {
  stage: FailureStage;
  message: string;
}

export interface MetricRecord {
  foldIndex: number;
  point: HyperparameterPoint;
  pointKey: string;
  ok: boolean;
  metrics: Partial<Record<MetricName, number>>;
  failure?: UnitFailure;
}

export interface MetricStat {
  mean: number | null;
  sd: number | null;
  successfulFoldCount: number;
}

export interface FoldFailure extends UnitFailure {
  foldIndex: number;
}

export interface MetricSummary {
  point: HyperparameterPoint;
  pointKey: string;
  attemptedFoldCount: number;
  successfulFoldCount: number;
  metrics: Partial<Record<MetricName, MetricStat>>;
  failures: FoldFailure[];
}

export interface RankedSummary extends MetricSummary {
  rank: number | null;
}

export interface ConfusionTable {
  labels: Label[];
  /** counts[actual][predicted], both indexed by `labels`. */
  counts: number[][];
}

export interface FinalReport {
  point: HyperparameterPoint;
  pointKey: string;
  trainSize: number;
  testSize: number;
  metrics: Partial<Record<MetricName, number>>;
  confusion: ConfusionTable;
}
