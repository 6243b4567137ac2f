import { ConfigurationError, DataShapeError } from "../common/errors.js";
import type { FeatureMatrix } from "../types.js";

export type PreprocessStep =
  | { kind: "standardize" }
  | { kind: "minMax" }
  | { kind: "pca"; components: number }
  | { kind: "select"; features: string[] };

interface StateBase {
  inputNames: readonly string[];
  outputNames: readonly string[];
}

export interface StandardizeState extends StateBase {
  kind: "standardize";
  means: readonly number[];
  scales: readonly number[];
}

export interface MinMaxState extends StateBase {
  kind: "minMax";
  mins: readonly number[];
  ranges: readonly number[];
}

export interface PcaState extends StateBase {
  kind: "pca";
  means: readonly number[];
  /** One unit-length loading vector per output component. */
  loadings: readonly (readonly number[])[];
  explainedVariance: readonly number[];
}

export interface SelectState extends StateBase {
  kind: "select";
  columns: readonly number[];
}

export type StepState = StandardizeState | MinMaxState | PcaState | SelectState;

const POWER_ITERATIONS = 1000;
const POWER_TOLERANCE = 1e-12;

function columnMeans(matrix: FeatureMatrix): number[] {
  const width = matrix.featureNames.length;
  const means = new Array<number>(width).fill(0);
  for (const row of matrix.rows) {
    for (let col = 0; col < width; col += 1) {
      means[col] += row[col];
    }
  }
  return means.map((total) => total / matrix.rows.length);
}

function mapRows(matrix: FeatureMatrix, names: readonly string[], fn: (row: readonly number[]) => number[]): FeatureMatrix {
  return {
    featureNames: names,
    rows: matrix.rows.map(fn),
  };
}

function fitStandardize(matrix: FeatureMatrix): StandardizeState {
  const means = columnMeans(matrix);
  const scales = means.map((mean, col) => {
    let acc = 0;
    for (const row of matrix.rows) {
      acc += (row[col] - mean) ** 2;
    }
    const sd = Math.sqrt(acc / matrix.rows.length);
    // Constant columns pass through centred but unscaled.
    return sd > 0 ? sd : 1;
  });
  return {
    kind: "standardize",
    inputNames: [...matrix.featureNames],
    outputNames: [...matrix.featureNames],
    means,
    scales,
  };
}

function fitMinMax(matrix: FeatureMatrix): MinMaxState {
  const width = matrix.featureNames.length;
  const mins = new Array<number>(width).fill(Number.POSITIVE_INFINITY);
  const maxs = new Array<number>(width).fill(Number.NEGATIVE_INFINITY);
  for (const row of matrix.rows) {
    for (let col = 0; col < width; col += 1) {
      mins[col] = Math.min(mins[col], row[col]);
      maxs[col] = Math.max(maxs[col], row[col]);
    }
  }
  return {
    kind: "minMax",
    inputNames: [...matrix.featureNames],
    outputNames: [...matrix.featureNames],
    mins,
    ranges: mins.map((min, col) => (maxs[col] > min ? maxs[col] - min : 1)),
  };
}

function covariance(matrix: FeatureMatrix, means: readonly number[]): number[][] {
  const width = means.length;
  const denom = matrix.rows.length > 1 ? matrix.rows.length - 1 : 1;
  const cov = Array.from({ length: width }, () => new Array<number>(width).fill(0));
  for (const row of matrix.rows) {
    for (let i = 0; i < width; i += 1) {
      const di = row[i] - means[i];
      for (let j = i; j < width; j += 1) {
        cov[i][j] += di * (row[j] - means[j]);
      }
    }
  }
  for (let i = 0; i < width; i += 1) {
    for (let j = i; j < width; j += 1) {
      cov[i][j] /= denom;
      cov[j][i] = cov[i][j];
    }
  }
  return cov;
}

function multiply(m: readonly (readonly number[])[], v: readonly number[]): number[] {
  return m.map((row) => row.reduce((acc, value, col) => acc + value * v[col], 0));
}

function normalize(v: number[]): number[] | undefined {
  const norm = Math.sqrt(v.reduce((acc, value) => acc + value * value, 0));
  if (!(norm > 0)) {
    return undefined;
  }
  return v.map((value) => value / norm);
}

function orientSign(v: number[]): number[] {
  let pivot = 0;
  for (let i = 1; i < v.length; i += 1) {
    if (Math.abs(v[i]) > Math.abs(v[pivot])) {
      pivot = i;
    }
  }
  return v[pivot] < 0 ? v.map((value) => -value) : v;
}

function dominantEigen(cov: readonly (readonly number[])[]): { vector: number[]; value: number } {
  const width = cov.length;
  let vector = normalize(Array.from({ length: width }, (_, i) => 1 + i / width)) ?? [];
  for (let iter = 0; iter < POWER_ITERATIONS; iter += 1) {
    const next = normalize(multiply(cov, vector));
    if (!next) {
      break;
    }
    const delta = next.reduce((acc, value, i) => Math.max(acc, Math.abs(value - vector[i])), 0);
    vector = next;
    if (delta < POWER_TOLERANCE) {
      break;
    }
  }
  vector = orientSign(vector);
  const value = multiply(cov, vector).reduce((acc, entry, i) => acc + entry * vector[i], 0);
  return { vector, value };
}

function fitPca(matrix: FeatureMatrix, components: number): PcaState {
  const width = matrix.featureNames.length;
  if (components > width) {
    throw new DataShapeError(`pca asks for ${components} components from ${width} features.`);
  }
  const means = columnMeans(matrix);
  const cov = covariance(matrix, means);
  const loadings: number[][] = [];
  const explainedVariance: number[] = [];
  for (let c = 0; c < components; c += 1) {
    const { vector, value } = dominantEigen(cov);
    loadings.push(vector);
    explainedVariance.push(Math.max(0, value));
    // Deflate so the next pass finds the next component.
    for (let i = 0; i < width; i += 1) {
      for (let j = 0; j < width; j += 1) {
        cov[i][j] -= value * vector[i] * vector[j];
      }
    }
  }
  return {
    kind: "pca",
    inputNames: [...matrix.featureNames],
    outputNames: loadings.map((_, c) => `pc${c + 1}`),
    means,
    loadings,
    explainedVariance,
  };
}

function fitSelect(matrix: FeatureMatrix, features: readonly string[]): SelectState {
  const columns = features.map((name) => {
    const col = matrix.featureNames.indexOf(name);
    if (col < 0) {
      throw new DataShapeError(`select names unknown feature "${name}".`);
    }
    return col;
  });
  return {
    kind: "select",
    inputNames: [...matrix.featureNames],
    outputNames: [...features],
    columns,
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

export function fitStep(step: PreprocessStep, matrix: FeatureMatrix): StepState {
  if (matrix.rows.length === 0) {
    throw new DataShapeError(`Cannot fit ${step.kind} on zero rows.`);
  }
  switch (step.kind) {
    case "standardize":
      return deepFreeze(fitStandardize(matrix));
    case "minMax":
      return deepFreeze(fitMinMax(matrix));
    case "pca":
      return deepFreeze(fitPca(matrix, step.components));
    case "select":
      return deepFreeze(fitSelect(matrix, step.features));
  }
}

export function applyStep(state: StepState, matrix: FeatureMatrix): FeatureMatrix {
  switch (state.kind) {
    case "standardize":
      return mapRows(matrix, state.outputNames, (row) =>
        row.map((value, col) => (value - state.means[col]) / state.scales[col]),
      );
    case "minMax":
      return mapRows(matrix, state.outputNames, (row) =>
        row.map((value, col) => (value - state.mins[col]) / state.ranges[col]),
      );
    case "pca":
      return mapRows(matrix, state.outputNames, (row) =>
        state.loadings.map((loading) =>
          loading.reduce((acc, weight, col) => acc + weight * (row[col] - state.means[col]), 0),
        ),
      );
    case "select":
      return mapRows(matrix, state.outputNames, (row) => state.columns.map((col) => row[col]));
  }
}

/** Feature names a step produces from `inputNames`, or a ConfigurationError if it cannot run. */
export function stepOutputNames(step: PreprocessStep, inputNames: readonly string[]): string[] {
  switch (step.kind) {
    case "standardize":
    case "minMax":
      return [...inputNames];
    case "pca":
      if (!Number.isInteger(step.components) || step.components < 1) {
        throw new ConfigurationError(`pca.components must be a positive integer, got ${step.components}.`);
      }
      if (step.components > inputNames.length) {
        throw new ConfigurationError(
          `pca.components=${step.components} exceeds the ${inputNames.length} available features.`,
        );
      }
      return Array.from({ length: step.components }, (_, c) => `pc${c + 1}`);
    case "select": {
      if (step.features.length === 0) {
        throw new ConfigurationError("select needs at least one feature.");
      }
      const missing = step.features.filter((name) => !inputNames.includes(name));
      if (missing.length > 0) {
        throw new ConfigurationError(`select names unknown feature(s): ${missing.join(", ")}.`);
      }
      return [...step.features];
    }
  }
}
