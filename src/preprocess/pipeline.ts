import { DataShapeError } from "../common/errors.js";
import type { FeatureMatrix } from "../types.js";
import { applyStep, fitStep, stepOutputNames, type PreprocessStep, type StepState } from "./steps.js";

export interface PipelineState {
  inputNames: readonly string[];
  outputNames: readonly string[];
  steps: readonly StepState[];
}

/** Checks a step list against the dataset's features before any fold is touched. */
export function validatePipeline(steps: readonly PreprocessStep[], featureNames: readonly string[]): string[] {
  let names = [...featureNames];
  for (const step of steps) {
    names = stepOutputNames(step, names);
  }
  return names;
}

/**
 * Fits every step in order, each on the output of the previous one.
 * Only the training rows passed here ever reach a step's fit.
 */
export function fitPipeline(steps: readonly PreprocessStep[], train: FeatureMatrix): PipelineState {
  const states: StepState[] = [];
  let current = train;
  for (const step of steps) {
    const state = fitStep(step, current);
    states.push(state);
    current = applyStep(state, current);
  }
  return Object.freeze({
    inputNames: Object.freeze([...train.featureNames]),
    outputNames: Object.freeze([...current.featureNames]),
    steps: Object.freeze(states),
  });
}

export function applyPipeline(state: PipelineState, matrix: FeatureMatrix): FeatureMatrix {
  const expected = state.inputNames;
  const actual = matrix.featureNames;
  if (expected.length !== actual.length || expected.some((name, i) => name !== actual[i])) {
    throw new DataShapeError(
      `Pipeline was fitted on [${expected.join(",")}] but applied to [${actual.join(",")}].`,
    );
  }
  for (let index = 0; index < matrix.rows.length; index += 1) {
    if (matrix.rows[index].length !== expected.length) {
      throw new DataShapeError(
        `Row ${index} has ${matrix.rows[index].length} values, expected ${expected.length}.`,
      );
    }
  }
  let current = matrix;
  for (const step of state.steps) {
    current = applyStep(step, current);
  }
  return current;
}
