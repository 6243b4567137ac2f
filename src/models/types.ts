import type { HyperparameterPoint, Label } from "../types.js";

export type FeatureRows = readonly (readonly number[])[];

export type ClassProbabilities = Readonly<Record<Label, number>>;

/**
 * Uniform contract every classifier family plugs in through. The harness never
 * looks inside `Handle` or `Fitted`; each call may return a value or a promise.
 */
export interface ModelPlugin<Handle = unknown, Fitted = unknown> {
  readonly kind: string;
  create(hyperparameters: HyperparameterPoint): Handle;
  fit(handle: Handle, features: FeatureRows, labels: readonly Label[]): Fitted | Promise<Fitted>;
  predict(fitted: Fitted, features: FeatureRows): Label[] | Promise<Label[]>;
  predictProbabilities?(
    fitted: Fitted,
    features: FeatureRows,
  ): ClassProbabilities[] | Promise<ClassProbabilities[]>;
}
