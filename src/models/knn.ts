import { FitFailure } from "../common/errors.js";
import { sortLabels } from "../data/dataset.js";
import type { HyperparameterPoint, Label } from "../types.js";
import type { FeatureRows, ModelPlugin } from "./types.js";

type Weighting = "uniform" | "distance";
type Distance = "euclidean" | "manhattan";

interface KnnHandle {
  k: number;
  weights: Weighting;
  distance: Distance;
}

interface KnnFitted extends KnnHandle {
  rows: FeatureRows;
  labels: readonly Label[];
  classes: Label[];
}

const DEFAULT_K = 5;

function readHandle(point: HyperparameterPoint): KnnHandle {
  const k = point.k ?? DEFAULT_K;
  if (typeof k !== "number" || !Number.isInteger(k) || k < 1) {
    throw new FitFailure(`knn: k must be a positive integer, got ${String(k)}.`);
  }
  const weights = point.weights ?? "uniform";
  if (weights !== "uniform" && weights !== "distance") {
    throw new FitFailure(`knn: unknown weights "${String(weights)}".`);
  }
  const distance = point.distance ?? "euclidean";
  if (distance !== "euclidean" && distance !== "manhattan") {
    throw new FitFailure(`knn: unknown distance "${String(distance)}".`);
  }
  return { k, weights, distance };
}

function measure(a: readonly number[], b: readonly number[], distance: Distance): number {
  let acc = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = a[i] - b[i];
    acc += distance === "manhattan" ? Math.abs(diff) : diff * diff;
  }
  return distance === "manhattan" ? acc : Math.sqrt(acc);
}

function vote(fitted: KnnFitted, row: readonly number[]): Map<Label, number> {
  const neighbours = fitted.rows
    .map((candidate, index) => ({ index, d: measure(row, candidate, fitted.distance) }))
    .sort((a, b) => a.d - b.d || a.index - b.index)
    .slice(0, fitted.k);

  const votes = new Map<Label, number>();
  // An exact match outweighs everything under distance weighting.
  const exact = fitted.weights === "distance" && neighbours.some((entry) => entry.d === 0);
  for (const entry of neighbours) {
    let weight = 1;
    if (fitted.weights === "distance") {
      weight = exact ? (entry.d === 0 ? 1 : 0) : 1 / entry.d;
    }
    const label = fitted.labels[entry.index];
    votes.set(label, (votes.get(label) ?? 0) + weight);
  }
  return votes;
}

export const knnPlugin: ModelPlugin<KnnHandle, KnnFitted> = {
  kind: "knn",
  create(hyperparameters) {
    return readHandle(hyperparameters);
  },
  fit(handle, features, labels) {
    if (features.length !== labels.length) {
      throw new FitFailure(`knn: ${features.length} rows but ${labels.length} labels.`);
    }
    if (handle.k > features.length) {
      throw new FitFailure(`knn: k=${handle.k} exceeds the ${features.length} training rows.`);
    }
    return {
      ...handle,
      rows: features,
      labels,
      classes: sortLabels(labels),
    };
  },
  predict(fitted, features) {
    return features.map((row) => {
      const votes = vote(fitted, row);
      let best = fitted.classes[0];
      let bestWeight = -1;
      for (const label of fitted.classes) {
        const weight = votes.get(label) ?? 0;
        if (weight > bestWeight) {
          best = label;
          bestWeight = weight;
        }
      }
      return best;
    });
  },
  predictProbabilities(fitted, features) {
    return features.map((row) => {
      const votes = vote(fitted, row);
      let total = 0;
      for (const weight of votes.values()) {
        total += weight;
      }
      const out: Record<Label, number> = {};
      for (const label of fitted.classes) {
        out[label] = total > 0 ? (votes.get(label) ?? 0) / total : 0;
      }
      return out;
    });
  },
};
