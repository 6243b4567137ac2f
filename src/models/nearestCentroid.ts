import { FitFailure } from "../common/errors.js";
import { sortLabels } from "../data/dataset.js";
import type { Label } from "../types.js";
import type { ModelPlugin } from "./types.js";

interface CentroidHandle {
  shrink: number;
}

interface CentroidFitted {
  classes: Label[];
  centroids: number[][];
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let acc = 0;
  for (let i = 0; i < a.length; i += 1) {
    acc += (a[i] - b[i]) ** 2;
  }
  return acc;
}

function centroidDistances(fitted: CentroidFitted, row: readonly number[]): number[] {
  return fitted.centroids.map((centroid) => squaredDistance(row, centroid));
}

/**
 * Assigns each row to the closest class mean. `shrink` in [0, 1] pulls every
 * centroid towards the overall mean.
 */
export const nearestCentroidPlugin: ModelPlugin<CentroidHandle, CentroidFitted> = {
  kind: "nearestCentroid",
  create(hyperparameters) {
    const shrink = hyperparameters.shrink ?? 0;
    if (typeof shrink !== "number" || shrink < 0 || shrink > 1) {
      throw new FitFailure(`nearestCentroid: shrink must be in [0, 1], got ${String(shrink)}.`);
    }
    return { shrink };
  },
  fit(handle, features, labels) {
    if (features.length === 0 || features.length !== labels.length) {
      throw new FitFailure(
        `nearestCentroid: needs matching non-empty rows and labels (${features.length}/${labels.length}).`,
      );
    }
    const width = features[0].length;
    const overall = new Array<number>(width).fill(0);
    const sums = new Map<Label, { total: number[]; n: number }>();
    features.forEach((row, index) => {
      const label = labels[index];
      const entry = sums.get(label) ?? { total: new Array<number>(width).fill(0), n: 0 };
      for (let col = 0; col < width; col += 1) {
        entry.total[col] += row[col];
        overall[col] += row[col] / features.length;
      }
      entry.n += 1;
      sums.set(label, entry);
    });
    const classes = sortLabels(sums.keys());
    const centroids = classes.map((label) => {
      const entry = sums.get(label);
      if (!entry) {
        throw new FitFailure(`nearestCentroid: lost class "${label}".`);
      }
      return entry.total.map(
        (total, col) => (1 - handle.shrink) * (total / entry.n) + handle.shrink * overall[col],
      );
    });
    return { classes, centroids };
  },
  predict(fitted, features) {
    return features.map((row) => {
      const distances = centroidDistances(fitted, row);
      let best = 0;
      for (let i = 1; i < distances.length; i += 1) {
        if (distances[i] < distances[best]) {
          best = i;
        }
      }
      return fitted.classes[best];
    });
  },
  predictProbabilities(fitted, features) {
    return features.map((row) => {
      const distances = centroidDistances(fitted, row);
      // Softmax over negative squared distance.
      const minD = Math.min(...distances);
      const weights = distances.map((d) => Math.exp(-(d - minD)));
      const total = weights.reduce((acc, w) => acc + w, 0);
      const out: Record<Label, number> = {};
      fitted.classes.forEach((label, i) => {
        out[label] = weights[i] / total;
      });
      return out;
    });
  },
};
