import { FitFailure } from "../common/errors.js";
import { sortLabels } from "../data/dataset.js";
import type { Label } from "../types.js";
import type { ClassProbabilities, ModelPlugin } from "./types.js";

interface MajorityFitted {
  label: Label;
  priors: ClassProbabilities;
}

/** Always predicts the most frequent training label (ties: first in sorted label order). */
export const majorityPlugin: ModelPlugin<null, MajorityFitted> = {
  kind: "majority",
  create() {
    return null;
  },
  fit(_handle, _features, labels) {
    if (labels.length === 0) {
      throw new FitFailure("majority: no training labels.");
    }
    const counts = new Map<Label, number>();
    for (const label of labels) {
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
    let best: Label | undefined;
    let bestCount = -1;
    const priors: Record<Label, number> = {};
    for (const label of sortLabels(counts.keys())) {
      const count = counts.get(label) ?? 0;
      priors[label] = count / labels.length;
      if (count > bestCount) {
        best = label;
        bestCount = count;
      }
    }
    return { label: best ?? labels[0], priors };
  },
  predict(fitted, features) {
    return features.map(() => fitted.label);
  },
  predictProbabilities(fitted, features) {
    return features.map(() => fitted.priors);
  },
};
