import { z } from "zod";

import { DataShapeError } from "../common/errors.js";
import { isFiniteNumber } from "../common/math.js";
import type { Dataset, FeatureMatrix, Label, Partition } from "../types.js";

const recordSchema = z.object({
  features: z.record(z.string(), z.number()),
  label: z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
});

export const DatasetSchema = z.array(recordSchema);

export interface DatasetShape {
  featureNames: string[];
  labels: Label[];
  size: number;
}

/**
 * Parses untrusted JSON rows into a Dataset and checks its shape.
 * Labels given as numbers or booleans are kept as their string form.
 */
export function parseDataset(raw: unknown): Dataset {
  const parsed = DatasetSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DataShapeError(
      `Invalid dataset at ${issue ? issue.path.join(".") || "<root>" : "<root>"}: ${issue?.message ?? "unknown issue"}`,
    );
  }
  const dataset = Object.freeze(parsed.data.map((row) => Object.freeze(row)));
  describeDataset(dataset);
  return dataset;
}

export function describeDataset(dataset: Dataset): DatasetShape {
  if (dataset.length === 0) {
    throw new DataShapeError("Dataset is empty.");
  }
  const featureNames = Object.keys(dataset[0].features).sort();
  if (featureNames.length === 0) {
    throw new DataShapeError("Dataset records carry no features.");
  }
  const labels = new Set<Label>();
  for (let index = 0; index < dataset.length; index += 1) {
    const record = dataset[index];
    const names = Object.keys(record.features).sort();
    if (names.length !== featureNames.length || names.some((name, i) => name !== featureNames[i])) {
      throw new DataShapeError(
        `Record ${index} has features [${names.join(",")}], expected [${featureNames.join(",")}].`,
      );
    }
    for (const name of featureNames) {
      if (!isFiniteNumber(record.features[name])) {
        throw new DataShapeError(`Record ${index} has a non-finite value for feature "${name}".`);
      }
    }
    labels.add(record.label);
  }
  return {
    featureNames,
    labels: sortLabels(labels),
    size: dataset.length,
  };
}

export function sortLabels(labels: Iterable<Label>): Label[] {
  return [...new Set(labels)].sort(compareCodeUnits);
}

export function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function toFeatureMatrix(
  dataset: Dataset,
  indices: Partition,
  featureNames: readonly string[],
): FeatureMatrix {
  return {
    featureNames,
    rows: indices.map((index) => featureNames.map((name) => dataset[index].features[name])),
  };
}

export function labelsAt(dataset: Dataset, indices: Partition): Label[] {
  return indices.map((index) => dataset[index].label);
}

/** Groups indices by label; both the groups and their members come out in ascending order. */
export function groupByLabel(dataset: Dataset, indices: Partition): Array<{ label: Label; members: number[] }> {
  const byLabel = new Map<Label, number[]>();
  for (const index of indices) {
    const label = dataset[index].label;
    const members = byLabel.get(label);
    if (members) {
      members.push(index);
    } else {
      byLabel.set(label, [index]);
    }
  }
  return sortLabels(byLabel.keys()).map((label) => ({
    label,
    members: [...(byLabel.get(label) ?? [])].sort((a, b) => a - b),
  }));
}
