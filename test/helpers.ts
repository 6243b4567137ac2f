import { Logger } from "../src/logger.js";
import type { DataRecord, Dataset } from "../src/types.js";

/** `size` records alternating between labels "a" and "b". */
export function makeAlternating(size: number): Dataset {
  return Array.from({ length: size }, (_, i): DataRecord => ({
    features: { x: i, y: (i * 7) % 11 },
    label: i % 2 === 0 ? "a" : "b",
  }));
}

/** Records whose label is "pos" when x >= threshold, "neg" otherwise. */
export function makeSeparable(size: number, threshold = size / 2): Dataset {
  return Array.from({ length: size }, (_, i): DataRecord => ({
    features: { x: i, y: (i * 37) % 11 },
    label: i >= threshold ? "pos" : "neg",
  }));
}

export function silentLogger(lines: string[] = []): Logger {
  return new Logger({ debugEnabled: true, write: (line) => lines.push(line) });
}

export function countLabel(dataset: Dataset, indices: readonly number[], label: string): number {
  return indices.filter((index) => dataset[index].label === label).length;
}

export function approxEqual(actual: number, expected: number, tolerance = 1e-9): boolean {
  return Math.abs(actual - expected) <= tolerance;
}
