import { ConfigurationError, InsufficientDataError } from "../common/errors.js";
import { createRng, shuffleInPlace } from "../common/random.js";
import { groupByLabel } from "../data/dataset.js";
import type { Dataset, Fold, FoldSet, Partition, SplitResult } from "../types.js";

export interface SplitOptions {
  testFraction: number;
  stratify: boolean;
  seed: number;
}

export interface FoldOptions {
  foldCount: number;
  stratify: boolean;
  seed: number;
}

function ascending(values: Iterable<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

function freezePartition(values: Iterable<number>): Partition {
  return Object.freeze(ascending(values));
}

function assertSeed(seed: number): void {
  if (!Number.isInteger(seed)) {
    throw new ConfigurationError(`seed must be an integer, got ${seed}.`);
  }
}

/**
 * Splits quotas so they sum to `total`: floors first, then the largest
 * remainders (ties go to the larger class, then to the earlier class).
 */
function allocateQuotas(sizes: number[], fraction: number, total: number): number[] {
  const exact = sizes.map((size) => size * fraction);
  const quotas = exact.map((value) => Math.floor(value));
  let remaining = total - quotas.reduce((acc, value) => acc + value, 0);
  const order = sizes
    .map((size, index) => ({ index, size, remainder: exact[index] - quotas[index] }))
    .sort((a, b) => {
      if (b.remainder !== a.remainder) return b.remainder - a.remainder;
      if (b.size !== a.size) return b.size - a.size;
      return a.index - b.index;
    });
  for (const entry of order) {
    if (remaining <= 0) {
      break;
    }
    if (quotas[entry.index] < sizes[entry.index]) {
      quotas[entry.index] += 1;
      remaining -= 1;
    }
  }
  return quotas;
}

export function split(dataset: Dataset, options: SplitOptions): SplitResult {
  const { testFraction, stratify, seed } = options;
  if (!(testFraction > 0 && testFraction < 1)) {
    throw new ConfigurationError(`testFraction must be in (0, 1), got ${testFraction}.`);
  }
  assertSeed(seed);

  const n = dataset.length;
  const testSize = Math.round(n * testFraction);
  if (testSize === 0 || testSize === n) {
    throw new InsufficientDataError(
      `testFraction=${testFraction} over ${n} records leaves an empty ${testSize === 0 ? "test" : "train"} partition.`,
    );
  }

  const rng = createRng(seed);
  const all = dataset.map((_, index) => index);
  const test: number[] = [];

  if (stratify) {
    const groups = groupByLabel(dataset, all);
    const quotas = allocateQuotas(
      groups.map((group) => group.members.length),
      testFraction,
      testSize,
    );
    groups.forEach((group, groupIndex) => {
      const shuffled = shuffleInPlace([...group.members], rng);
      test.push(...shuffled.slice(0, quotas[groupIndex]));
    });
  } else {
    test.push(...shuffleInPlace(all, rng).slice(0, testSize));
  }

  const testSet = new Set(test);
  return {
    train: freezePartition(dataset.map((_, index) => index).filter((index) => !testSet.has(index))),
    test: freezePartition(testSet),
  };
}

export function makeFolds(dataset: Dataset, partition: Partition, options: FoldOptions): FoldSet {
  const { foldCount, stratify, seed } = options;
  if (!Number.isInteger(foldCount) || foldCount < 2) {
    throw new ConfigurationError(`foldCount must be an integer >= 2, got ${foldCount}.`);
  }
  if (foldCount > partition.length) {
    throw new ConfigurationError(
      `foldCount=${foldCount} exceeds the partition size ${partition.length}.`,
    );
  }
  assertSeed(seed);

  const rng = createRng(seed);
  const buckets: number[][] = Array.from({ length: foldCount }, () => []);
  let counter = 0;

  if (stratify) {
    const groups = groupByLabel(dataset, partition);
    const short = groups.filter((group) => group.members.length < foldCount);
    if (short.length > 0) {
      const detail = short.map((group) => `${group.label}=${group.members.length}`).join(", ");
      throw new InsufficientDataError(
        `Stratified ${foldCount}-fold split needs at least ${foldCount} members per label (${detail}).`,
      );
    }
    // One running counter across classes keeps fold sizes within one of each other.
    for (const group of groups) {
      for (const index of shuffleInPlace([...group.members], rng)) {
        buckets[counter % foldCount].push(index);
        counter += 1;
      }
    }
  } else {
    for (const index of shuffleInPlace([...partition], rng)) {
      buckets[counter % foldCount].push(index);
      counter += 1;
    }
  }

  const folds: Fold[] = buckets.map((bucket, index) => {
    const heldOutSet = new Set(bucket);
    return Object.freeze({
      index,
      train: freezePartition(partition.filter((value) => !heldOutSet.has(value))),
      heldOut: freezePartition(bucket),
    });
  });

  return Object.freeze({
    foldCount,
    stratified: stratify,
    folds: Object.freeze(folds),
  });
}
