import test from "node:test";
import assert from "node:assert/strict";

import { ConfigurationError, InsufficientDataError } from "../src/common/errors.js";
import { makeFolds, split } from "../src/split/splitter.js";
import type { DataRecord, FoldSet } from "../src/types.js";
import { countLabel, makeAlternating } from "./helpers.js";

function assertValidFoldSet(foldSet: FoldSet, partition: readonly number[]): void {
  const seen = new Map<number, number>();
  for (const fold of foldSet.folds) {
    for (const index of fold.heldOut) {
      seen.set(index, (seen.get(index) ?? 0) + 1);
    }
    const heldOut = new Set(fold.heldOut);
    assert.deepEqual(
      [...fold.train],
      partition.filter((index) => !heldOut.has(index)),
    );
  }
  assert.deepEqual(
    [...seen.keys()].sort((a, b) => a - b),
    [...partition],
  );
  assert.ok([...seen.values()].every((count) => count === 1));
}

test("stratified 5-fold over 100 balanced records gives 20 per fold, 10 of each label", () => {
  const dataset = makeAlternating(100);
  const all = dataset.map((_, i) => i);
  const foldSet = makeFolds(dataset, all, { foldCount: 5, stratify: true, seed: 42 });

  assert.equal(foldSet.folds.length, 5);
  for (const fold of foldSet.folds) {
    assert.equal(fold.heldOut.length, 20);
    assert.equal(countLabel(dataset, fold.heldOut, "a"), 10);
    assert.equal(countLabel(dataset, fold.heldOut, "b"), 10);
    assert.equal(fold.train.length, 80);
  }
  assertValidFoldSet(foldSet, all);
});

test("fold assignment is reproducible per seed and changes with the seed", () => {
  const dataset = makeAlternating(100);
  const all = dataset.map((_, i) => i);
  const first = makeFolds(dataset, all, { foldCount: 5, stratify: true, seed: 42 });
  const second = makeFolds(dataset, all, { foldCount: 5, stratify: true, seed: 42 });
  const other = makeFolds(dataset, all, { foldCount: 5, stratify: true, seed: 7 });

  assert.deepEqual(first, second);
  assert.equal(JSON.stringify(first), JSON.stringify(second));
  assert.notDeepEqual(
    first.folds.map((fold) => fold.heldOut),
    other.folds.map((fold) => fold.heldOut),
  );
  assertValidFoldSet(other, all);
  for (const fold of other.folds) {
    assert.equal(countLabel(dataset, fold.heldOut, "a"), 10);
  }
});

test("unstratified folds still cover a partition exactly once", () => {
  const dataset = makeAlternating(23);
  const partition = [0, 2, 3, 5, 8, 9, 10, 14, 15, 17, 20, 22];
  const foldSet = makeFolds(dataset, partition, { foldCount: 5, stratify: false, seed: 3 });

  assert.deepEqual(
    foldSet.folds.map((fold) => fold.heldOut.length),
    [3, 3, 2, 2, 2],
  );
  assertValidFoldSet(foldSet, partition);
});

test("stratified split keeps train and test disjoint and preserves proportions", () => {
  const dataset = makeAlternating(100);
  const { train, test: testPart } = split(dataset, { testFraction: 0.3, stratify: true, seed: 1 });

  assert.equal(testPart.length, 30);
  assert.equal(train.length, 70);
  assert.equal(countLabel(dataset, testPart, "a"), 15);
  const trainSet = new Set(train);
  assert.ok(testPart.every((index) => !trainSet.has(index)));
  assert.deepEqual(
    [...train, ...testPart].sort((a, b) => a - b),
    dataset.map((_, i) => i),
  );
});

test("unstratified split is deterministic for a seed", () => {
  const dataset = makeAlternating(40);
  const a = split(dataset, { testFraction: 0.25, stratify: false, seed: 11 });
  const b = split(dataset, { testFraction: 0.25, stratify: false, seed: 11 });

  assert.equal(a.test.length, 10);
  assert.deepEqual(a, b);
});

test("invalid split and fold parameters are configuration errors", () => {
  const dataset = makeAlternating(20);
  const all = dataset.map((_, i) => i);

  assert.throws(() => split(dataset, { testFraction: 0, stratify: true, seed: 1 }), ConfigurationError);
  assert.throws(() => split(dataset, { testFraction: 1.2, stratify: true, seed: 1 }), ConfigurationError);
  assert.throws(() => split(dataset, { testFraction: 0.2, stratify: true, seed: 1.5 }), ConfigurationError);
  assert.throws(() => makeFolds(dataset, all, { foldCount: 1, stratify: false, seed: 1 }), ConfigurationError);
  assert.throws(() => makeFolds(dataset, all, { foldCount: 21, stratify: false, seed: 1 }), ConfigurationError);
});

test("too little data per class or per partition is reported", () => {
  const skewed: DataRecord[] = [
    ...Array.from({ length: 10 }, (_, i): DataRecord => ({ features: { x: i }, label: "a" })),
    ...Array.from({ length: 3 }, (_, i): DataRecord => ({ features: { x: 100 + i }, label: "b" })),
  ];
  const all = skewed.map((_, i) => i);
  assert.throws(
    () => makeFolds(skewed, all, { foldCount: 5, stratify: true, seed: 1 }),
    (error: unknown) => error instanceof InsufficientDataError && /b=3/.test(error.message),
  );
  assert.doesNotThrow(() => makeFolds(skewed, all, { foldCount: 5, stratify: false, seed: 1 }));

  assert.throws(
    () => split(makeAlternating(3), { testFraction: 0.1, stratify: false, seed: 1 }),
    InsufficientDataError,
  );
});
