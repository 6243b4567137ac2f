import test from "node:test";
import assert from "node:assert/strict";

import { ConfigurationError, DataShapeError } from "../src/common/errors.js";
import { toFeatureMatrix } from "../src/data/dataset.js";
import type { ModelPlugin } from "../src/models/types.js";
import { applyPipeline, fitPipeline, validatePipeline } from "../src/preprocess/pipeline.js";
import { evaluateUnit, type EvaluationContext } from "../src/tuning/resampleEvaluator.js";
import type { DataRecord, FeatureMatrix } from "../src/types.js";
import { approxEqual } from "./helpers.js";

const small: FeatureMatrix = {
  featureNames: ["a", "b"],
  rows: [
    [1, 10],
    [3, 10],
    [5, 10],
  ],
};

test("standardize learns train means and population scales, constant columns keep scale 1", () => {
  const state = fitPipeline([{ kind: "standardize" }], small);
  const out = applyPipeline(state, { featureNames: ["a", "b"], rows: [[3, 10], [7, 12]] });

  assert.deepEqual(out.rows[0], [0, 0]);
  assert.ok(approxEqual(out.rows[1][0], 4 / Math.sqrt(8 / 3)));
  assert.equal(out.rows[1][1], 2);
  assert.deepEqual(out.featureNames, ["a", "b"]);
});

test("minMax maps the train range onto [0, 1]", () => {
  const state = fitPipeline([{ kind: "minMax" }], small);
  const out = applyPipeline(state, { featureNames: ["a", "b"], rows: [[5, 11], [3, 10]] });

  assert.deepEqual(out.rows, [
    [1, 1],
    [0.5, 0],
  ]);
});

test("pca finds the shared direction of perfectly correlated features", () => {
  const line: FeatureMatrix = {
    featureNames: ["u", "v"],
    rows: [
      [0, 0],
      [1, 1],
      [2, 2],
      [3, 3],
    ],
  };
  const state = fitPipeline([{ kind: "pca", components: 1 }], line);
  const [step] = state.steps;
  assert.equal(step.kind, "pca");
  if (step.kind === "pca") {
    assert.ok(approxEqual(step.explainedVariance[0], 10 / 3));
    assert.ok(approxEqual(step.loadings[0][0], Math.SQRT1_2));
    assert.ok(approxEqual(step.loadings[0][1], Math.SQRT1_2));
  }
  assert.deepEqual(state.outputNames, ["pc1"]);

  const out = applyPipeline(state, { featureNames: ["u", "v"], rows: [[3, 3]] });
  assert.ok(approxEqual(out.rows[0][0], 3 / Math.SQRT2));
});

test("select keeps the named columns in the given order", () => {
  const state = fitPipeline([{ kind: "select", features: ["b"] }], small);
  assert.deepEqual(applyPipeline(state, small).rows, [[10], [10], [10]]);
  assert.deepEqual(state.outputNames, ["b"]);
});

test("fitted states are frozen without freezing the caller's feature names", () => {
  const featureNames = ["a", "b"];
  const state = fitPipeline([{ kind: "standardize" }, { kind: "minMax" }], { featureNames, rows: small.rows });

  assert.ok(Object.isFrozen(state));
  assert.ok(Object.isFrozen(state.steps[0]));
  assert.ok(Object.isFrozen(state.steps[0].inputNames));
  assert.ok(Object.isFrozen(state.inputNames));
  assert.equal(Object.isFrozen(featureNames), false);
  featureNames.push("c");
  assert.deepEqual(state.inputNames, ["a", "b"]);
});

test("validatePipeline chains output names and rejects impossible steps", () => {
  assert.deepEqual(
    validatePipeline([{ kind: "select", features: ["a", "b"] }, { kind: "pca", components: 1 }], ["a", "b", "c"]),
    ["pc1"],
  );
  assert.throws(() => validatePipeline([{ kind: "pca", components: 3 }], ["a", "b"]), ConfigurationError);
  assert.throws(() => validatePipeline([{ kind: "select", features: ["z"] }], ["a", "b"]), ConfigurationError);
  assert.throws(
    () => validatePipeline([{ kind: "select", features: ["a"] }, { kind: "select", features: ["b"] }], ["a", "b"]),
    ConfigurationError,
  );
});

test("shape mismatches are data shape errors", () => {
  const state = fitPipeline([{ kind: "standardize" }], small);
  assert.throws(() => applyPipeline(state, { featureNames: ["b", "a"], rows: [[1, 2]] }), DataShapeError);
  assert.throws(() => applyPipeline(state, { featureNames: ["a", "b"], rows: [[1]] }), DataShapeError);
  assert.throws(() => fitPipeline([{ kind: "minMax" }], { featureNames: ["a"], rows: [] }), DataShapeError);
});

test("pipeline statistics never see held-out rows", async () => {
  const records: DataRecord[] = [
    ...Array.from({ length: 8 }, (_, i): DataRecord => ({ features: { x: i, y: 2 * i }, label: i % 2 ? "b" : "a" })),
    { features: { x: 1000, y: -500 }, label: "a" },
    { features: { x: 2000, y: 900 }, label: "b" },
  ];
  const seen: number[][][] = [];
  const spy: ModelPlugin<null, string> = {
    kind: "spy",
    create: () => null,
    fit(_handle, features) {
      seen.push(features.map((row) => [...row]));
      return "a";
    },
    predict: (fitted, features) => features.map(() => fitted),
  };
  const context: EvaluationContext = {
    dataset: records,
    featureNames: ["x", "y"],
    labels: ["a", "b"],
    positiveLabel: "b",
    steps: [{ kind: "standardize" }],
    metrics: ["accuracy"],
  };

  const record = await evaluateUnit(
    spy,
    { point: {}, pointKey: "[]", fold: { index: 0, train: [0, 1, 2, 3, 4, 5, 6, 7], heldOut: [8, 9] } },
    context,
  );

  assert.equal(record.ok, true);
  assert.equal(record.metrics.accuracy, 0.5);
  const [trainRows] = seen;
  assert.equal(trainRows.length, 8);
  for (let col = 0; col < 2; col += 1) {
    const column = trainRows.map((row) => row[col]);
    const mean = column.reduce((acc, value) => acc + value, 0) / column.length;
    const variance = column.reduce((acc, value) => acc + (value - mean) ** 2, 0) / column.length;
    assert.ok(approxEqual(mean, 0));
    assert.ok(approxEqual(variance, 1));
  }

  const direct = fitPipeline([{ kind: "standardize" }], toFeatureMatrix(records, [0, 1, 2, 3, 4, 5, 6, 7], ["x", "y"]));
  const [step] = direct.steps;
  if (step.kind === "standardize") {
    assert.deepEqual(step.means, [3.5, 7]);
  }
});
