import test from "node:test";
import assert from "node:assert/strict";

import { ConfigurationError, FitFailure } from "../src/common/errors.js";
import { knnPlugin } from "../src/models/knn.js";
import { majorityPlugin } from "../src/models/majority.js";
import { nearestCentroidPlugin } from "../src/models/nearestCentroid.js";
import { createModelRegistry, defaultModelRegistry } from "../src/models/registry.js";
import { approxEqual } from "./helpers.js";

const rows = [[0], [1], [10], [11]];
const labels = ["a", "a", "b", "b"];

test("knn votes among the nearest rows", async () => {
  const one = await knnPlugin.fit(knnPlugin.create({ k: 1 }), rows, labels);
  assert.deepEqual(await knnPlugin.predict(one, [[0.4], [10.6]]), ["a", "b"]);

  const three = await knnPlugin.fit(knnPlugin.create({ k: 3 }), rows, labels);
  assert.deepEqual(await knnPlugin.predict(three, [[5]]), ["a"]);
  const [probabilities] = (await knnPlugin.predictProbabilities?.(three, [[5]])) ?? [];
  assert.ok(approxEqual(probabilities.a, 2 / 3));
  assert.ok(approxEqual(probabilities.b, 1 / 3));
});

test("knn distance weighting lets an exact match decide", async () => {
  const fitted = await knnPlugin.fit(knnPlugin.create({ k: 3, weights: "distance" }), rows, labels);
  assert.deepEqual(await knnPlugin.predict(fitted, [[10]]), ["b"]);
});

test("knn rejects bad hyperparameters and k above the training size", () => {
  assert.throws(() => knnPlugin.create({ k: 0 }), FitFailure);
  assert.throws(() => knnPlugin.create({ k: "3" }), FitFailure);
  assert.throws(() => knnPlugin.create({ distance: "cosine" }), FitFailure);
  assert.throws(() => knnPlugin.fit(knnPlugin.create({ k: 5 }), rows, labels), FitFailure);
});

test("nearest centroid assigns rows to the closest class mean", async () => {
  const fitted = await nearestCentroidPlugin.fit(nearestCentroidPlugin.create({}), rows, labels);
  assert.deepEqual(await nearestCentroidPlugin.predict(fitted, [[3], [8]]), ["a", "b"]);

  // Full shrinkage collapses both centroids, so the first label wins.
  const shrunk = await nearestCentroidPlugin.fit(nearestCentroidPlugin.create({ shrink: 1 }), rows, labels);
  assert.deepEqual(await nearestCentroidPlugin.predict(shrunk, [[0], [11]]), ["a", "a"]);

  assert.throws(() => nearestCentroidPlugin.create({ shrink: 2 }), FitFailure);
});

test("majority predicts the most frequent label, first label on ties", async () => {
  const fitted = await majorityPlugin.fit(null, [[0], [0], [0]], ["b", "a", "b"]);
  assert.deepEqual(await majorityPlugin.predict(fitted, [[1], [2]]), ["b", "b"]);
  assert.deepEqual(fitted.priors, { a: 1 / 3, b: 2 / 3 });

  const tied = await majorityPlugin.fit(null, [[0], [0]], ["b", "a"]);
  assert.equal(tied.label, "a");
});

test("registry resolves kinds and rejects unknown or repeated ones", () => {
  const registry = defaultModelRegistry();
  assert.deepEqual(registry.kinds(), ["knn", "majority", "nearestCentroid"]);
  assert.equal(registry.get("knn").kind, "knn");
  assert.equal(registry.has("svm"), false);
  assert.throws(() => registry.get("svm"), ConfigurationError);
  assert.throws(() => createModelRegistry([majorityPlugin, majorityPlugin]), ConfigurationError);
});
