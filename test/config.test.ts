import test from "node:test";
import assert from "node:assert/strict";

import { ConfigurationError, DataShapeError } from "../src/common/errors.js";
import { buildCliOptions, parseHarnessConfig } from "../src/config.js";
import { parseDataset } from "../src/data/dataset.js";

test("parseHarnessConfig fills the documented defaults", () => {
  const config = parseHarnessConfig({ model: "knn" });

  assert.equal(config.model, "knn");
  assert.equal(config.testFraction, 0.25);
  assert.equal(config.foldCount, 5);
  assert.equal(config.stratify, true);
  assert.equal(config.seed, 42);
  assert.deepEqual(config.grid, [{}]);
  assert.deepEqual(config.metrics, ["accuracy"]);
  assert.equal(config.primaryMetric, "accuracy");
  assert.equal(config.tieBreak, "lexicographic");
  assert.deepEqual(config.preprocess, []);
  assert.equal(config.positiveLabel, undefined);
  assert.equal(config.concurrency, undefined);
});

test("metrics come out in canonical order without repeats", () => {
  const config = parseHarnessConfig({
    model: "knn",
    metrics: ["rocAuc", "f1", "accuracy", "f1"],
    primaryMetric: "f1",
  });
  assert.deepEqual(config.metrics, ["accuracy", "f1", "rocAuc"]);
});

test("invalid configs are configuration errors naming the field", () => {
  assert.throws(
    () => parseHarnessConfig({ model: "knn", metrics: ["accuracy"], primaryMetric: "f1" }),
    (error: unknown) => error instanceof ConfigurationError && /primaryMetric/.test(error.message),
  );
  assert.throws(
    () => parseHarnessConfig({ model: "knn", foldCount: 1 }),
    (error: unknown) => error instanceof ConfigurationError && /foldCount/.test(error.message),
  );
  assert.throws(() => parseHarnessConfig({ model: "knn", testFraction: 1 }), ConfigurationError);
  assert.throws(() => parseHarnessConfig({ model: "knn", folds: 3 }), ConfigurationError);
  assert.throws(() => parseHarnessConfig({}), ConfigurationError);
  assert.throws(() => parseHarnessConfig("knn"), ConfigurationError);
  assert.throws(
    () => parseHarnessConfig({ model: "knn", preprocess: [{ kind: "pca", components: 0 }] }),
    ConfigurationError,
  );
});

test("overrides replace file values when they are set", () => {
  const config = parseHarnessConfig(
    { model: "knn", seed: 1, foldCount: 4 },
    { seed: 9, foldCount: undefined, concurrency: 2 },
  );
  assert.equal(config.seed, 9);
  assert.equal(config.foldCount, 4);
  assert.equal(config.concurrency, 2);
});

test("buildCliOptions reads flags and environment", () => {
  const options = buildCliOptions(
    ["--config", "harness.json", "--data", "rows.json", "--seed", "7", "--report-md", "out.md", "--debug"],
    { FOLDWISE_CONCURRENCY: "3" },
  );

  assert.equal(options.configPath, "harness.json");
  assert.equal(options.dataPath, "rows.json");
  assert.equal(options.reportMd, "out.md");
  assert.equal(options.reportJson, undefined);
  assert.equal(options.debug, true);
  assert.deepEqual(options.overrides, {
    seed: 7,
    foldCount: undefined,
    testFraction: undefined,
    concurrency: 3,
  });

  const quiet = buildCliOptions(["--config", "c.json", "--data", "d.json"], { FOLDWISE_DEBUG: "no" });
  assert.equal(quiet.debug, false);
  const loud = buildCliOptions(["--config", "c.json", "--data", "d.json"], { FOLDWISE_DEBUG: "1" });
  assert.equal(loud.debug, true);
});

test("buildCliOptions rejects missing paths and non-numeric overrides", () => {
  assert.throws(() => buildCliOptions(["--config", "c.json"], {}), ConfigurationError);
  assert.throws(
    () => buildCliOptions(["--config", "c.json", "--data", "d.json", "--folds", "many"], {}),
    ConfigurationError,
  );
});

test("parseDataset normalises labels to strings and checks shape", () => {
  const dataset = parseDataset([
    { features: { x: 1, y: 2 }, label: 1 },
    { features: { y: 0, x: 3 }, label: "0" },
  ]);
  assert.deepEqual(
    dataset.map((record) => record.label),
    ["1", "0"],
  );
  assert.ok(Object.isFrozen(dataset));

  assert.throws(() => parseDataset([]), DataShapeError);
  assert.throws(() => parseDataset([{ features: { x: 1 }, label: "a" }, { features: { z: 1 }, label: "b" }]), DataShapeError);
  assert.throws(() => parseDataset([{ features: { x: "1" }, label: "a" }]), DataShapeError);
});
