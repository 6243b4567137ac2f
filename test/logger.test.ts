import test from "node:test";
import assert from "node:assert/strict";

import { Logger } from "../src/logger.js";

test("logger writes one timestamped line per message", () => {
  const lines: string[] = [];
  const logger = new Logger({ write: (line) => lines.push(line) });

  logger.info("Tuning knn: points=3");
  logger.warn("Unit failed");
  logger.error("boom");

  assert.equal(lines.length, 3);
  assert.match(lines[0], /^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\] \[INFO\] Tuning knn: points=3\n$/);
  assert.match(lines[1], /\] \[WARN\] Unit failed\n$/);
  assert.match(lines[2], /\] \[ERROR\] boom\n$/);
});

test("debug lines only appear when enabled", () => {
  const quiet: string[] = [];
  new Logger({ write: (line) => quiet.push(line) }).debug("hidden");
  assert.deepEqual(quiet, []);

  const loud: string[] = [];
  new Logger({ debugEnabled: true, write: (line) => loud.push(line) }).debug("shown");
  assert.equal(loud.length, 1);
  assert.match(loud[0], /\] \[DEBUG\] shown\n$/);
});
