#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";

import { AllPointsFailedError, HarnessAbortedError } from "./common/errors.js";
import { buildCliOptions, parseHarnessConfig } from "./config.js";
import { parseDataset } from "./data/dataset.js";
import { runHarness } from "./harness.js";
import { Logger } from "./logger.js";
import { formatReportMd } from "./report/format.js";
import { serializeReport } from "./report/report.js";
import { formatPoint } from "./tuning/grid.js";

function readJsonFile(path: string): Promise<unknown> {
  return readFile(path, "utf8").then((text) => JSON.parse(text));
}

async function main(): Promise<void> {
  const options = buildCliOptions(process.argv.slice(2), process.env);
  const logger = new Logger({ debugEnabled: options.debug });
  const [configRaw, dataRaw] = await Promise.all([
    readJsonFile(options.configPath),
    readJsonFile(options.dataPath),
  ]);
  const config = parseHarnessConfig(configRaw, options.overrides);
  const dataset = parseDataset(dataRaw);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("SIGINT received, stopping after the running units.");
    controller.abort();
  });

  try {
    const { report } = await runHarness(dataset, config, { logger, signal: controller.signal });
    if (options.reportJson) {
      await writeFile(options.reportJson, serializeReport(report), "utf8");
    }
    if (options.reportMd) {
      await writeFile(options.reportMd, formatReportMd(report), "utf8");
    }
    const primary = report.tuning.primaryMetric;
    process.stdout.write(
      `Finished. model=${report.model} selected={${formatPoint(report.tuning.selected.point)}} ` +
        `cv_${primary}=${report.tuning.selected.cvMean.toFixed(4)} ` +
        `test_${primary}=${(report.final.metrics[primary] ?? Number.NaN).toFixed(4)}\n`,
    );
  } catch (error) {
    if (error instanceof HarnessAbortedError || error instanceof AllPointsFailedError) {
      const partial = error instanceof HarnessAbortedError ? error.partial : error.summaries;
      for (const summary of partial) {
        logger.warn(
          `Point {${formatPoint(summary.point)}}: folds ok ${summary.successfulFoldCount}/${summary.attemptedFoldCount}`,
        );
      }
    }
    throw error;
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal error: ${message}\n`);
  process.exit(1);
});
