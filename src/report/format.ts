import { formatPoint } from "../tuning/grid.js";
import type { ConfusionTable, MetricName, MetricStat } from "../types.js";
import type { HarnessReport } from "./report.js";

function formatRate(value: number | null | undefined): string {
  if (typeof value !== "number") {
    return "-";
  }
  return value.toFixed(4);
}

function formatStat(stat: MetricStat | undefined): string {
  if (!stat || stat.mean === null) {
    return "-";
  }
  return stat.sd === null ? formatRate(stat.mean) : `${formatRate(stat.mean)} ± ${formatRate(stat.sd)}`;
}

function formatConfusion(table: ConfusionTable): string[] {
  const lines = [
    `| actual \\ predicted | ${table.labels.join(" | ")} |`,
    `|---|${table.labels.map(() => "---:").join("|")}|`,
  ];
  table.labels.forEach((label, row) => {
    lines.push(`| ${label} | ${table.counts[row].join(" | ")} |`);
  });
  return lines;
}

export function formatReportMd(report: HarnessReport): string {
  const metrics: MetricName[] = report.config.metrics;
  const lines: string[] = [];
  lines.push(`# Model selection: ${report.model}`);
  lines.push("");
  lines.push("## Setup");
  lines.push(`- Records: ${report.dataset.size} (features=${report.dataset.featureNames.length}, labels=${report.dataset.labels.join("/")})`);
  lines.push(`- Train/test: ${report.split.trainSize}/${report.split.testSize} (testFraction=${report.config.testFraction}, stratify=${report.config.stratify}, seed=${report.config.seed})`);
  lines.push(`- Folds: ${report.config.foldCount} (held-out sizes ${report.split.heldOutSizes.join(", ")})`);
  lines.push(`- Preprocess: ${report.config.preprocess.map((step) => step.kind).join(" -> ") || "none"}`);
  lines.push(`- Primary metric: ${report.tuning.primaryMetric} (tie-break: ${report.tuning.tieBreak}, positive label: ${report.config.positiveLabel})`);
  lines.push("");
  lines.push("## Cross-validation (model-selection signal, not a performance estimate)");
  lines.push("");
  lines.push(`| Rank | Point | Folds ok | ${metrics.join(" | ")} |`);
  lines.push(`|---:|---|---:|${metrics.map(() => "---:").join("|")}|`);
  for (const summary of report.tuning.summaries) {
    const cells = metrics.map((name) => formatStat(summary.metrics[name]));
    lines.push(
      `| ${summary.rank ?? "-"} | \`${formatPoint(summary.point)}\` | ${summary.successfulFoldCount}/${summary.attemptedFoldCount} | ${cells.join(" | ")} |`,
    );
  }
  const failing = report.tuning.summaries.filter((summary) => summary.failures.length > 0);
  if (failing.length > 0) {
    lines.push("");
    lines.push("### Failed units");
    for (const summary of failing) {
      for (const failure of summary.failures) {
        lines.push(`- \`${formatPoint(summary.point)}\` fold ${failure.foldIndex} (${failure.stage}): ${failure.message}`);
      }
    }
  }
  lines.push("");
  lines.push(`Selected: \`${formatPoint(report.tuning.selected.point)}\` (cv ${report.tuning.primaryMetric}=${formatRate(report.tuning.selected.cvMean)}, folds ok ${report.tuning.selected.successfulFoldCount})`);
  lines.push("");
  lines.push("## Held-out test performance");
  lines.push(`- Fitted on ${report.final.trainSize} train records, scored once on ${report.final.testSize} test records`);
  for (const name of metrics) {
    lines.push(`- ${name}: ${formatRate(report.final.metrics[name])}`);
  }
  lines.push("");
  lines.push(...formatConfusion(report.final.confusion));
  return `${lines.join("\n")}\n`;
}
