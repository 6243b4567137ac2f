import { z } from "zod";

import { ConfigurationError } from "./common/errors.js";
import { METRIC_NAMES, TIE_BREAK_RULES } from "./types.js";

const hyperparameterValue = z.union([z.number(), z.string(), z.boolean()]);

const gridSchema = z.union([
  z.array(z.record(z.string(), hyperparameterValue)),
  z.object({ axes: z.record(z.string(), z.array(hyperparameterValue).min(1)) }).strict(),
]);

const stepSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("standardize") }).strict(),
  z.object({ kind: z.literal("minMax") }).strict(),
  z.object({ kind: z.literal("pca"), components: z.number().int().positive() }).strict(),
  z.object({ kind: z.literal("select"), features: z.array(z.string()).min(1) }).strict(),
]);

export const HarnessConfigSchema = z
  .object({
    model: z.string().min(1),
    testFraction: z.number().gt(0).lt(1).default(0.25),
    foldCount: z.number().int().min(2).default(5),
    stratify: z.boolean().default(true),
    seed: z.number().int().default(42),
    grid: gridSchema.default([{}]),
    metrics: z
      .array(z.enum(METRIC_NAMES))
      .min(1)
      .default(["accuracy"])
      .transform((names) => METRIC_NAMES.filter((name) => names.includes(name))),
    primaryMetric: z.enum(METRIC_NAMES).default("accuracy"),
    tieBreak: z.enum(TIE_BREAK_RULES).default("lexicographic"),
    preprocess: z.array(stepSchema).default([]),
    positiveLabel: z.string().min(1).optional(),
    concurrency: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!config.metrics.includes(config.primaryMetric)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["primaryMetric"],
        message: `primaryMetric "${config.primaryMetric}" is not among metrics [${config.metrics.join(", ")}]`,
      });
    }
  });

export type HarnessConfig = z.output<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

export interface ConfigOverrides {
  seed?: number;
  foldCount?: number;
  testFraction?: number;
  concurrency?: number;
}

export interface CliOptions {
  configPath: string;
  dataPath: string;
  reportJson?: string;
  reportMd?: string;
  debug: boolean;
  overrides: ConfigOverrides;
}

type CliRaw = Record<string, string | boolean>;

export function parseHarnessConfig(raw: unknown, overrides: ConfigOverrides = {}): HarnessConfig {
  const merged = isPlainObject(raw) ? { ...raw, ...definedEntries(overrides) } : raw;
  const parsed = HarnessConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid harness config: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function buildCliOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const args = parseCliArgs(argv);
  const configPath = readString(args, "config");
  const dataPath = readString(args, "data");
  if (!configPath || !dataPath) {
    throw new ConfigurationError("Both --config and --data are required.");
  }
  return {
    configPath,
    dataPath,
    reportJson: readString(args, "report-json"),
    reportMd: readString(args, "report-md"),
    debug: readBool(args, "debug", readEnvBool(env, "FOLDWISE_DEBUG", false)),
    overrides: {
      seed: readNumber(args, "seed"),
      foldCount: readNumber(args, "folds"),
      testFraction: readNumber(args, "test-fraction"),
      concurrency: readNumber(args, "concurrency") ?? readEnvInt(env, "FOLDWISE_CONCURRENCY"),
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function definedEntries(overrides: ConfigOverrides): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === "number") {
      out[key] = value;
    }
  }
  return out;
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function readNumber(args: CliRaw, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`--${key} expects a number, got "${value}".`);
  }
  return parsed;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  return parseBoolText(value) ?? fallback;
}

function parseBoolText(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return undefined;
}

function readEnvBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  return parseBoolText(raw) ?? fallback;
}

function readEnvInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return undefined;
  }
  return parsed;
}
