import { z } from "zod";
import { UsageError } from "./common/errors.js";
import type { JobArgs } from "./types.js";

export const USAGE =
  "Usage: signal-job --input <data.csv> --config <config.yaml> --output <metrics.json> " +
  "--log-file <run.log> [--debug]";

const requiredPath = (flag: string) =>
  z.string({ required_error: `--${flag} is required`, invalid_type_error: `--${flag} needs a value` })
    .trim()
    .min(1, `--${flag} needs a value`);

const schema = z.object({
  inputPath: requiredPath("input"),
  configPath: requiredPath("config"),
  outputPath: requiredPath("output"),
  logFilePath: requiredPath("log-file"),
  debug: z.boolean(),
});

type CliRaw = Record<string, string | boolean>;

export function buildJobArgs(argv: string[]): JobArgs {
  const args = parseCliArgs(argv);

  const parsed = schema.safeParse({
    inputPath: args["input"],
    configPath: args["config"],
    outputPath: args["output"],
    logFilePath: args["log-file"],
    debug: readBool(args, "debug", false),
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message);
    throw new UsageError(problems.join("; "), USAGE);
  }
  return parsed.data;
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
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}
