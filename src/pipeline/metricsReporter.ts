import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { roundTo } from "../common/math.js";
import {
  SIGNAL_RATE_METRIC,
  type ConfigLabel,
  type ErrorResult,
  type RunResult,
  type SuccessResult,
  type TextSink,
} from "../types.js";

export const DEFAULT_VERSION = "v1";
const RATE_DIGITS = 4;

export interface SuccessInput {
  version: ConfigLabel;
  rowsProcessed: number;
  signalRate: number;
  seed: number;
  latencyMs: number;
}

export interface ReportOptions {
  stdout?: TextSink;
}

export function buildSuccessResult(input: SuccessInput): SuccessResult {
  const result: SuccessResult = {
    version: input.version,
    rows_processed: input.rowsProcessed,
    metric: SIGNAL_RATE_METRIC,
    value: roundTo(input.signalRate, RATE_DIGITS),
    latency_ms: input.latencyMs,
    seed: input.seed,
    status: "success",
  };
  return Object.freeze(result);
}

export function buildErrorResult(version: ConfigLabel, message: string): ErrorResult {
  const result: ErrorResult = {
    version,
    status: "error",
    error_message: message,
  };
  return Object.freeze(result);
}

export function formatResult(result: RunResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Overwrites `outputPath` with the result document, then echoes it to stdout.
 * A failed write rejects; there is no other channel to report it on.
 */
export async function reportResult(
  outputPath: string,
  result: RunResult,
  options: ReportOptions = {},
): Promise<void> {
  const stdout = options.stdout ?? process.stdout;
  const document = formatResult(result);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${document}\n`, "utf8");
  stdout.write(`${document}\n`);
}
