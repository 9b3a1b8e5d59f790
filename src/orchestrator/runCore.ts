import { performance } from "node:perf_hooks";
import { ConfigError } from "../common/errors.js";
import { RandomState } from "../common/random.js";
import { Logger } from "../logger.js";
import { loadRunConfig } from "../pipeline/configValidator.js";
import { loadPriceSeries } from "../pipeline/inputLoader.js";
import {
  DEFAULT_VERSION,
  buildErrorResult,
  buildSuccessResult,
  reportResult,
} from "../pipeline/metricsReporter.js";
import { computeSignals } from "../pipeline/signalEngine.js";
import type { ConfigLabel, JobArgs, JobOutcome, RunResult, TextSink } from "../types.js";
import { describeFailure, elapsedMs, formatLabel } from "./utils.js";

export interface RunOptions {
  logger?: Logger;
  stdout?: TextSink;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

export async function runJob(args: JobArgs, options: RunOptions = {}): Promise<JobOutcome> {
  const now = options.now ?? (() => performance.now());
  const startedMs = now();
  const logger =
    options.logger ??
    new Logger({
      debugEnabled: args.debug,
      filePath: args.logFilePath,
      console: process.stderr,
    });
  logger.info("=== Job started ===");
  logger.debug(
    `Arguments: input=${args.inputPath}, config=${args.configPath}, output=${args.outputPath}, ` +
      `log_file=${args.logFilePath}`,
  );

  let version: ConfigLabel = DEFAULT_VERSION;
  let result: RunResult;
  try {
    const config = await loadRunConfig(args.configPath);
    version = config.version;
    logger.info(
      `Config loaded + validated: version=${formatLabel(config.version)}, ` +
        `seed=${config.seed}, window=${config.window}`,
    );
    // Seeded once, before any input is read.
    const random = new RandomState(config.seed);
    logger.debug(`Random state seeded with ${random.seed}`);

    const series = await loadPriceSeries(args.inputPath);
    logger.info(`Rows loaded: ${series.rows.length}`);
    logger.debug(`Columns present: [${series.columns.join(", ")}]`);

    const computation = computeSignals(series, config.window);
    logger.info(`Rolling mean computed with window=${computation.window}`);
    logger.info(
      `Signal generated: rows_processed=${computation.rowsProcessed}, ` +
        `valid_rows=${computation.validRows}, signal_rate=${computation.signalRate.toFixed(4)}`,
    );

    result = buildSuccessResult({
      version,
      rowsProcessed: computation.rowsProcessed,
      signalRate: computation.signalRate,
      seed: random.seed,
      latencyMs: elapsedMs(startedMs, now()),
    });
  } catch (error) {
    if (error instanceof ConfigError && error.knownVersion !== undefined) {
      version = error.knownVersion;
    }
    const message = describeFailure(error);
    logger.error(message);
    result = buildErrorResult(version, message);
  }

  await reportResult(args.outputPath, result, { stdout: options.stdout });

  if (result.status === "error") {
    logger.error(`Job failed, status=error. Metrics written to ${args.outputPath}`);
    return { result, exitCode: 1 };
  }
  logger.info(`Metrics summary: ${JSON.stringify(result)}`);
  logger.info(`Job completed successfully. latency=${result.latency_ms}ms, status=success`);
  return { result, exitCode: 0 };
}
