export { runJob, type RunOptions } from "./orchestrator/runCore.js";
export { describeFailure, formatLabel } from "./orchestrator/utils.js";
export { loadRunConfig, validateConfigMapping } from "./pipeline/configValidator.js";
export { loadPriceSeries, parsePriceTable } from "./pipeline/inputLoader.js";
export { computeSignals, rollingMean } from "./pipeline/signalEngine.js";
export { buildErrorResult, buildSuccessResult, reportResult } from "./pipeline/metricsReporter.js";
export { ConfigError, EngineError, InputError, JobError } from "./common/errors.js";
export { RandomState } from "./common/random.js";
export * from "./types.js";
