export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Opaque release label carried from the config into the metrics document. */
export type ConfigLabel = JsonValue;

export interface RunConfig {
  readonly seed: number;
  readonly window: number;
  readonly version: ConfigLabel;
}

export interface JobArgs {
  inputPath: string;
  configPath: string;
  outputPath: string;
  logFilePath: string;
  debug: boolean;
}

export interface PriceRow {
  close: number;
  /** Raw cell values keyed by header, close included. */
  fields: Record<string, string>;
}

export interface PriceSeries {
  /** Header names in file order. */
  columns: string[];
  rows: PriceRow[];
}

export type Signal = 0 | 1;

export interface SignalRow {
  close: number;
  rollingMean?: number;
  signal?: Signal;
}

export interface SignalComputation {
  rows: SignalRow[];
  window: number;
  rowsProcessed: number;
  validRows: number;
  signalRate: number;
}

export const SIGNAL_RATE_METRIC = "signal_rate";

export interface SuccessResult {
  readonly version: ConfigLabel;
  readonly rows_processed: number;
  readonly metric: typeof SIGNAL_RATE_METRIC;
  readonly value: number;
  readonly latency_ms: number;
  readonly seed: number;
  readonly status: "success";
}

export interface ErrorResult {
  readonly version: ConfigLabel;
  readonly status: "error";
  readonly error_message: string;
}

export type RunResult = SuccessResult | ErrorResult;

export interface JobOutcome {
  result: RunResult;
  exitCode: 0 | 1;
}

/** Minimal writable surface shared by process streams and test captures. */
export interface TextSink {
  write(chunk: string): unknown;
}
