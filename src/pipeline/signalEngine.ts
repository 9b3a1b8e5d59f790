import { EngineError } from "../common/errors.js";
import { mean } from "../common/math.js";
import type { PriceSeries, Signal, SignalComputation, SignalRow } from "../types.js";

// Relative distance below which a close is compared against an exact resum.
const TIE_TOLERANCE = 1e-9;

/**
 * Simple moving average of `closes` over `window` rows.
 *
 * Entries before the first full window are `undefined`; there is no partial
 * averaging or padding. A sliding sum keeps this O(n); it is resummed from
 * scratch once every `window` rows so float drift stays bounded.
 */
export function rollingMean(closes: readonly number[], window: number): Array<number | undefined> {
  assertWindow(window);
  const means: Array<number | undefined> = [];
  let sum = 0;
  for (let index = 0; index < closes.length; index += 1) {
    const start = index - window + 1;
    if (start >= 0 && start % window === 0) {
      sum = sumRange(closes, start, index + 1);
    } else {
      sum += closes[index];
      if (start > 0) {
        sum -= closes[start - 1];
      }
    }
    means.push(start < 0 ? undefined : sum / window);
  }
  return means;
}

export function deriveSignal(close: number, average: number): Signal {
  return close > average ? 1 : 0;
}

export function computeSignals(series: PriceSeries, window: number): SignalComputation {
  assertWindow(window);
  const closes = series.rows.map((row) => row.close);
  const means = rollingMean(closes, window);

  const rows = closes.map((close, index): SignalRow => {
    const sliding = means[index];
    if (sliding === undefined) {
      return { close };
    }
    const average = isNearTie(close, sliding)
      ? mean(closes.slice(index - window + 1, index + 1))
      : sliding;
    return { close, rollingMean: average, signal: deriveSignal(close, average) };
  });

  const signals = rows.flatMap((row) => (row.signal === undefined ? [] : [row.signal]));
  if (signals.length === 0) {
    throw new EngineError(
      "insufficient_history",
      `No valid rolling-mean rows; series shorter than window (rows=${rows.length}, window=${window})`,
    );
  }

  return {
    rows,
    window,
    rowsProcessed: rows.length,
    validRows: signals.length,
    signalRate: mean(signals),
  };
}

function isNearTie(close: number, average: number): boolean {
  return Math.abs(close - average) <= TIE_TOLERANCE * Math.max(1, Math.abs(close));
}

function sumRange(values: readonly number[], start: number, end: number): number {
  let total = 0;
  for (let index = start; index < end; index += 1) {
    total += values[index];
  }
  return total;
}

function assertWindow(window: number): void {
  if (!Number.isSafeInteger(window) || window < 1) {
    throw new EngineError("invalid_window", `window must be a positive integer, got ${window}`);
  }
}
