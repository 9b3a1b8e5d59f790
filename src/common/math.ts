export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function sortedDifference(required: readonly string[], present: Iterable<string>): string[] {
  const seen = new Set(present);
  return required.filter((key) => !seen.has(key)).sort();
}
