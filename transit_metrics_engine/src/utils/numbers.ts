export function isFiniteNumber(value: number): boolean {
  return Number.isFinite(value) && !Number.isNaN(value);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/** Population standard deviation; a single value has zero spread. */
export function standardDeviation(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null) return null;

  let squares = 0;
  for (const value of values) {
    const diff = value - avg;
    squares += diff * diff;
  }
  return Math.sqrt(squares / values.length);
}
