export const MIN_BASELINE_SAMPLES = 4;

export interface Baseline {
  mean: number;
  sd: number;
  n: number;
}

export type Trend = "improving" | "declining" | "stable" | "unknown";

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation (n − 1); 0 for fewer than two values. */
export function stddev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

export function baseline(values: readonly number[]): Baseline | null {
  if (values.length < MIN_BASELINE_SAMPLES) return null;
  return { mean: mean(values), sd: stddev(values), n: values.length };
}

export function zScore(value: number, base: Baseline): number {
  if (base.sd === 0) return 0;
  return (value - base.mean) / base.sd;
}

/** Least-squares slope of values against their index. */
export function slope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let num = 0;
  let den = 0;
  values.forEach((y, x) => {
    num += (x - xMean) * (y - yMean);
    den += (x - xMean) ** 2;
  });
  return num / den;
}

/**
 * Direction of a series: a slope beyond ±1% of the mean per step counts.
 * With `higherIsBetter` false (e.g. resting HR) a rising series is declining.
 */
export function trend(values: readonly number[], higherIsBetter = true): Trend {
  if (values.length < 3) return "unknown";
  const m = mean(values);
  if (m === 0) return "stable";
  const relative = slope(values) / Math.abs(m);
  if (Math.abs(relative) <= 0.01) return "stable";
  const rising = relative > 0;
  return rising === higherIsBetter ? "improving" : "declining";
}

export function rollingMean(values: readonly number[], window: number): number[] {
  return values.map((_, i) => mean(values.slice(Math.max(0, i - window + 1), i + 1)));
}

export function clamp(n: number, lo = 0, hi = 100): number {
  return Math.min(hi, Math.max(lo, n));
}
