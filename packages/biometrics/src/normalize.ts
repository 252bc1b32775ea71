import { z } from "zod";
import type { ProviderName } from "@pulse/shared";
import { isValidDate } from "./dates.ts";
import type {
  DailyBiometrics,
  HrvReading,
  MetricName,
  NormalizationIssue,
  RawReadings,
  RestingHeartRate,
  SleepSession,
  StepCount,
} from "./types.ts";

// ── Plausibility schemas ─────────────────────────────────────────

const date = z.string().refine(isValidDate, "invalid date");
const seconds = z.number().finite().min(0);
const score = z.number().finite().min(0).max(100).nullable();

export const hrvReadingSchema = z.object({
  date,
  rmssdMs: z.number().finite().min(1).max(300),
  status: z.string().nullable(),
});

export const restingHeartRateSchema = z.object({
  date,
  bpm: z.number().finite().min(25).max(220),
});

export const stepCountSchema = z.object({
  date,
  steps: z.number().int().min(0).max(200_000),
  goal: z.number().int().min(0).nullable(),
  distanceMeters: z.number().finite().min(0).nullable(),
});

export const sleepSessionSchema = z.object({
  date,
  totalSeconds: seconds.max(86_400),
  deepSeconds: seconds,
  remSeconds: seconds,
  lightSeconds: seconds,
  awakeSeconds: seconds,
  score,
});

export interface NormalizationResult {
  days: DailyBiometrics[];
  issues: NormalizationIssue[];
}

function validate<T extends { date: string }>(
  metric: MetricName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  readings: readonly T[],
  issues: NormalizationIssue[],
): T[] {
  const valid: T[] = [];
  for (const reading of readings) {
    const parsed = schema.safeParse(reading);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      const reason = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      issues.push({ metric, date: String(reading.date), reason });
    }
  }
  return valid;
}

function groupByDate<T extends { date: string }>(readings: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const r of readings) {
    const list = groups.get(r.date);
    if (list) list.push(r);
    else groups.set(r.date, [r]);
  }
  return groups;
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function emptyDay(date: string, source: ProviderName): DailyBiometrics {
  return {
    date,
    source,
    hrvMs: null,
    restingHr: null,
    steps: null,
    stepGoal: null,
    sleepSeconds: null,
    deepSleepSeconds: null,
    remSleepSeconds: null,
    sleepScore: null,
  };
}

/**
 * Validate raw provider readings and fold them into one row per day.
 *
 * Same-day duplicates: HRV is averaged, resting HR takes the lowest value,
 * steps the highest count, and sleep the longest session.
 */
export function normalize(source: ProviderName, raw: RawReadings): NormalizationResult {
  const issues: NormalizationIssue[] = [];
  const hrv = validate<HrvReading>("hrv", hrvReadingSchema, raw.hrv, issues);
  const rhr = validate<RestingHeartRate>("restingHr", restingHeartRateSchema, raw.restingHr, issues);
  const steps = validate<StepCount>("steps", stepCountSchema, raw.steps, issues);
  const sleep = validate<SleepSession>("sleep", sleepSessionSchema, raw.sleep, issues);

  const days = new Map<string, DailyBiometrics>();
  const day = (d: string): DailyBiometrics => {
    let row = days.get(d);
    if (!row) {
      row = emptyDay(d, source);
      days.set(d, row);
    }
    return row;
  };

  for (const [d, list] of groupByDate(hrv)) {
    day(d).hrvMs = round1(list.reduce((sum, r) => sum + r.rmssdMs, 0) / list.length);
  }

  for (const [d, list] of groupByDate(rhr)) {
    day(d).restingHr = Math.min(...list.map((r) => r.bpm));
  }

  for (const [d, list] of groupByDate(steps)) {
    const best = list.reduce((a, b) => (b.steps > a.steps ? b : a));
    const row = day(d);
    row.steps = best.steps;
    row.stepGoal = best.goal;
  }

  for (const [d, list] of groupByDate(sleep)) {
    const longest = list.reduce((a, b) => (b.totalSeconds > a.totalSeconds ? b : a));
    const row = day(d);
    row.sleepSeconds = longest.totalSeconds;
    row.deepSleepSeconds = longest.deepSeconds;
    row.remSleepSeconds = longest.remSeconds;
    row.sleepScore = longest.score;
  }

  return {
    days: [...days.values()].sort((a, b) => a.date.localeCompare(b.date)),
    issues,
  };
}
