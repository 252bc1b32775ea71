/** Provider-agnostic biometric types */

import type { ProviderName } from "@pulse/shared";

/** Inclusive calendar range, both ends `YYYY-MM-DD`. */
export interface DateRange {
  start: string;
  end: string;
}

export interface HrvReading {
  date: string;
  rmssdMs: number;
  status: string | null;
}

export interface RestingHeartRate {
  date: string;
  bpm: number;
}

export interface StepCount {
  date: string;
  steps: number;
  goal: number | null;
  distanceMeters: number | null;
}

export interface SleepSession {
  date: string; // the morning the sleep ended
  totalSeconds: number;
  deepSeconds: number;
  remSeconds: number;
  lightSeconds: number;
  awakeSeconds: number;
  score: number | null;
}

export type MetricName = "hrv" | "restingHr" | "steps" | "sleep";

export interface RawReadings {
  hrv: HrvReading[];
  restingHr: RestingHeartRate[];
  steps: StepCount[];
  sleep: SleepSession[];
}

/** One row per calendar day after normalization. */
export interface DailyBiometrics {
  date: string;
  source: ProviderName;
  hrvMs: number | null;
  restingHr: number | null;
  steps: number | null;
  stepGoal: number | null;
  sleepSeconds: number | null;
  deepSleepSeconds: number | null;
  remSleepSeconds: number | null;
  sleepScore: number | null;
}

export interface NormalizationIssue {
  metric: MetricName;
  date: string;
  reason: string;
}

/** Every wearable data provider must implement this interface */
export interface BiometricProvider {
  name: ProviderName;

  hrv(range: DateRange): Promise<HrvReading[]>;
  restingHeartRate(range: DateRange): Promise<RestingHeartRate[]>;
  steps(range: DateRange): Promise<StepCount[]>;
  sleep(range: DateRange): Promise<SleepSession[]>;
  json(path: string, params?: Record<string, string>): Promise<unknown>;
}
