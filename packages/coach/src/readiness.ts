import {
  baseline,
  clamp,
  mean,
  trend,
  zScore,
  type Baseline,
  type DailyBiometrics,
  type Trend,
} from "@pulse/biometrics";
import type { ProviderName } from "@pulse/shared";

export type Recommendation = "ready" | "light" | "rest" | "unknown";

export type Concern =
  | "hrv_suppressed"
  | "elevated_resting_hr"
  | "short_sleep"
  | "poor_sleep_score"
  | "low_activity";

export type DataQuality = "complete" | "partial" | "insufficient";

export interface ReadinessOptions {
  baselineDays: number;
  sleepTargetHours: number;
}

export interface ComponentScores {
  hrv: number | null;
  sleep: number | null;
  restingHr: number | null;
}

export interface ReadinessAssessment {
  date: string;
  source: ProviderName;
  overall: number | null;
  components: ComponentScores;
  recommendation: Recommendation;
  concerns: Concern[];
  dataQuality: DataQuality;
  hrvTrend: Trend;
  hrvZ: number | null;
  restingHrZ: number | null;
  baselines: {
    hrv: Baseline | null;
    restingHr: Baseline | null;
  };
}

export const WEIGHTS: Record<keyof ComponentScores, number> = {
  hrv: 0.4,
  sleep: 0.35,
  restingHr: 0.25,
};

export const THRESHOLDS = {
  ready: 75,
  light: 55,
  shortSleepSeconds: 6 * 3600,
  poorSleepScore: 60,
  lowActivitySteps: 5000,
  zConcern: 1,
};

const TREND_WINDOW = 7;
const ACTIVITY_WINDOW = 3;

function values(days: readonly DailyBiometrics[], pick: (d: DailyBiometrics) => number | null): number[] {
  const out: number[] = [];
  for (const d of days) {
    const v = pick(d);
    if (v != null) out.push(v);
  }
  return out;
}

export function recommend(overall: number | null): Recommendation {
  if (overall == null) return "unknown";
  if (overall >= THRESHOLDS.ready) return "ready";
  if (overall >= THRESHOLDS.light) return "light";
  return "rest";
}

function roundOrNull(value: number | null): number | null {
  return value == null ? null : Math.round(value);
}

/**
 * Score today's readiness against personal baselines built from `history`
 * (earlier days only, newest `baselineDays` of them).
 *
 * HRV above baseline raises the score, resting HR above baseline lowers it.
 * Missing components drop out and the remaining weights are renormalised.
 */
export function assessReadiness(
  today: DailyBiometrics,
  history: readonly DailyBiometrics[],
  opts: ReadinessOptions,
): ReadinessAssessment {
  const past = history
    .filter((d) => d.date < today.date)
    .sort((a, b) => a.date.localeCompare(b.date))
    .slice(-opts.baselineDays);

  const hrvHistory = values(past, (d) => d.hrvMs);
  const hrvBase = baseline(hrvHistory);
  const rhrBase = baseline(values(past, (d) => d.restingHr));

  const hrvZ = today.hrvMs != null && hrvBase ? zScore(today.hrvMs, hrvBase) : null;
  const restingHrZ = today.restingHr != null && rhrBase ? zScore(today.restingHr, rhrBase) : null;

  let sleep: number | null = null;
  if (today.sleepScore != null) {
    sleep = clamp(today.sleepScore);
  } else if (today.sleepSeconds != null) {
    sleep = clamp((100 * today.sleepSeconds) / (opts.sleepTargetHours * 3600));
  }

  // Unrounded; only the reported values are rounded.
  const raw: ComponentScores = {
    hrv: hrvZ != null ? clamp(70 + 15 * hrvZ) : null,
    sleep,
    restingHr: restingHrZ != null ? clamp(70 - 15 * restingHrZ) : null,
  };
  const components: ComponentScores = {
    hrv: roundOrNull(raw.hrv),
    sleep: roundOrNull(raw.sleep),
    restingHr: roundOrNull(raw.restingHr),
  };

  let weighted = 0;
  let available = 0;
  let present = 0;
  for (const key of ["hrv", "sleep", "restingHr"] as const) {
    const score = raw[key];
    if (score == null) continue;
    weighted += score * WEIGHTS[key];
    available += WEIGHTS[key];
    present++;
  }
  const overall = available > 0 ? Math.round(weighted / available) : null;

  const concerns: Concern[] = [];
  if (hrvZ != null && hrvZ <= -THRESHOLDS.zConcern) concerns.push("hrv_suppressed");
  if (restingHrZ != null && restingHrZ >= THRESHOLDS.zConcern) concerns.push("elevated_resting_hr");
  if (today.sleepSeconds != null && today.sleepSeconds < THRESHOLDS.shortSleepSeconds) {
    concerns.push("short_sleep");
  }
  if (today.sleepScore != null && today.sleepScore < THRESHOLDS.poorSleepScore) {
    concerns.push("poor_sleep_score");
  }
  const recentSteps = values(past.slice(-ACTIVITY_WINDOW), (d) => d.steps);
  if (recentSteps.length > 0 && mean(recentSteps) < THRESHOLDS.lowActivitySteps) {
    concerns.push("low_activity");
  }

  const hrvSeries = today.hrvMs != null ? [...hrvHistory, today.hrvMs] : hrvHistory;

  return {
    date: today.date,
    source: today.source,
    overall,
    components,
    recommendation: recommend(overall),
    concerns,
    dataQuality: present === 3 ? "complete" : present > 0 ? "partial" : "insufficient",
    hrvTrend: trend(hrvSeries.slice(-TREND_WINDOW)),
    hrvZ,
    restingHrZ,
    baselines: { hrv: hrvBase, restingHr: rhrBase },
  };
}
