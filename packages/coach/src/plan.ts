import { median, type DailyBiometrics } from "@pulse/biometrics";
import type { ReadinessAssessment, Recommendation } from "./readiness.ts";

export interface DailyPlan {
  stepTarget: number;
  sessions: string[];
  sleepTargetHours: number;
}

const DEFAULT_STEP_BASE = 8000;
const MIN_REST_STEPS = 4000;

const STEP_FACTOR: Record<Recommendation, number> = {
  ready: 1.1,
  light: 1.0,
  rest: 0.7,
  unknown: 1.0,
};

const SESSIONS: Record<Recommendation, string[]> = {
  ready: [
    "Quality session: intervals or tempo, 45-60 min",
    "Strength: full body, moderate to heavy",
  ],
  light: [
    "Zone 2 cardio, 30-45 min",
    "Mobility, 15 min",
  ],
  rest: [
    "Rest day or an easy walk, 20-30 min",
    "Breathing or gentle mobility, 10 min",
  ],
  unknown: [
    "Easy zone 2 session, 30 min",
    "Sync a few more days to build a baseline",
  ],
};

function roundTo(n: number, step: number): number {
  return Math.round(n / step) * step;
}

export function buildPlan(
  assessment: ReadinessAssessment,
  history: readonly DailyBiometrics[],
  sleepTargetHours: number,
): DailyPlan {
  const steps = history.map((d) => d.steps).filter((s): s is number => s != null);
  const base = steps.length > 0 ? median(steps) : DEFAULT_STEP_BASE;

  let stepTarget = roundTo(base * STEP_FACTOR[assessment.recommendation], 500);
  if (assessment.recommendation === "rest") stepTarget = Math.max(MIN_REST_STEPS, stepTarget);

  const sessions = [...SESSIONS[assessment.recommendation]];
  const shortSleep = assessment.concerns.includes("short_sleep");
  if (shortSleep || assessment.concerns.includes("hrv_suppressed")) {
    sessions.push("Aim for an earlier bedtime tonight");
  }

  return {
    stepTarget,
    sessions,
    sleepTargetHours: shortSleep ? sleepTargetHours + 0.5 : sleepTargetHours,
  };
}
