import type { ReadinessAssessment } from "../src/readiness.ts";

export function assessment(overrides: Partial<ReadinessAssessment> = {}): ReadinessAssessment {
  return {
    date: "2026-10-06",
    source: "garmin",
    overall: 82,
    components: { hrv: 100, sleep: 70, restingHr: 70 },
    recommendation: "ready",
    concerns: [],
    dataQuality: "complete",
    hrvTrend: "improving",
    hrvZ: 2,
    restingHrZ: 0,
    baselines: { hrv: null, restingHr: null },
    ...overrides,
  };
}
