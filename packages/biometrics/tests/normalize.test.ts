import { describe, expect, it } from "vitest";
import { emptyDay, normalize } from "../src/normalize.ts";

describe("normalize", () => {
  it("folds same-day duplicates", () => {
    const { days, issues } = normalize("garmin", {
      hrv: [
        { date: "2026-10-02", rmssdMs: 50, status: null },
        { date: "2026-10-02", rmssdMs: 55, status: null },
      ],
      restingHr: [
        { date: "2026-10-02", bpm: 52 },
        { date: "2026-10-02", bpm: 49 },
      ],
      steps: [
        { date: "2026-10-02", steps: 3000, goal: 8000, distanceMeters: null },
        { date: "2026-10-02", steps: 9000, goal: 10000, distanceMeters: 7000 },
      ],
      sleep: [
        { date: "2026-10-02", totalSeconds: 1800, deepSeconds: 0, remSeconds: 0, lightSeconds: 1800, awakeSeconds: 0, score: null },
        { date: "2026-10-02", totalSeconds: 25200, deepSeconds: 5400, remSeconds: 6300, lightSeconds: 13500, awakeSeconds: 600, score: 82 },
      ],
    });

    expect(issues).toEqual([]);
    expect(days).toEqual([{
      date: "2026-10-02",
      source: "garmin",
      hrvMs: 52.5,
      restingHr: 49,
      steps: 9000,
      stepGoal: 10000,
      sleepSeconds: 25200,
      deepSleepSeconds: 5400,
      remSleepSeconds: 6300,
      sleepScore: 82,
    }]);
  });

  it("orders days and leaves missing metrics null", () => {
    const { days } = normalize("whoop", {
      hrv: [{ date: "2026-10-03", rmssdMs: 60, status: null }],
      restingHr: [{ date: "2026-10-01", bpm: 50 }],
      steps: [],
      sleep: [],
    });
    expect(days.map((d) => d.date)).toEqual(["2026-10-01", "2026-10-03"]);
    expect(days[0]).toEqual({ ...emptyDay("2026-10-01", "whoop"), restingHr: 50 });
  });

  it("drops implausible readings and reports them", () => {
    const { days, issues } = normalize("garmin", {
      hrv: [{ date: "2026-10-02", rmssdMs: 900, status: null }],
      restingHr: [{ date: "2026-13-01", bpm: 50 }],
      steps: [{ date: "2026-10-02", steps: -5, goal: null, distanceMeters: null }],
      sleep: [],
    });
    expect(days).toEqual([]);
    expect(issues.map((i) => [i.metric, i.date])).toEqual([
      ["hrv", "2026-10-02"],
      ["restingHr", "2026-13-01"],
      ["steps", "2026-10-02"],
    ]);
    expect(issues[0]?.reason).toMatch(/^rmssdMs: /);
  });
});
