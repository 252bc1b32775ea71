import { describe, expect, it } from "vitest";
import {
  baseline,
  clamp,
  mean,
  median,
  rollingMean,
  slope,
  stddev,
  trend,
  zScore,
} from "../src/stats.ts";

describe("summary statistics", () => {
  it("computes mean and sample standard deviation", () => {
    expect(mean([])).toBe(0);
    expect(mean([45, 55, 45, 55, 50])).toBe(50);
    expect(stddev([45, 55, 45, 55, 50])).toBe(5);
    expect(stddev([7])).toBe(0);
  });

  it("takes the median of odd and even lists", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });

  it("needs four samples for a baseline", () => {
    expect(baseline([50, 51, 52])).toBeNull();
    expect(baseline([45, 55, 45, 55, 50])).toEqual({ mean: 50, sd: 5, n: 5 });
  });

  it("scores against a baseline", () => {
    expect(zScore(60, { mean: 50, sd: 5, n: 5 })).toBe(2);
    expect(zScore(60, { mean: 50, sd: 0, n: 5 })).toBe(0);
  });

  it("averages over a trailing window", () => {
    expect(rollingMean([1, 2, 3, 4], 2)).toEqual([1, 1.5, 2.5, 3.5]);
  });

  it("clamps to 0..100", () => {
    expect(clamp(130)).toBe(100);
    expect(clamp(-4)).toBe(0);
    expect(clamp(42)).toBe(42);
  });
});

describe("trend", () => {
  it("follows the slope", () => {
    expect(slope([1, 2, 3])).toBe(1);
    expect(trend([50, 52, 54])).toBe("improving");
    expect(trend([54, 52, 50])).toBe("declining");
  });

  it("inverts for lower-is-better series", () => {
    expect(trend([50, 52, 54], false)).toBe("declining");
  });

  it("ignores tiny changes and short series", () => {
    expect(trend([50, 50, 50.2])).toBe("stable");
    expect(trend([50, 60])).toBe("unknown");
  });
});
