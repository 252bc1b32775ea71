import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { BiometricCache } from "../src/cache.ts";
import { emptyDay } from "../src/normalize.ts";
import { syncDays, syncRecent } from "../src/sync.ts";
import type { BiometricProvider, DateRange, RawReadings } from "../src/types.ts";

beforeEach(() => {
  vi.stubEnv("PULSE_CONFIG_DIR", mkdtempSync(join(tmpdir(), "pulse-sync-")));
});

function fakeProvider(raw: Partial<RawReadings> = {}) {
  return {
    name: "garmin" as const,
    hrv: vi.fn(async (_range: DateRange) => raw.hrv ?? []),
    restingHeartRate: vi.fn(async (_range: DateRange) => raw.restingHr ?? []),
    steps: vi.fn(async (_range: DateRange) => raw.steps ?? []),
    sleep: vi.fn(async (_range: DateRange) => raw.sleep ?? []),
    json: vi.fn(async () => null),
  } satisfies BiometricProvider;
}

describe("syncRecent", () => {
  it("fetches an empty cache in one window", async () => {
    const provider = fakeProvider({ hrv: [{ date: "2026-10-04", rmssdMs: 48, status: null }] });
    const result = await syncRecent(provider, 3, { now: new Date(2026, 9, 5, 12) });

    expect(provider.hrv).toHaveBeenCalledOnce();
    expect(provider.hrv).toHaveBeenCalledWith({ start: "2026-10-03", end: "2026-10-05" });
    expect(result.fetched).toEqual(["2026-10-03", "2026-10-04", "2026-10-05"]);
    expect(result.cached).toEqual([]);
    expect(result.days.map((d) => d.hrvMs)).toEqual([null, 48, null]);
    expect(new BiometricCache("garmin").stats().entries).toBe(3);
  });

  it("serves settled days from cache and refetches today", async () => {
    await syncRecent(fakeProvider(), 3, { now: new Date(2026, 9, 5, 12) });

    const provider = fakeProvider();
    const result = await syncRecent(provider, 3, { now: new Date(2026, 9, 6, 12) });
    expect(provider.sleep).toHaveBeenCalledWith({ start: "2026-10-05", end: "2026-10-06" });
    expect(result.fetched).toEqual(["2026-10-05", "2026-10-06"]);
    expect(result.cached).toEqual(["2026-10-04"]);
    expect(result.days.map((d) => d.date)).toEqual(["2026-10-04", "2026-10-05", "2026-10-06"]);
  });

  it("refetches everything with force", async () => {
    await syncRecent(fakeProvider(), 3, { now: new Date(2026, 9, 5, 12) });
    const result = await syncRecent(fakeProvider(), 3, { now: new Date(2026, 9, 6, 12), force: true });
    expect(result.fetched).toEqual(["2026-10-04", "2026-10-05", "2026-10-06"]);
    expect(result.cached).toEqual([]);
  });

  it("makes no request when every day is settled", async () => {
    await syncRecent(fakeProvider(), 3, { now: new Date(2026, 9, 5, 12) });
    const provider = fakeProvider();
    const result = await syncDays(provider, {
      range: { start: "2026-10-03", end: "2026-10-04" },
      cache: new BiometricCache("garmin"),
      now: new Date(2026, 9, 6, 12),
    });
    expect(provider.hrv).not.toHaveBeenCalled();
    expect(result.cached).toEqual(["2026-10-03", "2026-10-04"]);
  });
});

describe("syncDays", () => {
  it("refetches settled days caught inside the window", async () => {
    const cache = new BiometricCache("garmin");
    cache.put([{ ...emptyDay("2026-10-04", "garmin"), steps: 7000 }], new Date(2026, 9, 10, 12));

    const provider = fakeProvider({ steps: [{ date: "2026-10-04", steps: 7100, goal: null, distanceMeters: null }] });
    const result = await syncDays(provider, {
      range: { start: "2026-10-03", end: "2026-10-05" },
      cache,
      now: new Date(2026, 9, 10, 12),
    });

    expect(provider.steps).toHaveBeenCalledWith({ start: "2026-10-03", end: "2026-10-05" });
    expect(result.fetched).toEqual(["2026-10-03", "2026-10-04", "2026-10-05"]);
    expect(result.cached).toEqual([]);
    expect(result.days[1]?.steps).toBe(7100);
  });

  it("reports dropped readings and stores the day empty", async () => {
    const provider = fakeProvider({ hrv: [{ date: "2026-10-05", rmssdMs: 900, status: null }] });
    const result = await syncRecent(provider, 1, { now: new Date(2026, 9, 5, 12) });
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({ metric: "hrv", date: "2026-10-05" });
    expect(new BiometricCache("garmin").get("2026-10-05")?.data).toEqual(emptyDay("2026-10-05", "garmin"));
  });

  it("does not write when the provider fails", async () => {
    const provider = fakeProvider();
    provider.sleep.mockRejectedValueOnce(new Error("offline"));
    await expect(syncRecent(provider, 2, { now: new Date(2026, 9, 5, 12) })).rejects.toThrow("offline");
    expect(new BiometricCache("garmin").stats().entries).toBe(0);
  });
});
