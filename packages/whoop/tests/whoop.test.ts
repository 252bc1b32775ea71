import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  MemoryStore,
  getSecret,
  saveOAuth2Credentials,
  saveTokens,
  useSecretStore,
} from "@pulse/shared";
import {
  OAUTH2_CONFIG,
  createWhoopProvider,
  mapRecoveryHrv,
  mapRecoveryRhr,
  mapSleep,
  rangeParams,
} from "../src/providers/whoop.ts";

const recovery = {
  cycle_id: 1,
  created_at: "2026-10-02T06:40:00.000Z",
  score_state: "SCORED",
  score: { recovery_score: 71, hrv_rmssd_milli: 54.321, resting_heart_rate: 51 },
};

const sleep = {
  id: "s-1",
  start: "2026-10-01T22:30:00.000Z",
  end: "2026-10-02T06:30:00.000Z",
  nap: false,
  score_state: "SCORED",
  score: {
    sleep_performance_percentage: 88,
    stage_summary: {
      total_in_bed_time_milli: 28_800_000,
      total_awake_time_milli: 1_800_000,
      total_light_sleep_time_milli: 14_400_000,
      total_slow_wave_sleep_time_milli: 5_400_000,
      total_rem_sleep_time_milli: 7_200_000,
    },
  },
};

describe("recovery mappers", () => {
  it("dates readings by creation and rounds HRV", () => {
    expect(mapRecoveryHrv(recovery)).toEqual({ date: "2026-10-02", rmssdMs: 54.3, status: null });
    expect(mapRecoveryRhr(recovery)).toEqual({ date: "2026-10-02", bpm: 51 });
  });

  it("ignores unscored cycles", () => {
    expect(mapRecoveryHrv({ ...recovery, score_state: "PENDING_SCORE" })).toBeNull();
    expect(mapRecoveryRhr({ ...recovery, score: null })).toBeNull();
  });
});

describe("mapSleep", () => {
  it("counts time asleep as in bed minus awake", () => {
    expect(mapSleep(sleep)).toEqual({
      date: "2026-10-02",
      totalSeconds: 27_000,
      deepSeconds: 5400,
      remSeconds: 7200,
      lightSeconds: 14_400,
      awakeSeconds: 1800,
      score: 88,
    });
  });

  it("skips naps", () => {
    expect(mapSleep({ ...sleep, nap: true })).toBeNull();
  });
});

describe("rangeParams", () => {
  it("pads a day either side", () => {
    expect(rangeParams({ start: "2026-10-01", end: "2026-10-07" })).toEqual({
      start: "2026-09-30T00:00:00.000Z",
      end: "2026-10-08T23:59:59.999Z",
    });
  });
});

describe("createWhoopProvider", () => {
  beforeEach(() => {
    useSecretStore(new MemoryStore());
    saveTokens("whoop", { accessToken: "test-token", refreshToken: "r1", expiresAt: Math.floor(Date.now() / 1000) + 3600 });
  });

  it("follows next_token and trims to the range", async () => {
    const outside = { ...recovery, cycle_id: 2, created_at: "2026-09-30T06:40:00.000Z" };
    const fetchMock = vi.fn(async (url: string, _init?: RequestInit) => {
      const page = new URL(url).searchParams.get("nextToken")
        ? { records: [outside], next_token: null }
        : { records: [recovery], next_token: "p2" };
      return new Response(JSON.stringify(page));
    });
    vi.stubGlobal("fetch", fetchMock);

    const readings = await createWhoopProvider().hrv({ start: "2026-10-01", end: "2026-10-02" });
    expect(readings).toEqual([{ date: "2026-10-02", rmssdMs: 54.3, status: null }]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const first = new URL(fetchMock.mock.calls[0]?.[0] ?? "");
    expect(first.pathname).toBe("/developer/v2/recovery");
    expect(first.searchParams.get("start")).toBe("2026-09-30T00:00:00.000Z");
    expect(first.searchParams.get("limit")).toBe("25");
  });

  it("refreshes an expired token once for metrics fetched together", async () => {
    saveOAuth2Credentials("whoop", {
      clientId: "test-client", clientSecret: "test-secret", redirectUri: "http://localhost/callback",
    });
    saveTokens("whoop", { accessToken: "stale-token", refreshToken: "r1", expiresAt: 0 });

    const used = new Set<string>();
    const paths: string[] = [];
    const fetchMock = vi.fn(async (url: string, init?: RequestInit) => {
      if (url === OAUTH2_CONFIG.tokenUrl) {
        const refreshToken = new URLSearchParams(String(init?.body)).get("refresh_token") ?? "";
        if (used.has(refreshToken)) {
          return new Response(JSON.stringify({ error: "invalid_grant" }), { status: 400 });
        }
        used.add(refreshToken);
        return new Response(JSON.stringify({ access_token: "fresh-token", refresh_token: "r2", expires_in: 3600 }));
      }
      paths.push(new URL(url).pathname);
      const records = url.includes("/activity/sleep") ? [sleep] : [recovery];
      return new Response(JSON.stringify({ records, next_token: null }));
    });
    vi.stubGlobal("fetch", fetchMock);

    const provider = createWhoopProvider();
    const range = { start: "2026-10-01", end: "2026-10-02" };
    const [hrv, rhr, nights] = await Promise.all([
      provider.hrv(range), provider.restingHeartRate(range), provider.sleep(range),
    ]);

    expect(hrv).toEqual([{ date: "2026-10-02", rmssdMs: 54.3, status: null }]);
    expect(rhr).toEqual([{ date: "2026-10-02", bpm: 51 }]);
    expect(nights).toHaveLength(1);
    expect(used).toEqual(new Set(["r1"]));
    expect(getSecret("whoop", "refresh-token")).toBe("r2");
    expect(paths.sort()).toEqual(["/developer/v2/activity/sleep", "/developer/v2/recovery"]);
  });

  it("has no step data", async () => {
    expect(await createWhoopProvider().steps({ start: "2026-10-01", end: "2026-10-02" })).toEqual([]);
  });
});
