import { z } from "zod";
import {
  HttpClient,
  HttpError,
  PulseError,
  getSecret,
  parseShape,
  setSecret,
  shareInFlight,
  type QueryParams,
} from "@pulse/shared";
import {
  addDays,
  daysBetween,
  eachDate,
  type BiometricProvider,
  type DateRange,
  type HrvReading,
  type RestingHeartRate,
  type SleepSession,
  type StepCount,
} from "@pulse/biometrics";
import { TOOL, USER_AGENT, garminUrls, getValidAccessToken } from "../auth.ts";
import type { UrlBuilder } from "../url-builder.ts";

// Connect rejects step ranges longer than this.
const MAX_STEP_RANGE_DAYS = 28;

// ── Raw API shapes ───────────────────────────────────────────────

const n = z.number().nullish();

const rawHrvSchema = z.object({
  hrvSummary: z.object({
    calendarDate: z.string().nullish(),
    lastNightAvg: n,
    status: z.string().nullish(),
  }).nullish(),
}).nullish();

const rawHeartRateSchema = z.object({
  calendarDate: z.string().nullish(),
  restingHeartRate: n,
}).nullish();

const rawStepsSchema = z.array(z.object({
  calendarDate: z.string(),
  totalSteps: n,
  totalDistance: n,
  stepGoal: n,
})).nullish();

const rawSleepSchema = z.object({
  dailySleepDTO: z.object({
    calendarDate: z.string().nullish(),
    sleepTimeSeconds: n,
    deepSleepSeconds: n,
    remSleepSeconds: n,
    lightSleepSeconds: n,
    awakeSleepSeconds: n,
    sleepScores: z.object({
      overall: z.object({ value: n }).nullish(),
    }).nullish(),
  }).nullish(),
}).nullish();

const rawProfileSchema = z.object({
  displayName: z.string().nullish(),
  userName: z.string().nullish(),
});

// ── Mappers ──────────────────────────────────────────────────────

export function mapHrv(raw: unknown, date: string): HrvReading | null {
  const h = parseShape(rawHrvSchema, raw, "Garmin HRV payload")?.hrvSummary;
  if (h?.lastNightAvg == null) return null;
  return { date: h.calendarDate ?? date, rmssdMs: h.lastNightAvg, status: h.status ?? null };
}

export function mapRestingHeartRate(raw: unknown, date: string): RestingHeartRate | null {
  const r = parseShape(rawHeartRateSchema, raw, "Garmin heart rate payload");
  if (r?.restingHeartRate == null) return null;
  return { date: r.calendarDate ?? date, bpm: r.restingHeartRate };
}

export function mapSteps(raw: unknown): StepCount[] {
  return (parseShape(rawStepsSchema, raw, "Garmin steps payload") ?? [])
    .filter((s) => s.totalSteps != null)
    .map((s) => ({
      date: s.calendarDate,
      steps: s.totalSteps ?? 0,
      goal: s.stepGoal ?? null,
      distanceMeters: s.totalDistance ?? null,
    }));
}

export function mapSleep(raw: unknown, date: string): SleepSession | null {
  const s = parseShape(rawSleepSchema, raw, "Garmin sleep payload")?.dailySleepDTO;
  if (!s?.sleepTimeSeconds) return null;
  return {
    date: s.calendarDate ?? date,
    totalSeconds: s.sleepTimeSeconds,
    deepSeconds: s.deepSleepSeconds ?? 0,
    remSeconds: s.remSleepSeconds ?? 0,
    lightSeconds: s.lightSleepSeconds ?? 0,
    awakeSeconds: s.awakeSleepSeconds ?? 0,
    score: s.sleepScores?.overall?.value ?? null,
  };
}

/** Split a range into consecutive chunks of at most `size` days. */
export function chunkRange(range: DateRange, size: number): DateRange[] {
  const chunks: DateRange[] = [];
  let start = range.start;
  while (daysBetween(start, range.end) >= 0) {
    const end = daysBetween(start, range.end) < size ? range.end : addDays(start, size - 1);
    chunks.push({ start, end });
    start = addDays(end, 1);
  }
  return chunks;
}

// ── Provider ─────────────────────────────────────────────────────

export function createGarminProvider(urls: UrlBuilder = garminUrls()): BiometricProvider {
  const accessToken = shareInFlight(() => getValidAccessToken(urls));

  async function client(): Promise<HttpClient> {
    const token = await accessToken();
    return new HttpClient({
      baseUrl: "",
      headers: { "User-Agent": USER_AGENT, Authorization: `Bearer ${token}` },
    });
  }

  /** 204 and 404 mean "no data for that day". */
  async function getOrGap(http: HttpClient, url: string, params?: QueryParams): Promise<unknown> {
    try {
      return await http.get(url, params);
    } catch (e: unknown) {
      if (e instanceof HttpError && e.status === 404) return undefined;
      throw e;
    }
  }

  async function displayName(http: HttpClient): Promise<string> {
    const cached = getSecret(TOOL, "display-name");
    if (cached) return cached;

    const profile = parseShape(rawProfileSchema, await http.get(urls.userProfile()), "Garmin profile");
    const name = profile.displayName || profile.userName;
    if (!name) throw new PulseError("Could not determine display name from profile");

    setSecret(TOOL, "display-name", name);
    return name;
  }

  async function perDay<T>(
    range: DateRange,
    fetchDay: (http: HttpClient, date: string) => Promise<T | null>,
  ): Promise<T[]> {
    const http = await client();
    const results: T[] = [];
    for (const date of eachDate(range)) {
      const reading = await fetchDay(http, date);
      if (reading) results.push(reading);
    }
    return results;
  }

  return {
    name: "garmin",

    hrv(range) {
      return perDay(range, async (http, date) => mapHrv(await getOrGap(http, urls.hrv(date)), date));
    },

    restingHeartRate(range) {
      return perDay(range, async (http, date) => {
        const name = await displayName(http);
        const raw = await getOrGap(http, `${urls.dailyHeartRate()}/${encodeURIComponent(name)}`, { date });
        return mapRestingHeartRate(raw, date);
      });
    },

    async steps(range) {
      const http = await client();
      const results: StepCount[] = [];
      for (const chunk of chunkRange(range, MAX_STEP_RANGE_DAYS)) {
        const raw = await getOrGap(http, `${urls.dailySteps()}${chunk.start}/${chunk.end}`);
        results.push(...mapSteps(raw));
      }
      return results;
    },

    sleep(range) {
      return perDay(range, async (http, date) => {
        const raw = await getOrGap(http, urls.dailySleep(), { date, nonSleepBufferMinutes: "60" });
        return mapSleep(raw, date);
      });
    },

    async json(path, params) {
      const http = await client();
      return http.get(`${urls.gcApi}${path}`, params);
    },
  };
}
