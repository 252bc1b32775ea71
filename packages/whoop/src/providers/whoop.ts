import { z } from "zod";
import {
  HttpClient,
  getValidAccessToken,
  parseShape,
  shareInFlight,
  type OAuth2Config,
} from "@pulse/shared";
import {
  addDays,
  isoDatePart,
  type BiometricProvider,
  type DateRange,
  type HrvReading,
  type RestingHeartRate,
  type SleepSession,
} from "@pulse/biometrics";

export const TOOL = "whoop";
const BASE_URL = "https://api.prod.whoop.com/developer";
const PAGE_SIZE = "25";
const MAX_PAGES = 40;

export const OAUTH2_CONFIG: OAuth2Config = {
  authorizeUrl: "https://api.prod.whoop.com/oauth/oauth2/auth",
  tokenUrl: "https://api.prod.whoop.com/oauth/oauth2/token",
  scopes: [
    "read:recovery",
    "read:cycles",
    "read:sleep",
    "read:workout",
    "read:profile",
    "read:body_measurement",
    "offline",
  ],
};

// ── Raw API types (snake_case) ───────────────────────────────────

const rawRecoverySchema = z.object({
  cycle_id: z.number(),
  created_at: z.string(),
  score_state: z.string(),
  score: z.object({
    recovery_score: z.number(),
    hrv_rmssd_milli: z.number(),
    resting_heart_rate: z.number(),
  }).nullish(),
});

const rawSleepSchema = z.object({
  id: z.union([z.number(), z.string()]),
  start: z.string(),
  end: z.string(),
  nap: z.boolean(),
  score_state: z.string(),
  score: z.object({
    sleep_performance_percentage: z.number().nullish(),
    stage_summary: z.object({
      total_in_bed_time_milli: z.number(),
      total_awake_time_milli: z.number(),
      total_light_sleep_time_milli: z.number(),
      total_slow_wave_sleep_time_milli: z.number(),
      total_rem_sleep_time_milli: z.number(),
    }),
  }).nullish(),
});

const pageSchema = z.object({
  records: z.array(z.unknown()).nullish(),
  next_token: z.string().nullish(),
});

type RawRecovery = z.infer<typeof rawRecoverySchema>;
type RawSleep = z.infer<typeof rawSleepSchema>;

// ── Helpers ──────────────────────────────────────────────────────

export async function getAll<T>(
  http: HttpClient,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params?: Record<string, string>,
): Promise<T[]> {
  const all: T[] = [];
  let nextToken: string | undefined;
  for (let i = 0; i < MAX_PAGES; i++) {
    const page = parseShape(pageSchema, await http.get(path, { ...params, limit: PAGE_SIZE, nextToken }), `WHOOP ${path} page`);
    for (const record of page.records ?? []) {
      all.push(parseShape(schema, record, `WHOOP ${path} record`));
    }
    if (!page.next_token) break;
    nextToken = page.next_token;
  }
  return all;
}

/**
 * WHOOP filters on timestamps. Pad a day either side so records dated by
 * their local morning are not cut off; callers trim to the range.
 */
export function rangeParams(range: DateRange): Record<string, string> {
  return {
    start: `${addDays(range.start, -1)}T00:00:00.000Z`,
    end: `${addDays(range.end, 1)}T23:59:59.999Z`,
  };
}

function inRange(date: string, range: DateRange): boolean {
  return date >= range.start && date <= range.end;
}

const MS = 1000;

// ── Mappers ──────────────────────────────────────────────────────

export function mapRecoveryHrv(r: RawRecovery): HrvReading | null {
  if (!r.score || r.score_state !== "SCORED") return null;
  return {
    date: isoDatePart(r.created_at),
    rmssdMs: Math.round(r.score.hrv_rmssd_milli * 10) / 10,
    status: null,
  };
}

export function mapRecoveryRhr(r: RawRecovery): RestingHeartRate | null {
  if (!r.score || r.score_state !== "SCORED") return null;
  return { date: isoDatePart(r.created_at), bpm: r.score.resting_heart_rate };
}

export function mapSleep(r: RawSleep): SleepSession | null {
  if (r.nap || !r.score || r.score_state !== "SCORED") return null;
  const st = r.score.stage_summary;
  const asleepMs = st.total_in_bed_time_milli - st.total_awake_time_milli;
  return {
    date: isoDatePart(r.end),
    totalSeconds: Math.round(asleepMs / MS),
    deepSeconds: Math.round(st.total_slow_wave_sleep_time_milli / MS),
    remSeconds: Math.round(st.total_rem_sleep_time_milli / MS),
    lightSeconds: Math.round(st.total_light_sleep_time_milli / MS),
    awakeSeconds: Math.round(st.total_awake_time_milli / MS),
    score: r.score.sleep_performance_percentage ?? null,
  };
}

function present<T>(value: T | null): value is T {
  return value !== null;
}

// ── Provider ─────────────────────────────────────────────────────

export function createWhoopProvider(): BiometricProvider {
  const accessToken = shareInFlight(() => getValidAccessToken(TOOL, OAUTH2_CONFIG));

  async function client(): Promise<HttpClient> {
    const token = await accessToken();
    return new HttpClient({
      baseUrl: BASE_URL,
      headers: { Authorization: `Bearer ${token}` },
    });
  }

  // HRV and resting heart rate both come from the recovery list; fetch it once per range.
  const recoveryFetches = new Map<string, Promise<RawRecovery[]>>();

  function recoveries(range: DateRange): Promise<RawRecovery[]> {
    const key = `${range.start}/${range.end}`;
    let pending = recoveryFetches.get(key);
    if (!pending) {
      pending = client().then((http) => getAll(http, "/v2/recovery", rawRecoverySchema, rangeParams(range)));
      recoveryFetches.set(key, pending);
    }
    return pending;
  }

  return {
    name: "whoop",

    async hrv(range) {
      return (await recoveries(range))
        .map(mapRecoveryHrv)
        .filter(present)
        .filter((r) => inRange(r.date, range));
    },

    async restingHeartRate(range) {
      return (await recoveries(range))
        .map(mapRecoveryRhr)
        .filter(present)
        .filter((r) => inRange(r.date, range));
    },

    // WHOOP does not count steps.
    async steps() {
      return [];
    },

    async sleep(range) {
      const http = await client();
      const raw = await getAll(http, "/v2/activity/sleep", rawSleepSchema, rangeParams(range));
      return raw
        .map(mapSleep)
        .filter(present)
        .filter((s) => inRange(s.date, range));
    },

    async json(path, params) {
      const http = await client();
      return http.get(path, params);
    },
  };
}
