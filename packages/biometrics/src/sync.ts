import { debug } from "@pulse/shared";
import { BiometricCache } from "./cache.ts";
import { eachDate, lastNDays } from "./dates.ts";
import { emptyDay, normalize } from "./normalize.ts";
import type {
  BiometricProvider,
  DailyBiometrics,
  DateRange,
  NormalizationIssue,
} from "./types.ts";

export interface SyncOptions {
  range: DateRange;
  cache: BiometricCache;
  now?: Date;
  force?: boolean;
}

export interface SyncResult {
  days: DailyBiometrics[];
  fetched: string[];
  cached: string[];
  issues: NormalizationIssue[];
}

/**
 * Fill `range` from cache where the cached day is settled, fetch the rest
 * in one contiguous window, and write the fetched days back.
 */
export async function syncDays(
  provider: BiometricProvider,
  opts: SyncOptions,
): Promise<SyncResult> {
  const now = opts.now ?? new Date();
  const dates = eachDate(opts.range);
  const cachedEntries = opts.cache.getRange(opts.range);

  const missing = dates.filter((date) => {
    const entry = cachedEntries.get(date);
    return opts.force || !entry || !opts.cache.isSettled(date, entry);
  });

  const first = missing[0];
  const last = missing[missing.length - 1];
  const window: DateRange | null = first && last ? { start: first, end: last } : null;
  // One contiguous fetch: settled days caught inside the window are refreshed too.
  const fetched = window ? eachDate(window) : [];
  const inWindow = new Set(fetched);

  const fromCache = new Map<string, DailyBiometrics>();
  for (const [date, entry] of cachedEntries) {
    if (!inWindow.has(date)) fromCache.set(date, entry.data);
  }
  debug(`sync ${provider.name}: ${fromCache.size} cached, ${fetched.length} to fetch`);

  let issues: NormalizationIssue[] = [];
  const fetchedDays = new Map<string, DailyBiometrics>();

  if (window) {
    const [hrv, restingHr, steps, sleep] = await Promise.all([
      provider.hrv(window),
      provider.restingHeartRate(window),
      provider.steps(window),
      provider.sleep(window),
    ]);
    const result = normalize(provider.name, { hrv, restingHr, steps, sleep });
    issues = result.issues;
    for (const day of result.days) {
      if (inWindow.has(day.date)) fetchedDays.set(day.date, day);
    }
    // Days the provider had nothing for are stored too, so they are not refetched once settled.
    const toStore = fetched.map((d) => fetchedDays.get(d) ?? emptyDay(d, provider.name));
    opts.cache.put(toStore, now);
    for (const day of toStore) fetchedDays.set(day.date, day);
  }

  return {
    days: dates.map((d) => fromCache.get(d) ?? fetchedDays.get(d) ?? emptyDay(d, provider.name)),
    fetched,
    cached: dates.filter((d) => fromCache.has(d)),
    issues,
  };
}

/** Sync the `days` calendar days ending today through the provider's cache. */
export async function syncRecent(
  provider: BiometricProvider,
  days: number,
  opts: { force?: boolean; now?: Date } = {},
): Promise<SyncResult> {
  const now = opts.now ?? new Date();
  return syncDays(provider, {
    range: lastNDays(days, now),
    cache: new BiometricCache(provider.name),
    now,
    force: opts.force,
  });
}
