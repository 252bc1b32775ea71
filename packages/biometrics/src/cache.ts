import { z } from "zod";
import {
  PROVIDERS,
  debug,
  readConfig,
  removeConfig,
  writeConfig,
  type ProviderName,
} from "@pulse/shared";
import { addDays, eachDate, formatDate } from "./dates.ts";
import type { DailyBiometrics, DateRange } from "./types.ts";

const metric = z.number().nullable();

const dailySchema = z.object({
  date: z.string(),
  source: z.enum(PROVIDERS),
  hrvMs: metric,
  restingHr: metric,
  steps: metric,
  stepGoal: metric,
  sleepSeconds: metric,
  deepSleepSeconds: metric,
  remSleepSeconds: metric,
  sleepScore: metric,
});

const entrySchema = z.object({
  fetchedAt: z.string(),
  data: dailySchema,
});

const cacheFileSchema = z.object({
  version: z.literal(1),
  provider: z.enum(PROVIDERS),
  days: z.record(entrySchema),
});

export type CacheEntry = z.infer<typeof entrySchema>;
type CacheFile = z.infer<typeof cacheFileSchema>;

export interface CacheStats {
  entries: number;
  oldest: string | null;
  newest: string | null;
  lastFetchedAt: string | null;
}

/**
 * Per-provider day cache: `cache-<provider>.json` in the config dir.
 * Each write rewrites the whole document through a temp file and rename.
 */
export class BiometricCache {
  constructor(readonly provider: ProviderName) {}

  get module(): string {
    return `cache-${this.provider}`;
  }

  get(date: string): CacheEntry | null {
    return this.load().days[date] ?? null;
  }

  getRange(range: DateRange): Map<string, CacheEntry> {
    const days = this.load().days;
    const found = new Map<string, CacheEntry>();
    for (const date of eachDate(range)) {
      const entry = days[date];
      if (entry) found.set(date, entry);
    }
    return found;
  }

  put(days: readonly DailyBiometrics[], fetchedAt: Date): void {
    if (days.length === 0) return;
    const file = this.load();
    const stamp = fetchedAt.toISOString();
    for (const day of days) {
      file.days[day.date] = { fetchedAt: stamp, data: day };
    }
    writeConfig(this.module, file);
    debug(`cache ${this.provider}: stored ${days.length} day(s)`);
  }

  /**
   * A day is settled once it was fetched on a later calendar day, so the
   * provider has finished processing it.
   */
  isSettled(date: string, entry: CacheEntry): boolean {
    return formatDate(new Date(entry.fetchedAt)) > date;
  }

  clear(): boolean {
    return removeConfig(this.module);
  }

  /** Keep the `keepDays` calendar days ending `today`; returns how many were removed. */
  prune(keepDays: number, today: string): number {
    const file = this.load();
    const cutoff = addDays(today, -(keepDays - 1));
    let removed = 0;
    for (const date of Object.keys(file.days)) {
      if (date < cutoff) {
        delete file.days[date];
        removed++;
      }
    }
    if (removed > 0) writeConfig(this.module, file);
    return removed;
  }

  stats(): CacheStats {
    const days = this.load().days;
    const dates = Object.keys(days).sort();
    let lastFetchedAt: string | null = null;
    for (const entry of Object.values(days)) {
      if (!lastFetchedAt || entry.fetchedAt > lastFetchedAt) lastFetchedAt = entry.fetchedAt;
    }
    return {
      entries: dates.length,
      oldest: dates[0] ?? null,
      newest: dates[dates.length - 1] ?? null,
      lastFetchedAt,
    };
  }

  private load(): CacheFile {
    const file = readConfig(this.module, cacheFileSchema);
    if (file && file.provider === this.provider) return file;
    return { version: 1, provider: this.provider, days: {} };
  }
}
