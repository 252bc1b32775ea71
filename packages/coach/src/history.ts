import { z } from "zod";
import { PROVIDERS, readConfig, writeConfig, type ProviderName } from "@pulse/shared";
import type { Concern, Recommendation } from "./readiness.ts";

const MODULE = "coach-history";
export const MAX_RECORDS = 30;

const recordSchema = z.object({
  date: z.string(),
  provider: z.enum(PROVIDERS),
  overall: z.number().nullable(),
  recommendation: z.enum(["ready", "light", "rest", "unknown"]),
  concerns: z.array(
    z.enum(["hrv_suppressed", "elevated_resting_hr", "short_sleep", "poor_sleep_score", "low_activity"]),
  ),
  brief: z.string(),
  createdAt: z.string(),
});

const fileSchema = z.object({ records: z.array(recordSchema) });

export interface CoachingRecord {
  date: string;
  provider: ProviderName;
  overall: number | null;
  recommendation: Recommendation;
  concerns: Concern[];
  brief: string;
  createdAt: string;
}

export function loadHistory(): CoachingRecord[] {
  return readConfig(MODULE, fileSchema)?.records ?? [];
}

/** Store a result, replacing any earlier one for the same date and provider. */
export function recordCoaching(record: CoachingRecord): CoachingRecord[] {
  const records = loadHistory()
    .filter((r) => !(r.date === record.date && r.provider === record.provider));
  records.push(record);
  records.sort((a, b) => a.date.localeCompare(b.date) || a.createdAt.localeCompare(b.createdAt));
  const kept = records.slice(-MAX_RECORDS);
  writeConfig(MODULE, { records: kept });
  return kept;
}
