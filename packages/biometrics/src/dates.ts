import { ValidationError } from "@pulse/shared";
import type { DateRange } from "./types.ts";

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local calendar date of `d`. */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

export function isValidDate(text: string): boolean {
  const m = DATE_RE.exec(text);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const t = new Date(Date.UTC(y, mo - 1, d));
  return t.getUTCFullYear() === y && t.getUTCMonth() === mo - 1 && t.getUTCDate() === d;
}

// Arithmetic runs on UTC midnight so DST shifts never skip or repeat a day.
function toUtc(date: string): number {
  if (!isValidDate(date)) throw new ValidationError(`Invalid date "${date}" (expected YYYY-MM-DD)`);
  const [y, m, d] = date.split("-").map(Number);
  return Date.UTC(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

function fromUtc(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

export function addDays(date: string, n: number): string {
  return fromUtc(toUtc(date) + n * DAY_MS);
}

/** Whole days from `a` to `b` (negative when `b` is earlier). */
export function daysBetween(a: string, b: string): number {
  return Math.round((toUtc(b) - toUtc(a)) / DAY_MS);
}

export function eachDate(range: DateRange): string[] {
  const count = daysBetween(range.start, range.end) + 1;
  const dates: string[] = [];
  for (let i = 0; i < count; i++) {
    dates.push(addDays(range.start, i));
  }
  return dates;
}

/** The `n` calendar days ending today. */
export function lastNDays(n: number, now: Date = new Date()): DateRange {
  const end = formatDate(now);
  return { start: addDays(end, -(n - 1)), end };
}

/** Calendar date prefix of an ISO timestamp ("2026-10-18T06:55:00Z" → "2026-10-18"). */
export function isoDatePart(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export const MAX_DAYS = 90;

export function parseDays(input: string | undefined, fallback: number): number {
  if (input === undefined) return fallback;
  const n = Number(input);
  if (!Number.isInteger(n) || n < 1 || n > MAX_DAYS) {
    throw new ValidationError(`Days must be an integer between 1 and ${MAX_DAYS}, got "${input}"`);
  }
  return n;
}
