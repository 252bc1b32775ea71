import { Command } from "commander";
import { loadSettings, parseProvider } from "@pulse/shared";
import * as out from "@pulse/shared/output";
import { BiometricCache } from "./cache.ts";
import { formatDate, parseDays } from "./dates.ts";
import { num, secToHm, thousands } from "./format.ts";
import { syncRecent, type SyncResult } from "./sync.ts";
import type { BiometricProvider, DailyBiometrics } from "./types.ts";

export type ProviderResolver = (name?: string) => BiometricProvider;

interface WindowOptions {
  provider?: string;
  force?: boolean;
  json?: boolean;
}

function reportIssues(result: SyncResult): void {
  for (const issue of result.issues) {
    out.warn(`dropped ${issue.metric} reading for ${issue.date}: ${issue.reason}`);
  }
}

async function load(
  resolve: ProviderResolver,
  days: string | undefined,
  opts: WindowOptions,
): Promise<{ provider: BiometricProvider; d: number; result: SyncResult }> {
  const d = parseDays(days, loadSettings().sync.days);
  const provider = resolve(opts.provider);
  const result = await syncRecent(provider, d, { force: opts.force });
  reportIssues(result);
  return { provider, d, result };
}

function withData(days: DailyBiometrics[], pick: (day: DailyBiometrics) => number | null): DailyBiometrics[] {
  return days.filter((day) => pick(day) != null);
}

export function register(parent: Command, resolve: ProviderResolver): void {
  // ── Sync ────────────────────────────────────────────────────

  parent
    .command("sync [days]")
    .description("Fetch recent days from the provider into the local cache")
    .option("-p, --provider <name>", "garmin or whoop (default: settings.provider)")
    .option("--force", "refetch days that are already cached")
    .action(async (days: string | undefined, opts: WindowOptions) => {
      const { provider, result } = await load(resolve, days, opts);
      out.success(
        `${provider.name}: fetched ${result.fetched.length} day(s), ${result.cached.length} from cache.`
      );
    });

  parent
    .command("metrics [days]")
    .alias("m")
    .description("Daily HRV, resting HR, sleep and steps")
    .option("-p, --provider <name>", "garmin or whoop")
    .option("--force", "refetch cached days")
    .option("--json", "print JSON")
    .action(async (days: string | undefined, opts: WindowOptions) => {
      const { provider, d, result } = await load(resolve, days, opts);
      if (opts.json) {
        out.json(result.days);
        return;
      }
      out.heading(`Metrics (${provider.name}) — last ${d} days`);
      out.blank();
      out.table(
        ["Date", "HRV", "RHR", "Sleep", "Score", "Steps"],
        result.days.map((r) => [
          r.date, num(r.hrvMs), num(r.restingHr),
          secToHm(r.sleepSeconds), num(r.sleepScore), thousands(r.steps),
        ]),
      );
    });

  parent
    .command("hrv [days]")
    .description("Overnight heart rate variability (RMSSD)")
    .option("-p, --provider <name>", "garmin or whoop")
    .action(async (days: string | undefined, opts: WindowOptions) => {
      const { d, result } = await load(resolve, days, opts);
      const rows = withData(result.days, (r) => r.hrvMs);
      out.heading(`HRV — last ${d} days`);
      out.blank();
      if (rows.length === 0) { out.info("No data."); return; }
      out.table(
        ["Date", "HRV (ms)", "RHR"],
        rows.map((r) => [r.date, num(r.hrvMs, 1), num(r.restingHr)]),
      );
    });

  parent
    .command("sleep [days]")
    .description("Sleep duration, stages and score")
    .option("-p, --provider <name>", "garmin or whoop")
    .action(async (days: string | undefined, opts: WindowOptions) => {
      const { d, result } = await load(resolve, days, opts);
      const rows = withData(result.days, (r) => r.sleepSeconds);
      out.heading(`Sleep — last ${d} days`);
      out.blank();
      if (rows.length === 0) { out.info("No data."); return; }
      out.table(
        ["Date", "Score", "Total", "Deep", "REM"],
        rows.map((r) => [
          r.date, num(r.sleepScore),
          secToHm(r.sleepSeconds), secToHm(r.deepSleepSeconds), secToHm(r.remSleepSeconds),
        ]),
      );
    });

  parent
    .command("steps [days]")
    .description("Daily step counts against goal")
    .option("-p, --provider <name>", "garmin or whoop")
    .action(async (days: string | undefined, opts: WindowOptions) => {
      const { d, result } = await load(resolve, days, opts);
      const rows = withData(result.days, (r) => r.steps);
      out.heading(`Steps — last ${d} days`);
      out.blank();
      if (rows.length === 0) { out.info("No data."); return; }
      out.table(
        ["Date", "Steps", "Goal", "%"],
        rows.map((r) => [
          r.date, thousands(r.steps), thousands(r.stepGoal),
          r.steps != null && r.stepGoal ? `${Math.round((r.steps / r.stepGoal) * 100)}%` : "",
        ]),
      );
    });

  // ── Cache ───────────────────────────────────────────────────

  const cache = parent.command("cache").description("Inspect or clear the local data cache");

  const cacheFor = (name?: string): BiometricCache =>
    new BiometricCache(name ? parseProvider(name) : loadSettings().provider);

  cache
    .command("status")
    .description("Show cached day range")
    .option("-p, --provider <name>", "garmin or whoop")
    .action((opts: WindowOptions) => {
      const c = cacheFor(opts.provider);
      const s = c.stats();
      out.heading(`Cache (${c.provider})`);
      if (s.entries === 0) { out.info("Empty."); return; }
      out.table(
        ["Entries", "Oldest", "Newest", "Last fetch"],
        [[s.entries, s.oldest, s.newest, s.lastFetchedAt]],
      );
    });

  cache
    .command("clear")
    .description("Delete the cache file")
    .option("-p, --provider <name>", "garmin or whoop")
    .action((opts: WindowOptions) => {
      const c = cacheFor(opts.provider);
      if (c.clear()) out.success(`Cleared ${c.provider} cache.`);
      else out.info("Nothing to clear.");
    });

  cache
    .command("prune <keepDays>")
    .description("Drop cached days older than keepDays")
    .option("-p, --provider <name>", "garmin or whoop")
    .action((keepDays: string, opts: WindowOptions) => {
      const c = cacheFor(opts.provider);
      const removed = c.prune(parseDays(keepDays, 0), formatDate(new Date()));
      out.success(`Removed ${removed} day(s) from ${c.provider} cache.`);
    });
}
