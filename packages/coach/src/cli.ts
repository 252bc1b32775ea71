import { Command } from "commander";
import { activeSecretStore, deleteSecret, loadSettings, setSecret, ValidationError } from "@pulse/shared";
import * as out from "@pulse/shared/output";
import { num, syncRecent, type ProviderResolver } from "@pulse/biometrics";
import { loadHistory, recordCoaching } from "./history.ts";
import {
  API_KEY_ACCOUNT,
  AnthropicCoachModel,
  CONCERN_TEXT,
  TOOL,
  resolveApiKey,
  writeBrief,
  type CoachModel,
} from "./narrative.ts";
import { buildPlan } from "./plan.ts";
import { assessReadiness } from "./readiness.ts";

interface CoachOptions {
  provider?: string;
  ai?: boolean;
  json?: boolean;
  force?: boolean;
}

function coachModel(model: string): CoachModel | null {
  const apiKey = resolveApiKey();
  if (!apiKey) {
    out.warn("No Anthropic API key. Run: pulse anthropic set-key <key> (or set ANTHROPIC_API_KEY)");
    return null;
  }
  return new AnthropicCoachModel(apiKey, model);
}

export function register(parent: Command, resolve: ProviderResolver): void {
  const coach = parent
    .command("coach")
    .description("Today's readiness, plan and coaching brief")
    .option("-p, --provider <name>", "garmin or whoop")
    .option("--ai", "write the brief with the Anthropic API")
    .option("--json", "print JSON")
    .option("--force", "refetch cached days")
    .action(async (opts: CoachOptions) => {
      const settings = loadSettings();
      const provider = resolve(opts.provider);
      const result = await syncRecent(provider, settings.coach.baselineDays + 1, { force: opts.force });
      for (const issue of result.issues) {
        out.warn(`dropped ${issue.metric} reading for ${issue.date}: ${issue.reason}`);
      }

      const today = result.days[result.days.length - 1];
      if (!today) throw new ValidationError("No days to assess.");
      const history = result.days.slice(0, -1);

      const assessment = assessReadiness(today, history, settings.coach);
      const plan = buildPlan(assessment, history, settings.coach.sleepTargetHours);
      const brief = await writeBrief(
        assessment, plan, result.days, opts.ai ? coachModel(settings.coach.model) : null,
      );

      recordCoaching({
        date: assessment.date,
        provider: provider.name,
        overall: assessment.overall,
        recommendation: assessment.recommendation,
        concerns: assessment.concerns,
        brief: brief.text,
        createdAt: new Date().toISOString(),
      });

      if (opts.json) {
        out.json({ assessment, plan, brief });
        return;
      }

      out.heading(`Readiness ${assessment.date} (${provider.name})`);
      out.blank();
      out.table(
        ["Overall", "HRV", "Sleep", "RHR", "Trend", "Data"],
        [[
          num(assessment.overall), num(assessment.components.hrv), num(assessment.components.sleep),
          num(assessment.components.restingHr), assessment.hrvTrend, assessment.dataQuality,
        ]],
      );
      out.blank();
      out.subheading(`Recommendation: ${assessment.recommendation}`);
      for (const c of assessment.concerns) out.info(`  ! ${CONCERN_TEXT[c]}`);
      out.blank();
      console.log(`Steps:  ${plan.stepTarget}`);
      console.log(`Sleep:  ${plan.sleepTargetHours} h`);
      for (const s of plan.sessions) console.log(`  - ${s}`);
      out.blank();
      console.log(brief.text);
      if (brief.source === "fallback" && opts.ai) out.info("(built-in brief)");
    });

  coach
    .command("history [n]")
    .description("Recent coaching results (default 7)")
    .action((n?: string) => {
      const count = n === undefined ? 7 : Number(n);
      if (!Number.isInteger(count) || count < 1) {
        throw new ValidationError(`Count must be a positive integer, got "${n}"`);
      }
      const records = loadHistory().slice(-count);
      if (records.length === 0) { out.info("No coaching history yet."); return; }
      out.table(
        ["Date", "Provider", "Score", "Recommendation", "Concerns"],
        records.map((r) => [r.date, r.provider, num(r.overall), r.recommendation, r.concerns.join(", ")]),
      );
    });

  // ── API key ─────────────────────────────────────────────────

  const anthropic = parent
    .command("anthropic")
    .description("Anthropic API key used by coach --ai");

  anthropic
    .command("set-key <key>")
    .description("Store the API key in the secret store")
    .action((key: string) => {
      setSecret(TOOL, API_KEY_ACCOUNT, key);
      out.success(`API key saved (${activeSecretStore().kind}).`);
    });

  anthropic
    .command("clear-key")
    .description("Remove the stored API key")
    .action(() => {
      if (deleteSecret(TOOL, API_KEY_ACCOUNT)) out.success("API key removed.");
      else out.info("No API key stored.");
    });
}
