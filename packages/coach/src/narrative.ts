import Anthropic from "@anthropic-ai/sdk";
import { errorMessage, getSecret, warn } from "@pulse/shared";
import { num, secToHm, thousands, type DailyBiometrics } from "@pulse/biometrics";
import type { DailyPlan } from "./plan.ts";
import type { Concern, ReadinessAssessment } from "./readiness.ts";

export const TOOL = "anthropic";
export const API_KEY_ACCOUNT = "api-key";

const MAX_TOKENS = 600;
const RECENT_DAYS = 7;

/** Anything that turns a system prompt and a user prompt into text. */
export interface CoachModel {
  complete(system: string, prompt: string): Promise<string>;
}

export class AnthropicCoachModel implements CoachModel {
  private readonly client: Anthropic;

  constructor(apiKey: string, private readonly model: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(system: string, prompt: string): Promise<string> {
    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      system,
      messages: [{ role: "user", content: prompt }],
    });
    const parts: string[] = [];
    for (const block of message.content) {
      if (block.type === "text") parts.push(block.text);
    }
    return parts.join("\n").trim();
  }
}

export const COACH_SYSTEM_PROMPT = `You are a concise personal health coach.
You receive one person's recent wearable metrics and a readiness assessment that
has already been computed from them.

RULES:
- Never contradict the recommendation or the step target you are given.
- Refer to the numbers provided; do not invent measurements.
- No medical diagnosis. If something looks persistently off, suggest checking with a professional.
- At most 120 words, plain text, no headings.`;

export const CONCERN_TEXT: Record<Concern, string> = {
  hrv_suppressed: "HRV is well below your baseline",
  elevated_resting_hr: "resting heart rate is above your baseline",
  short_sleep: "last night's sleep was under 6 hours",
  poor_sleep_score: "sleep quality score was low",
  low_activity: "activity has been low over the last few days",
};

const RECOMMENDATION_TEXT = {
  ready: "You are recovered and ready for a harder day.",
  light: "Keep today moderate.",
  rest: "Prioritise recovery today.",
  unknown: "There is not enough data yet to judge readiness.",
} as const;

function metricsTable(recent: readonly DailyBiometrics[]): string {
  const lines = ["date | hrv_ms | resting_hr | sleep | sleep_score | steps"];
  for (const d of recent.slice(-RECENT_DAYS)) {
    lines.push([
      d.date, num(d.hrvMs, 1), num(d.restingHr),
      secToHm(d.sleepSeconds), num(d.sleepScore), thousands(d.steps),
    ].join(" | "));
  }
  return lines.join("\n");
}

export function buildPrompt(
  assessment: ReadinessAssessment,
  plan: DailyPlan,
  recent: readonly DailyBiometrics[],
): string {
  const c = assessment.components;
  return [
    `Date: ${assessment.date} (source: ${assessment.source})`,
    "",
    "Recent days:",
    metricsTable(recent),
    "",
    "Assessment:",
    `- readiness: ${assessment.overall ?? "n/a"} (${assessment.dataQuality} data)`,
    `- components: hrv ${c.hrv ?? "n/a"}, sleep ${c.sleep ?? "n/a"}, resting_hr ${c.restingHr ?? "n/a"}`,
    `- hrv trend: ${assessment.hrvTrend}`,
    `- concerns: ${assessment.concerns.length > 0 ? assessment.concerns.join(", ") : "none"}`,
    `- recommendation: ${assessment.recommendation}`,
    "",
    "Plan:",
    `- step target: ${plan.stepTarget}`,
    `- sleep target: ${plan.sleepTargetHours} h`,
    ...plan.sessions.map((s) => `- ${s}`),
    "",
    "Write today's brief.",
  ].join("\n");
}

export function fallbackBrief(assessment: ReadinessAssessment, plan: DailyPlan): string {
  const lines: string[] = [];
  lines.push(
    assessment.overall == null
      ? RECOMMENDATION_TEXT.unknown
      : `Readiness ${assessment.overall}/100. ${RECOMMENDATION_TEXT[assessment.recommendation]}`,
  );
  if (assessment.concerns.length > 0) {
    lines.push(`Watch: ${assessment.concerns.map((c) => CONCERN_TEXT[c]).join("; ")}.`);
  }
  lines.push(`Aim for ${thousands(plan.stepTarget)} steps and ${plan.sleepTargetHours} h of sleep.`);
  return lines.join("\n");
}

export interface Brief {
  text: string;
  source: "model" | "fallback";
}

export async function writeBrief(
  assessment: ReadinessAssessment,
  plan: DailyPlan,
  recent: readonly DailyBiometrics[],
  model: CoachModel | null,
): Promise<Brief> {
  if (model) {
    try {
      const text = await model.complete(COACH_SYSTEM_PROMPT, buildPrompt(assessment, plan, recent));
      if (text) return { text, source: "model" };
      warn("Coach model returned no text; using the built-in brief.");
    } catch (e) {
      warn(`Coach model failed (${errorMessage(e)}); using the built-in brief.`);
    }
  }
  return { text: fallbackBrief(assessment, plan), source: "fallback" };
}

export function resolveApiKey(): string | null {
  const fromEnv = process.env.ANTHROPIC_API_KEY;
  if (fromEnv) return fromEnv;
  return getSecret(TOOL, API_KEY_ACCOUNT);
}
