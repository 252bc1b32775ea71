import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryStore, setSecret, useSecretStore } from "@pulse/shared";
import { emptyDay } from "@pulse/biometrics";
import {
  AnthropicCoachModel,
  COACH_SYSTEM_PROMPT,
  buildPrompt,
  fallbackBrief,
  resolveApiKey,
  writeBrief,
  type CoachModel,
} from "../src/narrative.ts";
import type { DailyPlan } from "../src/plan.ts";
import { assessment } from "./fixtures.ts";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create };
  },
}));

const plan: DailyPlan = { stepTarget: 10_000, sessions: ["Zone 2 cardio, 30-45 min"], sleepTargetHours: 8 };

const recent = [
  { ...emptyDay("2026-10-06", "garmin"), hrvMs: 60, restingHr: 55, sleepSeconds: 27_000, sleepScore: 70, steps: 9000 },
];

beforeEach(() => {
  useSecretStore(new MemoryStore());
});

describe("fallbackBrief", () => {
  it("summarises score and targets", () => {
    expect(fallbackBrief(assessment(), plan)).toBe(
      "Readiness 82/100. You are recovered and ready for a harder day.\n" +
        "Aim for 10,000 steps and 8 h of sleep.",
    );
  });

  it("lists concerns", () => {
    const text = fallbackBrief(assessment({ concerns: ["hrv_suppressed", "short_sleep"] }), plan);
    expect(text.split("\n")[1]).toBe(
      "Watch: HRV is well below your baseline; last night's sleep was under 6 hours.",
    );
  });

  it("admits when there is no score", () => {
    const text = fallbackBrief(assessment({ overall: null, recommendation: "unknown" }), plan);
    expect(text.split("\n")[0]).toBe("There is not enough data yet to judge readiness.");
  });
});

describe("buildPrompt", () => {
  it("includes the metrics and the computed assessment", () => {
    const lines = buildPrompt(assessment(), plan, recent).split("\n");
    expect(lines).toContain("2026-10-06 | 60.0 | 55 | 7h30m | 70 | 9,000");
    expect(lines).toContain("- recommendation: ready");
    expect(lines).toContain("- step target: 10000");
    expect(lines).toContain("- Zone 2 cardio, 30-45 min");
  });

  it("keeps only the last week", () => {
    const days = Array.from({ length: 9 }, (_, i) => emptyDay(`2026-10-0${i + 1}`, "garmin"));
    const prompt = buildPrompt(assessment(), plan, days);
    expect(prompt).not.toContain("2026-10-02 |");
    expect(prompt).toContain("2026-10-03 |");
  });
});

describe("writeBrief", () => {
  it("uses the model's text", async () => {
    const model: CoachModel = { complete: vi.fn(async () => "Push today.") };
    expect(await writeBrief(assessment(), plan, recent, model)).toEqual({ text: "Push today.", source: "model" });
    expect(model.complete).toHaveBeenCalledWith(COACH_SYSTEM_PROMPT, buildPrompt(assessment(), plan, recent));
  });

  it("falls back and warns when the model fails", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const model: CoachModel = { complete: vi.fn(async () => { throw new Error("rate limited"); }) };
    const brief = await writeBrief(assessment(), plan, recent, model);
    expect(brief).toEqual({ text: fallbackBrief(assessment(), plan), source: "fallback" });
    expect(stderr).toHaveBeenCalledOnce();
    expect(String(stderr.mock.calls[0]?.[0])).toContain("Coach model failed (rate limited)");
  });

  it("uses the built-in brief without a model", async () => {
    expect((await writeBrief(assessment(), plan, recent, null)).source).toBe("fallback");
  });
});

describe("AnthropicCoachModel", () => {
  it("sends one user message and joins text blocks", async () => {
    create.mockResolvedValueOnce({
      content: [
        { type: "text", text: "Easy day." },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: "Sleep early." },
      ],
    });
    const model = new AnthropicCoachModel("test-key", "test-model");
    expect(await model.complete("system text", "prompt text")).toBe("Easy day.\nSleep early.");
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 600,
      system: "system text",
      messages: [{ role: "user", content: "prompt text" }],
    });
  });
});

describe("resolveApiKey", () => {
  it("prefers the environment", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "env-key");
    setSecret("anthropic", "api-key", "stored-key");
    expect(resolveApiKey()).toBe("env-key");
  });

  it("falls back to the secret store", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
    expect(resolveApiKey()).toBeNull();
    setSecret("anthropic", "api-key", "stored-key");
    expect(resolveApiKey()).toBe("stored-key");
  });
});
