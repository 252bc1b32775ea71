import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, ValidationError } from "../src/errors.ts";
import { loadSettings, parseProvider, setSetting } from "../src/settings.ts";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "pulse-settings-"));
  vi.stubEnv("PULSE_CONFIG_DIR", dir);
});

describe("loadSettings", () => {
  it("fills defaults when no file exists", () => {
    const s = loadSettings();
    expect(s.provider).toBe("garmin");
    expect(s.garmin.domain).toBe("garmin.com");
    expect(s.sync.days).toBe(14);
    expect(s.coach).toEqual({
      baselineDays: 28,
      sleepTargetHours: 8,
      model: "claude-sonnet-4-20250514",
    });
  });

  it("rejects an invalid file and names the path", () => {
    writeFileSync(join(dir, "settings.json"), JSON.stringify({ sync: { days: 0 } }));
    expect(() => loadSettings()).toThrow(ConfigError);
    expect(() => loadSettings()).toThrow(/^Invalid settings\.json: sync\.days: /);
  });
});

describe("setSetting", () => {
  it("parses JSON values and persists them", () => {
    expect(setSetting("coach.baselineDays", "21").coach.baselineDays).toBe(21);
    expect(loadSettings().coach.baselineDays).toBe(21);
  });

  it("keeps non-JSON input as a string", () => {
    expect(setSetting("provider", "whoop").provider).toBe("whoop");
    expect(setSetting("garmin.domain", "garmin.cn").garmin.domain).toBe("garmin.cn");
  });

  it("rejects unknown keys", () => {
    expect(() => setSetting("coach.nope", "1")).toThrow('Unknown settings key "coach.nope".');
    expect(() => setSetting("nope.deeper", "1")).toThrow(ValidationError);
  });

  it("rejects out-of-range values without writing", () => {
    expect(() => setSetting("sync.days", "500")).toThrow(/^Invalid value for "sync\.days": /);
    expect(loadSettings().sync.days).toBe(14);
  });
});

describe("parseProvider", () => {
  it("accepts known providers", () => {
    expect(parseProvider("whoop")).toBe("whoop");
  });

  it("lists valid names on error", () => {
    expect(() => parseProvider("fitbit")).toThrow('Unknown provider "fitbit". Valid: garmin, whoop');
  });
});
