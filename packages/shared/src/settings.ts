import { z } from "zod";
import { readRawConfig, writeConfig } from "./config.ts";
import { ConfigError, ValidationError } from "./errors.ts";

const MODULE = "settings";

export const PROVIDERS = ["garmin", "whoop"] as const;
export type ProviderName = (typeof PROVIDERS)[number];

export const SECRET_BACKENDS = ["keychain", "file"] as const;
export type SecretBackend = (typeof SECRET_BACKENDS)[number];

function defaultSecretBackend(): SecretBackend {
  return process.platform === "darwin" ? "keychain" : "file";
}

const hostname = z
  .string()
  .min(1)
  .regex(/^[a-z0-9.-]+$/i, "must be a bare hostname");

export const settingsSchema = z
  .object({
    provider: z.enum(PROVIDERS).default("garmin"),
    garmin: z
      .object({ domain: hostname.default("garmin.com") })
      .strict()
      .default({}),
    sync: z
      .object({ days: z.number().int().min(1).max(90).default(14) })
      .strict()
      .default({}),
    coach: z
      .object({
        baselineDays: z.number().int().min(7).max(90).default(28),
        sleepTargetHours: z.number().min(4).max(12).default(8),
        model: z.string().min(1).default("claude-sonnet-4-20250514"),
      })
      .strict()
      .default({}),
    secrets: z
      .object({ backend: z.enum(SECRET_BACKENDS).default(defaultSecretBackend) })
      .strict()
      .default({}),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function loadSettings(): Settings {
  const raw = readRawConfig(MODULE) ?? {};
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings.json: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a dotted key (e.g. "coach.baselineDays") and persist.
 * The whole document is revalidated, so unknown keys and bad values are rejected.
 */
export function setSetting(key: string, raw: string): Settings {
  const parts = key.split(".").filter(Boolean);
  if (parts.length === 0) throw new ValidationError("Empty settings key.");

  const doc: Record<string, unknown> = { ...loadSettings() };
  let node = doc;
  for (const part of parts.slice(0, -1)) {
    const child = node[part];
    if (!isRecord(child)) throw new ValidationError(`Unknown settings key "${key}".`);
    const copy = { ...child };
    node[part] = copy;
    node = copy;
  }
  const leaf = parts[parts.length - 1] ?? "";
  if (!(leaf in node)) throw new ValidationError(`Unknown settings key "${key}".`);
  node[leaf] = parseValue(raw);

  const parsed = settingsSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ValidationError(`Invalid value for "${key}": ${describeIssues(parsed.error)}`);
  }
  writeConfig(MODULE, parsed.data);
  return parsed.data;
}

export function parseProvider(input: string): ProviderName {
  const match = PROVIDERS.find((p) => p === input);
  if (!match) {
    throw new ValidationError(`Unknown provider "${input}". Valid: ${PROVIDERS.join(", ")}`);
  }
  return match;
}
