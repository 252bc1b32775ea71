import { existsSync, mkdirSync, readFileSync, openSync, writeSync, closeSync, renameSync, rmSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import type { z } from "zod";
import { ConfigError, PulseError } from "./errors.ts";

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * `schema.parse` that fails with a one-line message naming `what` and the
 * first offending field, as `PulseError` unless `fail` builds another.
 */
export function parseShape<T>(
  schema: Schema<T>,
  value: unknown,
  what: string,
  fail: (message: string) => PulseError = (message) => new PulseError(message),
): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw fail(`Unexpected ${what}${where}: ${issue?.message ?? "invalid value"}`);
}

/** `$PULSE_CONFIG_DIR` wins over `~/.config/pulse`; read on every call. */
export function getConfigDir(): string {
  const dir = process.env.PULSE_CONFIG_DIR || join(homedir(), ".config", "pulse");
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

export function getModuleConfigPath(module: string): string {
  return join(getConfigDir(), `${module}.json`);
}

/** Parsed JSON, or null when the file is missing or unparsable. */
export function readRawConfig(module: string): unknown {
  const path = getModuleConfigPath(module);
  if (!existsSync(path)) return null;
  try {
    return JSON.parse(readFileSync(path, "utf-8")) as unknown;
  } catch {
    return null;
  }
}

export function readConfig<T>(module: string, schema: Schema<T>): T | null {
  const raw = readRawConfig(module);
  if (raw === null) return null;
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function writeConfig<T>(module: string, data: T): void {
  const filePath = getModuleConfigPath(module);
  const tmpPath = `${filePath}.tmp`;
  const content = JSON.stringify(data, null, 2) + "\n";
  // Created 0600 from the start; rename keeps readers from seeing a partial file.
  const fd = openSync(tmpPath, "w", 0o600);
  try {
    writeSync(fd, content);
  } finally {
    closeSync(fd);
  }
  renameSync(tmpPath, filePath);
}

export function removeConfig(module: string): boolean {
  const path = getModuleConfigPath(module);
  if (!existsSync(path)) return false;
  rmSync(path);
  return true;
}

export function requireConfig<T>(module: string, schema: Schema<T>, setup: string): T {
  const config = readConfig(module, schema);
  if (!config) {
    throw new ConfigError(`No config for "${module}". Run: ${setup}`);
  }
  return config;
}
