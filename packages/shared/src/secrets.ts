import { execFileSync } from "node:child_process";
import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto";
import { existsSync } from "node:fs";
import { z } from "zod";
import { getModuleConfigPath, readRawConfig, writeConfig } from "./config.ts";
import { AuthError, ConfigError, PulseError, errorMessage } from "./errors.ts";
import { loadSettings } from "./settings.ts";

const SERVICE_PREFIX = "pulse";

export function serviceName(tool: string): string {
  return `${SERVICE_PREFIX}-${tool}`;
}

export interface SecretStore {
  readonly kind: string;
  get(service: string, account: string): string | null;
  set(service: string, account: string, value: string): void;
  delete(service: string, account: string): boolean;
}

// ── macOS Keychain ───────────────────────────────────────────────

export class KeychainStore implements SecretStore {
  readonly kind = "keychain";

  get(service: string, account: string): string | null {
    try {
      const result = execFileSync("security", [
        "find-generic-password", "-s", service, "-a", account, "-w",
      ], { stdio: "pipe", encoding: "utf-8" });
      return result.trim();
    } catch {
      // security exits non-zero when the item does not exist
      return null;
    }
  }

  set(service: string, account: string, value: string): void {
    try {
      execFileSync("security", [
        "add-generic-password", "-s", service, "-a", account, "-w", value, "-U",
      ], { stdio: "pipe" });
    } catch (e: unknown) {
      throw new PulseError(
        `Failed to store secret in Keychain (service=${service}, account=${account}): ${errorMessage(e)}`
      );
    }
  }

  delete(service: string, account: string): boolean {
    try {
      execFileSync("security", [
        "delete-generic-password", "-s", service, "-a", account,
      ], { stdio: "pipe" });
      return true;
    } catch {
      return false;
    }
  }
}

// ── Encrypted file vault ─────────────────────────────────────────

const VAULT_MODULE = "vault";
const KEY_LENGTH = 32;
const SCRYPT_OPTIONS = { N: 16384, r: 8, p: 1 };

const vaultEntrySchema = z.object({
  iv: z.string(),
  tag: z.string(),
  data: z.string(),
});

const vaultSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  entries: z.record(vaultEntrySchema),
});

type VaultEntry = z.infer<typeof vaultEntrySchema>;
type VaultFile = z.infer<typeof vaultSchema>;

/**
 * AES-256-GCM encrypted `vault.json` in the config dir. The key is derived
 * with scrypt from the passphrase and the file's salt.
 */
export class FileVault implements SecretStore {
  readonly kind = "file";
  private key: Buffer | null = null;
  private keySalt: string | null = null;

  constructor(private readonly passphrase: string) {
    if (!passphrase) {
      throw new ConfigError("PULSE_VAULT_PASSPHRASE is not set; the file vault needs it.");
    }
  }

  get(service: string, account: string): string | null {
    const vault = this.load();
    const entry = vault.entries[`${service}/${account}`];
    if (!entry) return null;
    return this.decrypt(vault.salt, entry);
  }

  set(service: string, account: string, value: string): void {
    const vault = this.load();
    // Refuse to mix keys: an existing entry must decrypt under this passphrase.
    const existing = Object.values(vault.entries)[0];
    if (existing) this.decrypt(vault.salt, existing);

    const iv = randomBytes(12);
    const cipher = createCipheriv("aes-256-gcm", this.deriveKey(vault.salt), iv);
    const data = Buffer.concat([cipher.update(value, "utf-8"), cipher.final()]);
    vault.entries[`${service}/${account}`] = {
      iv: iv.toString("base64"),
      tag: cipher.getAuthTag().toString("base64"),
      data: data.toString("base64"),
    };
    writeConfig(VAULT_MODULE, vault);
  }

  delete(service: string, account: string): boolean {
    const vault = this.load();
    const id = `${service}/${account}`;
    if (!(id in vault.entries)) return false;
    delete vault.entries[id];
    writeConfig(VAULT_MODULE, vault);
    return true;
  }

  private decrypt(salt: string, entry: VaultEntry): string {
    const decipher = createDecipheriv("aes-256-gcm", this.deriveKey(salt), Buffer.from(entry.iv, "base64"));
    decipher.setAuthTag(Buffer.from(entry.tag, "base64"));
    try {
      return Buffer.concat([
        decipher.update(Buffer.from(entry.data, "base64")),
        decipher.final(),
      ]).toString("utf-8");
    } catch {
      throw new AuthError("Vault passphrase does not match");
    }
  }

  /** A missing vault starts empty; one that exists but does not parse is never overwritten. */
  private load(): VaultFile {
    const path = getModuleConfigPath(VAULT_MODULE);
    if (!existsSync(path)) {
      return { version: 1, salt: randomBytes(16).toString("base64"), entries: {} };
    }
    const parsed = vaultSchema.safeParse(readRawConfig(VAULT_MODULE));
    if (!parsed.success) {
      throw new ConfigError(`vault.json is unreadable or in an unknown format; fix or move it: ${path}`);
    }
    return parsed.data;
  }

  private deriveKey(salt: string): Buffer {
    if (this.key && this.keySalt === salt) return this.key;
    this.key = scryptSync(this.passphrase, Buffer.from(salt, "base64"), KEY_LENGTH, SCRYPT_OPTIONS);
    this.keySalt = salt;
    return this.key;
  }
}

// ── In-memory ────────────────────────────────────────────────────

export class MemoryStore implements SecretStore {
  readonly kind = "memory";
  private readonly values = new Map<string, string>();

  get(service: string, account: string): string | null {
    return this.values.get(`${service}/${account}`) ?? null;
  }

  set(service: string, account: string, value: string): void {
    this.values.set(`${service}/${account}`, value);
  }

  delete(service: string, account: string): boolean {
    return this.values.delete(`${service}/${account}`);
  }
}

// ── Active store ─────────────────────────────────────────────────

let override: SecretStore | null = null;
let resolved: SecretStore | null = null;

/** Replace the active store (tests, alternate backends). Pass null to reset. */
export function useSecretStore(store: SecretStore | null): void {
  override = store;
  resolved = null;
}

export function activeSecretStore(): SecretStore {
  if (override) return override;
  if (resolved) return resolved;

  const backend = process.env.PULSE_SECRET_BACKEND || loadSettings().secrets.backend;
  switch (backend) {
    case "keychain":
      resolved = new KeychainStore();
      break;
    case "file":
      resolved = new FileVault(process.env.PULSE_VAULT_PASSPHRASE ?? "");
      break;
    case "memory":
      resolved = new MemoryStore();
      break;
    default:
      throw new ConfigError(`Unknown secret backend "${backend}". Valid: keychain, file, memory`);
  }
  return resolved;
}

// ── Tool-scoped helpers ──────────────────────────────────────────

export function setSecret(tool: string, account: string, value: string): void {
  activeSecretStore().set(serviceName(tool), account, value);
}

/** Returns null if not found. */
export function getSecret(tool: string, account: string): string | null {
  return activeSecretStore().get(serviceName(tool), account);
}

export function requireSecret(tool: string, account: string): string {
  const value = getSecret(tool, account);
  if (value === null) {
    throw new AuthError(
      `No secret found for "${tool}/${account}". Run: pulse ${tool} login`
    );
  }
  return value;
}

/** Returns true if deleted, false if not found. */
export function deleteSecret(tool: string, account: string): boolean {
  return activeSecretStore().delete(serviceName(tool), account);
}

export function hasSecret(tool: string, account: string): boolean {
  return getSecret(tool, account) !== null;
}

export function clearSecrets(tool: string, accounts: readonly string[]): number {
  let removed = 0;
  for (const account of accounts) {
    if (deleteSecret(tool, account)) removed++;
  }
  return removed;
}
