import { homedir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { activeSecretStore, parseQueryArgs, serviceName } from "@pulse/shared";
import * as out from "@pulse/shared/output";
import { TOOL, authStatus, garminUrls, importTokens, login, logout } from "./auth.ts";
import { createGarminProvider } from "./providers/garmin.ts";

function hours(seconds: number): string {
  return `${Math.round((seconds / 3600) * 10) / 10}h`;
}

function days(seconds: number): string {
  return `${Math.round((seconds / 86400) * 10) / 10}d`;
}

export function register(parent: Command): void {
  const garmin = parent
    .command("garmin")
    .alias("gc")
    .description("Garmin Connect session and raw API access");

  // ── Auth ────────────────────────────────────────────────────

  garmin
    .command("login <email> <password>")
    .description("Log in through Garmin SSO and store the OAuth tokens")
    .action(async (email: string, password: string) => {
      const urls = garminUrls();
      await login(email, password, urls);
      out.success(`Logged in to ${urls.domain}. Tokens saved (${activeSecretStore().kind}).`);
    });

  garmin
    .command("import-tokens [dir]")
    .description("Import tokens from a garth directory (default: ~/.garth)")
    .action((dir?: string) => {
      const source = dir ?? join(homedir(), ".garth");
      importTokens(source);
      out.success(`Tokens imported from ${source}.`);
    });

  garmin
    .command("status")
    .description("Check auth status")
    .action(() => {
      const s = authStatus();
      if (!s.loggedIn) {
        out.info("Not logged in. Run: pulse garmin login <email> <password>");
        out.info("Or import existing tokens: pulse garmin import-tokens");
        return;
      }

      console.log(`Domain:  ${garminUrls().domain}`);
      console.log(`User:    ${s.displayName ?? "not cached yet"}`);
      console.log(s.accessExpiresIn <= 0
        ? "Token:   expired (will auto-refresh on next API call)"
        : `Token:   valid (${hours(s.accessExpiresIn)} remaining)`);
      console.log(s.refreshExpiresIn <= 0
        ? "Refresh: expired (re-login required)"
        : `Refresh: valid (${days(s.refreshExpiresIn)} remaining)`);

      out.info(`Credentials: ${activeSecretStore().kind} (service: ${serviceName(TOOL)})`);
    });

  garmin
    .command("logout")
    .description("Remove all stored Garmin credentials")
    .action(() => {
      const removed = logout();
      out.success(`Removed ${removed} Garmin secret(s).`);
    });

  // ── Raw ─────────────────────────────────────────────────────

  garmin
    .command("json <path> [params...]")
    .description("Raw JSON from any Connect API path (key=value query params)")
    .action(async (path: string, params: string[]) => {
      out.json(await createGarminProvider().json(path, parseQueryArgs(params)));
    });
}
