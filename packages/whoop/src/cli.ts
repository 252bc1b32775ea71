import { randomBytes } from "node:crypto";
import { createInterface } from "node:readline";
import { Command } from "commander";
import {
  activeSecretStore,
  buildAuthorizeUrl,
  clearOAuth2Data,
  exchangeCode,
  extractAuthorizationCode,
  loadOAuth2Credentials,
  loadTokens,
  parseQueryArgs,
  saveOAuth2Credentials,
  saveTokens,
  serviceName,
} from "@pulse/shared";
import * as out from "@pulse/shared/output";
import { OAUTH2_CONFIG, TOOL, createWhoopProvider } from "./providers/whoop.ts";

function ask(question: string): Promise<string> {
  const iface = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise<string>((resolve) => {
    iface.question(question, (answer) => {
      iface.close();
      resolve(answer.trim());
    });
  });
}

export function register(parent: Command): void {
  const whoop = parent
    .command("whoop")
    .description("WHOOP developer API session and raw access");

  // ── Auth commands ───────────────────────────────────────────

  whoop
    .command("auth-setup <clientId> <clientSecret> <redirectUri>")
    .description("Save WHOOP OAuth2 app credentials")
    .action((clientId: string, clientSecret: string, redirectUri: string) => {
      saveOAuth2Credentials(TOOL, { clientId, clientSecret, redirectUri });
      out.success("OAuth2 credentials saved.");
      out.info("Now run: pulse whoop auth-login");
    });

  whoop
    .command("auth-login")
    .description("OAuth2 login flow (prints URL, waits for redirect URL)")
    .action(async () => {
      const creds = loadOAuth2Credentials(TOOL);
      const state = randomBytes(8).toString("hex");
      const url = buildAuthorizeUrl(OAUTH2_CONFIG, creds.clientId, creds.redirectUri, state);

      out.info("Open this URL in your browser:\n");
      console.log(url);
      out.blank();

      const redirectUrl = await ask("After authorizing, paste the full redirect URL here:\n");
      const code = extractAuthorizationCode(redirectUrl, state);
      saveTokens(TOOL, await exchangeCode(OAUTH2_CONFIG, creds, code));
      out.success("Login successful! Tokens saved.");
    });

  whoop
    .command("auth-status")
    .description("Check OAuth2 token status")
    .action(() => {
      const tokens = loadTokens(TOOL);
      if (!tokens) {
        out.info("Not logged in.");
        return;
      }
      const now = Math.floor(Date.now() / 1000);
      if (now >= tokens.expiresAt) {
        out.info("Token expired. Will auto-refresh on next API call.");
      } else {
        out.success(`Logged in. Token valid for ${tokens.expiresAt - now}s.`);
      }
      out.info(`Credentials: ${activeSecretStore().kind} (service: ${serviceName(TOOL)})`);
    });

  whoop
    .command("auth-logout")
    .description("Remove all stored WHOOP credentials")
    .action(() => {
      const removed = clearOAuth2Data(TOOL);
      out.success(`Removed ${removed} WHOOP secret(s).`);
    });

  whoop
    .command("json <path> [params...]")
    .description("Raw JSON from any API endpoint")
    .action(async (path: string, params: string[]) => {
      out.json(await createWhoopProvider().json(path, parseQueryArgs(params)));
    });
}
