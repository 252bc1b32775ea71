/**
 * Garmin Connect authentication: SSO login, then OAuth1 → OAuth2 token exchange.
 *
 * The OAuth1 token is long-lived and is re-exchanged for a fresh OAuth2
 * access token whenever the latter expires.
 */
import { createHmac, randomBytes } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import {
  AuthError,
  ConfigError,
  HttpError,
  clearSecrets,
  debug,
  errorMessage,
  getSecret,
  loadSettings,
  parseShape,
  requireSecret,
  setSecret,
} from "@pulse/shared";
import { UrlBuilder, parseGarminDomain } from "./url-builder.ts";

export const TOOL = "garmin";

const CONSUMER_URL = "https://thegarth.s3.amazonaws.com/oauth_consumer.json";

export const USER_AGENT = "com.garmin.android.apps.connectmobile";

export const SECRET_ACCOUNTS = [
  "oauth1-token", "oauth1-secret", "access-token", "refresh-token",
  "expires-at", "refresh-expires-at", "consumer-key", "consumer-secret",
  "display-name",
] as const;

export function garminUrls(): UrlBuilder {
  return new UrlBuilder(parseGarminDomain(loadSettings().garmin.domain));
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

// ── OAuth1 HMAC-SHA1 signing ─────────────────────────────────────

export function percentEncode(str: string): string {
  return encodeURIComponent(str).replace(/[!'()*]/g, (c) =>
    `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export interface OAuth1Request {
  method: string;
  url: string;
  consumerKey: string;
  consumerSecret: string;
  token?: string;
  tokenSecret?: string;
  /** Query or form parameters that take part in the signature. */
  params?: Record<string, string>;
  nonce?: string;
  timestamp?: string;
}

/** `Authorization` header value for an OAuth 1.0a HMAC-SHA1 request. */
export function signOAuth1(req: OAuth1Request): string {
  const oauthParams: Record<string, string> = {
    oauth_consumer_key: req.consumerKey,
    oauth_nonce: req.nonce ?? randomBytes(16).toString("hex"),
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: req.timestamp ?? String(nowSeconds()),
    oauth_version: "1.0",
  };
  if (req.token) oauthParams.oauth_token = req.token;

  const allParams: Record<string, string> = { ...oauthParams, ...(req.params ?? {}) };
  const paramString = Object.entries(allParams)
    .map(([k, v]) => [percentEncode(k), percentEncode(v)] as const)
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a < b ? -1 : 1))
    .map(([k, v]) => `${k}=${v}`)
    .join("&");

  const baseString = `${req.method.toUpperCase()}&${percentEncode(req.url)}&${percentEncode(paramString)}`;
  const signingKey = `${percentEncode(req.consumerSecret)}&${percentEncode(req.tokenSecret ?? "")}`;
  oauthParams.oauth_signature = createHmac("sha1", signingKey).update(baseString).digest("base64");

  const headerParts = Object.keys(oauthParams)
    .sort()
    .map((k) => `${percentEncode(k)}="${percentEncode(oauthParams[k] ?? "")}"`)
    .join(", ");

  return `OAuth ${headerParts}`;
}

// ── Consumer credentials ─────────────────────────────────────────

const consumerSchema = z.object({
  consumer_key: z.string().min(1),
  consumer_secret: z.string().min(1),
});

interface Consumer {
  key: string;
  secret: string;
}

async function getConsumer(): Promise<Consumer> {
  const cached = getSecret(TOOL, "consumer-key");
  if (cached) {
    return { key: cached, secret: requireSecret(TOOL, "consumer-secret") };
  }

  debug("garmin: fetching OAuth consumer credentials");
  const res = await fetch(CONSUMER_URL);
  if (!res.ok) throw new HttpError(res.status, "GET", CONSUMER_URL, await res.text());
  const consumer = parseShape(consumerSchema, await res.json(), "OAuth consumer response", (m) => new AuthError(m));

  setSecret(TOOL, "consumer-key", consumer.consumer_key);
  setSecret(TOOL, "consumer-secret", consumer.consumer_secret);
  return { key: consumer.consumer_key, secret: consumer.consumer_secret };
}

// ── SSO Login flow ───────────────────────────────────────────────

export async function login(email: string, password: string, urls: UrlBuilder = garminUrls()): Promise<void> {
  const consumer = await getConsumer();

  // Step 1: SSO cookies
  const embedParams = new URLSearchParams({
    clientId: "GarminConnect",
    locale: "en",
    service: urls.gcModern,
  });
  const embedRes = await fetch(`${urls.ssoEmbed()}?${embedParams}`, {
    headers: { "User-Agent": USER_AGENT },
    redirect: "manual",
  });
  const cookies = extractCookies(embedRes);

  // Step 2: CSRF token
  const signinParams = new URLSearchParams({
    id: "gauth-widget",
    embedWidget: "true",
    clientId: "GarminConnect",
    locale: "en",
    service: urls.gcModern,
  });
  const csrfRes = await fetch(`${urls.signin()}?${signinParams}`, {
    headers: { "User-Agent": USER_AGENT, Cookie: cookies },
  });
  const csrf = extractCsrf(await csrfRes.text());
  const allCookies = mergeCookies(cookies, extractCookies(csrfRes));

  // Step 3: credentials → service ticket
  const loginRes = await fetch(`${urls.signin()}?${signinParams}`, {
    method: "POST",
    headers: {
      "User-Agent": USER_AGENT,
      "Content-Type": "application/x-www-form-urlencoded",
      Cookie: allCookies,
    },
    body: new URLSearchParams({ username: email, password, embed: "true", _csrf: csrf }).toString(),
    redirect: "manual",
  });
  const ticket = extractTicket(await loginRes.text());

  // Step 4: ticket → OAuth1 token
  const preauthUrl = `${urls.oauth()}/preauthorized`;
  const authHeader = signOAuth1({
    method: "GET",
    url: preauthUrl,
    consumerKey: consumer.key,
    consumerSecret: consumer.secret,
    params: { ticket },
  });
  const oauth1Res = await fetch(`${preauthUrl}?ticket=${encodeURIComponent(ticket)}`, {
    headers: { "User-Agent": USER_AGENT, Authorization: authHeader },
  });
  if (!oauth1Res.ok) {
    throw new AuthError(`OAuth1 exchange failed: ${oauth1Res.status} ${await oauth1Res.text()}`);
  }

  const oauth1Params = new URLSearchParams(await oauth1Res.text());
  const oauthToken = oauth1Params.get("oauth_token");
  const oauthTokenSecret = oauth1Params.get("oauth_token_secret");
  if (!oauthToken || !oauthTokenSecret) {
    throw new AuthError("Failed to extract OAuth1 tokens from response");
  }

  setSecret(TOOL, "oauth1-token", oauthToken);
  setSecret(TOOL, "oauth1-secret", oauthTokenSecret);

  // Step 5: OAuth1 → OAuth2
  await exchangeOAuth2(urls, consumer, oauthToken, oauthTokenSecret);
}

export function extractCsrf(html: string): string {
  const match = html.match(/name="_csrf"\s+value="(.+?)"/);
  if (!match?.[1]) throw new AuthError("Could not extract CSRF token from SSO page");
  return match[1];
}

export function extractTicket(html: string): string {
  if (html.includes("locked")) {
    throw new AuthError("Account is locked. Try logging in via web browser first.");
  }
  const match = html.match(/ticket=([^"&\s]+)/);
  if (!match?.[1]) {
    if (html.includes("MFA")) {
      throw new AuthError("MFA is enabled. Log in through the browser and use: pulse garmin import-tokens");
    }
    throw new AuthError("Login failed: could not extract ticket. Check credentials.");
  }
  return match[1];
}

// ── OAuth2 exchange ──────────────────────────────────────────────

const oauth2Schema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number(),
  refresh_token_expires_in: z.number(),
});

async function exchangeOAuth2(
  urls: UrlBuilder,
  consumer: Consumer,
  oauthToken: string,
  oauthTokenSecret: string,
): Promise<void> {
  const exchangeUrl = `${urls.oauth()}/exchange/user/2.0`;
  const authHeader = signOAuth1({
    method: "POST",
    url: exchangeUrl,
    consumerKey: consumer.key,
    consumerSecret: consumer.secret,
    token: oauthToken,
    tokenSecret: oauthTokenSecret,
  });

  const res = await fetch(exchangeUrl, {
    method: "POST",
    headers: {
      "User-Agent": USER_AGENT,
      Authorization: authHeader,
      "Content-Type": "application/x-www-form-urlencoded",
    },
  });
  if (!res.ok) {
    throw new AuthError(`OAuth2 exchange failed: ${res.status} ${await res.text()}`);
  }

  const data = parseShape(oauth2Schema, await res.json(), "OAuth2 exchange response", (m) => new AuthError(m));
  const now = nowSeconds();
  setSecret(TOOL, "access-token", data.access_token);
  setSecret(TOOL, "refresh-token", data.refresh_token);
  setSecret(TOOL, "expires-at", String(now + data.expires_in - 60)); // 60s safety buffer
  setSecret(TOOL, "refresh-expires-at", String(now + data.refresh_token_expires_in - 60));
}

// ── Token management ─────────────────────────────────────────────

function secretNumber(account: string): number {
  return parseInt(getSecret(TOOL, account) ?? "0", 10) || 0;
}

export async function getValidAccessToken(urls: UrlBuilder = garminUrls()): Promise<string> {
  const accessToken = getSecret(TOOL, "access-token");
  if (!accessToken) throw new AuthError("Not logged in. Run: pulse garmin login");

  const now = nowSeconds();
  if (now < secretNumber("expires-at")) {
    return accessToken;
  }

  const oauth1Token = getSecret(TOOL, "oauth1-token");
  const oauth1Secret = getSecret(TOOL, "oauth1-secret");
  if (!oauth1Token || !oauth1Secret) {
    throw new AuthError("OAuth1 tokens missing. Run: pulse garmin login");
  }

  if (now >= secretNumber("refresh-expires-at")) {
    throw new AuthError("Refresh token expired. Run: pulse garmin login");
  }

  debug("garmin: access token expired, re-exchanging OAuth1 token");
  const consumer = await getConsumer();
  await exchangeOAuth2(urls, consumer, oauth1Token, oauth1Secret);

  return requireSecret(TOOL, "access-token");
}

export interface AuthStatus {
  loggedIn: boolean;
  displayName: string | null;
  /** Seconds until expiry; negative once expired. */
  accessExpiresIn: number;
  refreshExpiresIn: number;
}

export function authStatus(now: number = nowSeconds()): AuthStatus {
  return {
    loggedIn: getSecret(TOOL, "oauth1-token") !== null,
    displayName: getSecret(TOOL, "display-name"),
    accessExpiresIn: secretNumber("expires-at") - now,
    refreshExpiresIn: secretNumber("refresh-expires-at") - now,
  };
}

export function logout(): number {
  return clearSecrets(TOOL, SECRET_ACCOUNTS);
}

// ── Import tokens from a garth directory ─────────────────────────

const garthOAuth1Schema = z.object({
  oauth_token: z.string().min(1),
  oauth_token_secret: z.string().min(1),
});

const garthOAuth2Schema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.number(),
  refresh_token_expires_at: z.number(),
});

function readJson(path: string): unknown {
  if (!existsSync(path)) throw new ConfigError(`Not found: ${path}`);
  try {
    return JSON.parse(readFileSync(path, "utf-8")) as unknown;
  } catch (e: unknown) {
    throw new ConfigError(`Not valid JSON: ${path} (${errorMessage(e)})`);
  }
}

export function importTokens(dir: string): void {
  const toConfigError = (m: string) => new ConfigError(m);
  const oauth1 = parseShape(garthOAuth1Schema, readJson(join(dir, "oauth1_token.json")), "oauth1_token.json", toConfigError);
  const oauth2 = parseShape(garthOAuth2Schema, readJson(join(dir, "oauth2_token.json")), "oauth2_token.json", toConfigError);

  setSecret(TOOL, "oauth1-token", oauth1.oauth_token);
  setSecret(TOOL, "oauth1-secret", oauth1.oauth_token_secret);
  setSecret(TOOL, "access-token", oauth2.access_token);
  setSecret(TOOL, "refresh-token", oauth2.refresh_token);
  setSecret(TOOL, "expires-at", String(oauth2.expires_at));
  setSecret(TOOL, "refresh-expires-at", String(oauth2.refresh_token_expires_at));
}

// ── Cookie helpers ───────────────────────────────────────────────

function extractCookies(res: Response): string {
  return res.headers.getSetCookie().map((c) => c.split(";")[0]).join("; ");
}

function mergeCookies(existing: string, fresh: string): string {
  if (!existing) return fresh;
  if (!fresh) return existing;
  return `${existing}; ${fresh}`;
}
