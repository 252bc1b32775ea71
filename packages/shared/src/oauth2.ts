import { getSecret, setSecret, clearSecrets } from "./secrets.ts";
import { AuthError } from "./errors.ts";
import { debug } from "./output.ts";

export interface OAuth2Config {
  authorizeUrl: string;
  tokenUrl: string;
  scopes: string[];
}

export interface OAuth2Tokens {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // unix seconds
}

export interface OAuth2Credentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

const OAUTH2_ACCOUNTS = [
  "client-id", "client-secret", "redirect-uri", "access-token", "refresh-token", "expires-at",
] as const;

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function saveOAuth2Credentials(tool: string, creds: OAuth2Credentials): void {
  setSecret(tool, "client-id", creds.clientId);
  setSecret(tool, "client-secret", creds.clientSecret);
  setSecret(tool, "redirect-uri", creds.redirectUri);
}

export function loadOAuth2Credentials(tool: string): OAuth2Credentials {
  const clientId = getSecret(tool, "client-id");
  const clientSecret = getSecret(tool, "client-secret");
  const redirectUri = getSecret(tool, "redirect-uri");
  if (!clientId || !clientSecret || !redirectUri) {
    throw new AuthError(`No OAuth2 credentials for "${tool}". Run: pulse ${tool} auth-setup`);
  }
  return { clientId, clientSecret, redirectUri };
}

export function buildAuthorizeUrl(
  config: OAuth2Config,
  clientId: string,
  redirectUri: string,
  state: string
): string {
  const params = new URLSearchParams({
    response_type: "code",
    client_id: clientId,
    redirect_uri: redirectUri,
    scope: config.scopes.join(" "),
    state,
  });
  return `${config.authorizeUrl}?${params}`;
}

/**
 * Pull the authorization code out of the redirect URL the user pasted back.
 */
export function extractAuthorizationCode(redirectUrl: string, expectedState: string): string {
  let url: URL;
  try {
    url = new URL(redirectUrl.trim());
  } catch {
    throw new AuthError("Redirect URL is not a valid URL.");
  }
  const error = url.searchParams.get("error");
  if (error) {
    throw new AuthError(`Authorization denied: ${url.searchParams.get("error_description") ?? error}`);
  }
  if (url.searchParams.get("state") !== expectedState) {
    throw new AuthError("State mismatch in redirect URL. Start the login again.");
  }
  const code = url.searchParams.get("code");
  if (!code) {
    throw new AuthError("Could not extract authorization code from URL.");
  }
  return code;
}

async function postTokenRequest(
  config: OAuth2Config,
  body: URLSearchParams,
  failure: string,
  existingRefreshToken?: string,
): Promise<OAuth2Tokens> {
  const res = await fetch(config.tokenUrl, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body,
  });

  const data: unknown = await res.json().catch(() => ({}));
  const record = isRecord(data) ? data : {};
  if (!res.ok || typeof record.access_token !== "string" || !record.access_token) {
    const detail = record.error_description ?? record.error ?? `HTTP ${res.status}`;
    throw new AuthError(`${failure}: ${String(detail)}`);
  }
  return parseTokenResponse(record, existingRefreshToken);
}

export async function exchangeCode(
  config: OAuth2Config,
  creds: OAuth2Credentials,
  code: string
): Promise<OAuth2Tokens> {
  const body = new URLSearchParams({
    grant_type: "authorization_code",
    code,
    client_id: creds.clientId,
    client_secret: creds.clientSecret,
    redirect_uri: creds.redirectUri,
  });
  return postTokenRequest(config, body, "Token exchange failed");
}

export async function refreshAccessToken(
  config: OAuth2Config,
  creds: OAuth2Credentials,
  refreshToken: string
): Promise<OAuth2Tokens> {
  const body = new URLSearchParams({
    grant_type: "refresh_token",
    refresh_token: refreshToken,
    client_id: creds.clientId,
    client_secret: creds.clientSecret,
    scope: config.scopes.join(" "),
  });
  return postTokenRequest(
    config,
    body,
    "Token refresh failed (re-authenticate with auth-login)",
    refreshToken,
  );
}

export function saveTokens(tool: string, tokens: OAuth2Tokens): void {
  setSecret(tool, "access-token", tokens.accessToken);
  setSecret(tool, "refresh-token", tokens.refreshToken);
  setSecret(tool, "expires-at", String(tokens.expiresAt));
}

/** Returns null if not logged in. */
export function loadTokens(tool: string): OAuth2Tokens | null {
  const accessToken = getSecret(tool, "access-token");
  const refreshToken = getSecret(tool, "refresh-token");
  const expiresAt = getSecret(tool, "expires-at");
  if (!accessToken || !refreshToken) return null;
  return {
    accessToken,
    refreshToken,
    expiresAt: expiresAt ? parseInt(expiresAt, 10) : 0,
  };
}

/**
 * Get a valid access token, refreshing and persisting it when expired.
 */
export async function getValidAccessToken(
  tool: string,
  config: OAuth2Config
): Promise<string> {
  const tokens = loadTokens(tool);
  if (!tokens) {
    throw new AuthError(`Not logged in. Run: pulse ${tool} auth-login`);
  }

  if (nowSeconds() < tokens.expiresAt) {
    return tokens.accessToken;
  }

  debug(`${tool}: access token expired, refreshing`);
  const creds = loadOAuth2Credentials(tool);
  const refreshed = await refreshAccessToken(config, creds, tokens.refreshToken);
  saveTokens(tool, refreshed);
  return refreshed.accessToken;
}

/**
 * Concurrent callers share one pending call to `fn`; the first call after it
 * settles starts a new one. Used around token getters, since a refresh token
 * is consumed by the first refresh that presents it.
 */
export function shareInFlight<T>(fn: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | null = null;
  return () => {
    if (!pending) {
      pending = fn().finally(() => {
        pending = null;
      });
    }
    return pending;
  };
}

export function clearOAuth2Data(tool: string): number {
  return clearSecrets(tool, OAUTH2_ACCOUNTS);
}

// ── Internal ──────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parseTokenResponse(
  data: Record<string, unknown>,
  existingRefreshToken?: string,
): OAuth2Tokens {
  if (typeof data.access_token !== "string" || !data.access_token) {
    throw new AuthError("Token response missing valid access_token");
  }

  const rawExpires = data.expires_in;
  const expiresIn = typeof rawExpires === "number" ? rawExpires
    : typeof rawExpires === "string" ? parseInt(rawExpires, 10) || 3600
    : 3600;

  const rawRefresh = data.refresh_token;
  const refreshToken = (typeof rawRefresh === "string" && rawRefresh)
    ? rawRefresh
    : existingRefreshToken;
  if (!refreshToken) {
    throw new AuthError("No refresh token in response and no existing token to preserve");
  }

  return {
    accessToken: data.access_token,
    refreshToken,
    expiresAt: nowSeconds() + expiresIn - 60, // 60s safety buffer
  };
}
