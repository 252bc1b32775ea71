export * from "./url-builder.ts";
export {
  TOOL,
  USER_AGENT,
  authStatus,
  garminUrls,
  getValidAccessToken,
  importTokens,
  login,
  logout,
  percentEncode,
  signOAuth1,
  type AuthStatus,
  type OAuth1Request,
} from "./auth.ts";
export { createGarminProvider } from "./providers/garmin.ts";
export { register } from "./cli.ts";
