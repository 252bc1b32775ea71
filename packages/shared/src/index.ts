export * from "./errors.ts";
export * from "./config.ts";
export * from "./settings.ts";
export * from "./secrets.ts";
export * from "./http.ts";
export * from "./oauth2.ts";
export { error, warn, debug } from "./output.ts";
