export type * from "./types.ts";
export * from "./dates.ts";
export * from "./normalize.ts";
export * from "./stats.ts";
export * from "./cache.ts";
export * from "./sync.ts";
export * from "./format.ts";
export { register, type ProviderResolver } from "./cli.ts";
