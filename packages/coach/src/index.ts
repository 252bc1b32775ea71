export * from "./readiness.ts";
export * from "./plan.ts";
export * from "./narrative.ts";
export * from "./history.ts";
export { register } from "./cli.ts";
