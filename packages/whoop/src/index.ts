export {
  OAUTH2_CONFIG,
  TOOL,
  createWhoopProvider,
  mapRecoveryHrv,
  mapRecoveryRhr,
  mapSleep,
  rangeParams,
} from "./providers/whoop.ts";
export { register } from "./cli.ts";
