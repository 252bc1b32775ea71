import { Command } from "commander";
import { errorMessage, loadSettings, parseProvider } from "@pulse/shared";
import { debugEnabled, error } from "@pulse/shared/output";
import { register as registerBiometrics, type ProviderResolver } from "@pulse/biometrics";
import { register as registerCoach } from "@pulse/coach";
import { createGarminProvider, register as registerGarmin } from "@pulse/garmin";
import { createWhoopProvider, register as registerWhoop } from "@pulse/whoop";
import { register as registerConfig } from "./modules/config/index.ts";

const resolveProvider: ProviderResolver = (name) => {
  const provider = name ? parseProvider(name) : loadSettings().provider;
  return provider === "garmin" ? createGarminProvider() : createWhoopProvider();
};

const program = new Command();

program
  .name("pulse")
  .description("Wearable biometrics and daily coaching from the terminal")
  .version("0.1.0");

// Register modules
registerConfig(program);
registerGarmin(program);
registerWhoop(program);
registerBiometrics(program, resolveProvider);
registerCoach(program, resolveProvider);

try {
  await program.parseAsync(process.argv);
} catch (e: unknown) {
  error(errorMessage(e));
  if (debugEnabled() && e instanceof Error && e.stack) console.error(e.stack);
  process.exit(1);
}
