import { Command } from "commander";
import { getModuleConfigPath, loadSettings, setSetting } from "@pulse/shared";
import * as out from "@pulse/shared/output";

export function register(parent: Command): void {
  const config = parent
    .command("config")
    .description("Show or change settings");

  config
    .command("show")
    .description("Print effective settings (defaults filled in)")
    .action(() => {
      out.json(loadSettings());
    });

  config
    .command("set <key> <value>")
    .description("Set a dotted key, e.g. coach.baselineDays 21")
    .action((key: string, value: string) => {
      setSetting(key, value);
      out.success(`${key} updated.`);
    });

  config
    .command("path")
    .description("Print the settings file location")
    .action(() => {
      console.log(getModuleConfigPath("settings"));
    });
}
