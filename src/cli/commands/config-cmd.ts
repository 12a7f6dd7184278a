import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath, getReceiptsDir } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { errorMessage } from "../runtime.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration",
    examples: [["Show config", "droid-receipts config show"]],
  });

  async execute(): Promise<number> {
    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    const effective = { ...config, receiptsDir: getReceiptsDir(config) };
    this.context.stdout.write(JSON.stringify(effective, null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "droid-receipts config validate"],
      ["Validate specific file", "droid-receipts config validate ./droid-receipts.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const substituted = substituteEnv(content);
      const raw = JSON.parse(substituted) as unknown;
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` + `  ${errorMessage(err)}\n`,
      );
      return 1;
    }
  }
}
