import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { HookCommand } from "./commands/hook.js";
import { PricingCommand } from "./commands/pricing.js";
import { RenderCommand } from "./commands/render.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Droid Receipts",
    binaryName: "droid-receipts",
    binaryVersion: VERSION,
  });

  cli.register(HookCommand);
  cli.register(RenderCommand);
  cli.register(PricingCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
