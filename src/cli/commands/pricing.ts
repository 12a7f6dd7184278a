import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import {
  createPricingTable,
  modelDisplayName,
  normalizeModelId,
  resolveMultiplier,
} from "../../pricing/calculator.js";
import { errorMessage } from "../runtime.js";

export class PricingCommand extends Command {
  static override paths = [["pricing"]];

  static override usage = Command.Usage({
    description: "Show the effective per-model pricing table",
    examples: [
      ["List all models", "droid-receipts pricing"],
      ["Resolve one model", "droid-receipts pricing --model custom:claude-opus-4-6"],
    ],
  });

  model = Option.String("--model", { description: "Resolve a single model id" });

  async execute(): Promise<number> {
    let table;
    try {
      table = createPricingTable(loadConfig().pricing);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    this.context.stdout.write(`Base price:    $${table.pricePerMillion} / 1M billed tokens\n`);
    this.context.stdout.write(`Cache reads:   x${table.cacheReadDiscount}\n`);

    if (this.model) {
      this.context.stdout.write(`Model:         ${normalizeModelId(this.model)}\n`);
      this.context.stdout.write(`Display name:  ${modelDisplayName(this.model)}\n`);
      this.context.stdout.write(`Multiplier:    ${resolveMultiplier(table, this.model)}x\n`);
      return 0;
    }

    this.context.stdout.write(`\n`);
    const ids = Object.keys(table.multipliers).sort();
    const width = Math.max(...ids.map((id) => id.length));
    for (const id of ids) {
      this.context.stdout.write(
        `  ${id.padEnd(width)}  ${String(resolveMultiplier(table, id)).padStart(5)}x  ${modelDisplayName(id)}\n`,
      );
    }
    return 0;
  }
}
