import { Command, Option } from "clipanion";
import { basename, resolve } from "node:path";
import { receiptFormatSchema } from "../../config/schema.js";
import { formatCurrency } from "../../receipt/format.js";
import { generateReceipt } from "../../receipt/generator.js";
import { createRuntime, errorMessage } from "../runtime.js";

export class RenderCommand extends Command {
  static override paths = [["render"]];

  static override usage = Command.Usage({
    description: "Render a receipt for an existing session transcript",
    examples: [
      ["Render from a transcript", "droid-receipts render ~/.factory/sessions/abc123.jsonl"],
      [
        "Render an SVG into a custom directory",
        "droid-receipts render ./abc123.jsonl --format svg --out ./receipts",
      ],
    ],
  });

  transcript = Option.String();
  session = Option.String("--session", { description: "Session id (defaults to the transcript name)" });
  cwd = Option.String("--cwd", { description: "Working directory shown as the location" });
  format = Option.String("--format", { description: "html, svg or both" });
  out = Option.String("--out", { description: "Directory to write receipts to" });

  async execute(): Promise<number> {
    try {
      const runtime = createRuntime();
      const format = this.format
        ? receiptFormatSchema.parse(this.format.toLowerCase())
        : runtime.config.format;

      const outcome = generateReceipt(
        {
          sessionId: this.session ?? basename(this.transcript, ".jsonl"),
          transcriptPath: this.transcript,
          cwd: this.cwd ?? "",
        },
        {
          format,
          receiptsDir: this.out ? resolve(this.out) : runtime.receiptsDir,
          logger: runtime.logger,
          pricing: runtime.pricing,
        },
      );

      if (outcome.status === "skipped") {
        this.context.stdout.write(`Skipped: ${outcome.reason}\n`);
        return 1;
      }

      for (const file of outcome.files) {
        this.context.stdout.write(`${file.kind.toUpperCase()} receipt saved to ${file.path}\n`);
      }
      this.context.stdout.write(`Total: ${formatCurrency(outcome.breakdown.totalCostUsd)}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Failed to render receipt: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
