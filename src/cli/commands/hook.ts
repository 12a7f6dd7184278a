import { Command, Option } from "clipanion";
import { receiptFormatSchema } from "../../config/schema.js";
import { generateReceipt } from "../../receipt/generator.js";
import { openReceipt } from "../../receipt/opener.js";
import { parseHookInput } from "../../session/schema.js";
import { createRuntime, errorMessage, readAll, type Runtime } from "../runtime.js";

export class HookCommand extends Command {
  static override paths = [Command.Default, ["hook"]];

  static override usage = Command.Usage({
    description: "Generate a receipt from a session-end hook payload on stdin",
    details: `
      Reads \`{ session_id, transcript_path, cwd }\` from stdin. Always exits
      with code 0 so the host's session-end flow is never interrupted.
    `,
    examples: [
      ["Run as a hook", "droid-receipts hook < payload.json"],
      ["Write both formats", "droid-receipts hook --format both < payload.json"],
    ],
  });

  format = Option.String("--format", { description: "html, svg or both" });

  async execute(): Promise<number> {
    let runtime: Runtime | undefined;
    try {
      runtime = createRuntime();
      const input = parseHookInput(await readAll(this.context.stdin));
      const format = this.format
        ? receiptFormatSchema.parse(this.format.toLowerCase())
        : runtime.config.format;

      const outcome = generateReceipt(input, {
        format,
        receiptsDir: runtime.receiptsDir,
        logger: runtime.logger,
        pricing: runtime.pricing,
      });
      if (outcome.status === "skipped") return 0;

      for (const file of outcome.files) {
        this.context.stdout.write(`${file.kind.toUpperCase()} receipt saved to ${file.path}\n`);
      }
      const first = outcome.files[0];
      if (runtime.config.open && first) {
        openReceipt(first.path, runtime.logger);
      }
    } catch (err) {
      runtime?.logger.error({ err }, "Receipt generation failed");
      this.context.stderr.write(`Error generating receipt: ${errorMessage(err)}\n`);
    }
    return 0;
  }
}
