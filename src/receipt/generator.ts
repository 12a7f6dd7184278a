import type { ReceiptFormat } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { calculateCost, DEFAULT_PRICING } from "../pricing/calculator.js";
import type { CostBreakdown, PricingTable } from "../pricing/types.js";
import { loadUsageRecord } from "../session/loader.js";
import type { HookInput } from "../session/types.js";
import { renderReceipts } from "./renderer.js";
import { buildReceiptView } from "./view.js";
import { writeReceipts, type WrittenReceipt } from "./writer.js";

export interface GenerateReceiptOpts {
  readonly format: ReceiptFormat;
  readonly receiptsDir: string;
  readonly logger: Logger;
  readonly pricing?: PricingTable;
  readonly now?: () => Date;
}

export type GenerateOutcome =
  | { readonly status: "skipped"; readonly reason: string }
  | {
      readonly status: "written";
      readonly files: WrittenReceipt[];
      readonly breakdown: CostBreakdown;
    };

export function generateReceipt(input: HookInput, opts: GenerateReceiptOpts): GenerateOutcome {
  const logger = opts.logger.child({ component: "receipt", sessionId: input.sessionId });

  const loaded = loadUsageRecord(input, opts.now);
  if (!loaded.ok) {
    logger.info(loaded.reason);
    return { status: "skipped", reason: loaded.reason };
  }

  const { record } = loaded;
  const breakdown = calculateCost(record.modelId, record, opts.pricing ?? DEFAULT_PRICING);
  logger.debug(
    {
      model: breakdown.modelKey,
      multiplier: breakdown.multiplier,
      billedTokens: breakdown.totalBilledTokens,
      costUsd: breakdown.totalCostUsd,
    },
    "Calculated session cost",
  );

  const view = buildReceiptView(record, breakdown);
  const files = writeReceipts(opts.receiptsDir, record.sessionId, renderReceipts(view, opts.format));
  for (const file of files) {
    logger.info({ path: file.path, kind: file.kind }, "Receipt written");
  }

  return { status: "written", files, breakdown };
}
