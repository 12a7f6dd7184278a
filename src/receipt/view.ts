import { modelDisplayName } from "../pricing/calculator.js";
import type { CategoryCost, CostBreakdown } from "../pricing/types.js";
import type { UsageRecord } from "../session/types.js";
import {
  formatCurrency,
  formatDate,
  formatDuration,
  formatNumber,
  formatTokens,
} from "./format.js";
import { servedByLabel } from "./served-by.js";
import type { ReceiptLineItem, ReceiptView } from "./types.js";

export const MAX_LOCATION_LENGTH = 30;
const SESSION_SHORT_LENGTH = 8;

/** Cuts by code point so a surrogate pair is never split. */
function truncate(text: string, length: number): string {
  return Array.from(text).slice(0, length).join("");
}

function lineItem(label: string, cost: CategoryCost): ReceiptLineItem {
  return {
    label,
    quantity: formatNumber(cost.rawTokens),
    price: formatCurrency(cost.costUsd),
  };
}

export function buildReceiptView(record: UsageRecord, breakdown: CostBreakdown): ReceiptView {
  const items: ReceiptLineItem[] = [
    lineItem("Input tokens", breakdown.input),
    lineItem("Output tokens", breakdown.output),
  ];
  if (breakdown.cacheWrite.rawTokens > 0) {
    items.push(lineItem("Cache write", breakdown.cacheWrite));
  }
  if (breakdown.cacheRead.rawTokens > 0) {
    items.push(lineItem("Cache read", breakdown.cacheRead));
  }

  return {
    sessionShort: truncate(record.sessionId, SESSION_SHORT_LENGTH),
    location: truncate(record.location, MAX_LOCATION_LENGTH),
    modelName: modelDisplayName(record.modelId),
    servedBy: servedByLabel(record.sessionId),
    date: formatDate(record.endTimestamp),
    duration: formatDuration(record.activeDurationMs),
    items,
    totalRawTokens: formatNumber(breakdown.totalRawTokens),
    totalBilledTokens: formatTokens(breakdown.totalBilledTokens),
    multiplier: `${breakdown.multiplier}x`,
    totalCost: formatCurrency(breakdown.totalCostUsd),
  };
}
