import type { PricingConfig } from "../config/types.js";
import { MODEL_CATALOG } from "./models.js";
import type { CategoryCost, CostBreakdown, PricingTable, TokenCounts } from "./types.js";

export const DEFAULT_MULTIPLIER = 1;
export const PRICE_PER_MILLION = 1;
export const CACHE_READ_DISCOUNT = 0.1;

const TOKENS_PER_MILLION = 1_000_000;

export const DEFAULT_PRICING: PricingTable = {
  pricePerMillion: PRICE_PER_MILLION,
  cacheReadDiscount: CACHE_READ_DISCOUNT,
  multipliers: Object.fromEntries(
    Object.entries(MODEL_CATALOG).map(([id, entry]) => [id, entry.multiplier]),
  ),
};

/** `"provider:claude-opus-4-6"` → `"claude-opus-4-6"`. */
export function normalizeModelId(modelId: string): string {
  return modelId.slice(modelId.lastIndexOf(":") + 1);
}

export function resolveMultiplier(table: PricingTable, modelId: string): number {
  const key = normalizeModelId(modelId);
  return Object.hasOwn(table.multipliers, key) ? table.multipliers[key] : DEFAULT_MULTIPLIER;
}

export function modelDisplayName(modelId: string): string {
  const key = normalizeModelId(modelId);
  return Object.hasOwn(MODEL_CATALOG, key) ? MODEL_CATALOG[key].displayName : modelId;
}

export function createPricingTable(overrides?: Partial<PricingConfig>): PricingTable {
  return {
    pricePerMillion: overrides?.pricePerMillion ?? DEFAULT_PRICING.pricePerMillion,
    cacheReadDiscount: overrides?.cacheReadDiscount ?? DEFAULT_PRICING.cacheReadDiscount,
    multipliers: { ...DEFAULT_PRICING.multipliers, ...overrides?.models },
  };
}

function toCount(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

function costOf(billedTokens: number, table: PricingTable): number {
  return (billedTokens / TOKENS_PER_MILLION) * table.pricePerMillion;
}

function category(rawTokens: number, billedTokens: number, table: PricingTable): CategoryCost {
  return { rawTokens, billedTokens, costUsd: costOf(billedTokens, table) };
}

export function calculateCost(
  modelId: string,
  counts: TokenCounts,
  table: PricingTable = DEFAULT_PRICING,
): CostBreakdown {
  const multiplier = resolveMultiplier(table, modelId);
  const inputTokens = toCount(counts.inputTokens);
  const outputTokens = toCount(counts.outputTokens);
  const cacheWriteTokens = toCount(counts.cacheWriteTokens);
  const cacheReadTokens = toCount(counts.cacheReadTokens);

  const input = category(inputTokens, inputTokens * multiplier, table);
  const output = category(outputTokens, outputTokens * multiplier, table);
  const cacheWrite = category(cacheWriteTokens, cacheWriteTokens * multiplier, table);
  const cacheRead = category(
    cacheReadTokens,
    cacheReadTokens * multiplier * table.cacheReadDiscount,
    table,
  );

  const totalBilledTokens =
    input.billedTokens + output.billedTokens + cacheWrite.billedTokens + cacheRead.billedTokens;

  return {
    modelKey: normalizeModelId(modelId),
    multiplier,
    input,
    output,
    cacheWrite,
    cacheRead,
    totalRawTokens: inputTokens + outputTokens + cacheWriteTokens + cacheReadTokens,
    totalBilledTokens,
    // Equal to the sum of the four category costs, divided once.
    totalCostUsd: costOf(totalBilledTokens, table),
  };
}
