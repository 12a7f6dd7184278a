export interface TokenCounts {
  readonly inputTokens?: number;
  readonly outputTokens?: number;
  readonly cacheWriteTokens?: number;
  readonly cacheReadTokens?: number;
}

export interface PricingTable {
  readonly pricePerMillion: number;
  readonly cacheReadDiscount: number;
  readonly multipliers: Readonly<Record<string, number>>;
}

export interface CategoryCost {
  readonly rawTokens: number;
  readonly billedTokens: number;
  readonly costUsd: number;
}

export interface CostBreakdown {
  /** Model id after namespace stripping; the key used for the table lookup. */
  readonly modelKey: string;
  readonly multiplier: number;
  readonly input: CategoryCost;
  readonly output: CategoryCost;
  readonly cacheWrite: CategoryCost;
  readonly cacheRead: CategoryCost;
  /** Unweighted sum of the four raw counts, for display only. */
  readonly totalRawTokens: number;
  readonly totalBilledTokens: number;
  readonly totalCostUsd: number;
}
