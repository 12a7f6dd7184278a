export type ReceiptFormat = "html" | "svg" | "both";

export interface ReceiptsConfig {
  readonly format: ReceiptFormat;
  readonly outputDir?: string;
  readonly open: boolean;
  readonly logging: LoggingConfig;
  readonly pricing: PricingConfig;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface PricingConfig {
  /** Dollars per million billed tokens. */
  readonly pricePerMillion: number;
  /** Extra factor applied to cache-read tokens on top of the model multiplier. */
  readonly cacheReadDiscount: number;
  /** Multiplier overrides keyed by normalized model id. */
  readonly models: Record<string, number>;
}
