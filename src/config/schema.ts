import { z } from "zod";
import type { ReceiptsConfig } from "./types.js";

export const receiptFormatSchema = z.enum(["html", "svg", "both"]);

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const pricingSchema = z.object({
  pricePerMillion: z.number().nonnegative().default(1),
  cacheReadDiscount: z.number().min(0).max(1).default(0.1),
  models: z.record(z.string(), z.number().nonnegative()).default({}),
});

export const receiptsConfigSchema = z.object({
  format: receiptFormatSchema.default("html"),
  outputDir: z.string().min(1).optional(),
  open: z.boolean().default(true),
  logging: loggingSchema.default({}),
  pricing: pricingSchema.default({}),
});

export function parseConfig(raw: unknown): ReceiptsConfig {
  return receiptsConfigSchema.parse(raw);
}
