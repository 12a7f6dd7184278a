import { loadConfig } from "../config/loader.js";
import { getReceiptsDir } from "../config/paths.js";
import type { ReceiptsConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { createPricingTable } from "../pricing/calculator.js";
import type { PricingTable } from "../pricing/types.js";

export interface Runtime {
  readonly config: ReceiptsConfig;
  readonly logger: Logger;
  readonly receiptsDir: string;
  readonly pricing: PricingTable;
}

export function createRuntime(configPath?: string): Runtime {
  const config = loadConfig(configPath);
  return {
    config,
    logger: createLogger(config.logging),
    receiptsDir: getReceiptsDir(config),
    pricing: createPricingTable(config.pricing),
  };
}

export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
