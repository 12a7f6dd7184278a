import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ReceiptsConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig, receiptFormatSchema } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Environment switches take precedence over the config file. */
export function applyEnvOverrides(config: ReceiptsConfig): ReceiptsConfig {
  const rawFormat = process.env["DROID_RECEIPT_FORMAT"];
  if (rawFormat === undefined) return config;

  const format = receiptFormatSchema.safeParse(rawFormat.trim().toLowerCase());
  return format.success ? { ...config, format: format.data } : config;
}

export function loadConfig(path?: string): ReceiptsConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return applyEnvOverrides(parseConfig({}));
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  const raw = JSON.parse(substituted) as unknown;
  return applyEnvOverrides(parseConfig(raw));
}
