import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { ReceiptsConfig } from "./types.js";

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function getFactoryDir(): string {
  return process.env["FACTORY_HOME"] ?? join(homedir(), ".factory");
}

export function getConfigPath(): string {
  return process.env["DROID_RECEIPTS_CONFIG"] ?? join(getFactoryDir(), "droid-receipts.json");
}

export function getReceiptsDir(config?: Pick<ReceiptsConfig, "outputDir">): string {
  const fromEnv = process.env["DROID_RECEIPTS_DIR"];
  if (fromEnv) return fromEnv;
  if (config?.outputDir) return expandHome(config.outputDir);
  return join(getFactoryDir(), "receipts");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
