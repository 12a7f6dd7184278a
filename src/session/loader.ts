import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import { expandHome } from "../config/paths.js";
import { parseSettings, tokenUsageSchema } from "./schema.js";
import { findLastTimestamp } from "./transcript.js";
import type { HookInput, LoadResult, SessionSettings } from "./types.js";

export const DEFAULT_LOCATION = "The Cloud";

export function settingsPathFor(transcriptPath: string): string {
  return expandHome(transcriptPath).replace(/\.jsonl$/, ".settings.json");
}

export function readSessionSettings(settingsPath: string): SessionSettings | null {
  if (!existsSync(settingsPath)) return null;
  const raw = JSON.parse(readFileSync(settingsPath, "utf-8")) as unknown;
  return parseSettings(raw);
}

export function locationFor(cwd: string): string {
  const name = cwd ? basename(cwd) : "";
  return name || DEFAULT_LOCATION;
}

export function loadUsageRecord(input: HookInput, now: () => Date = () => new Date()): LoadResult {
  if (!input.sessionId) {
    return { ok: false, reason: "No session id in hook input" };
  }

  const settingsPath = settingsPathFor(input.transcriptPath);
  const settings = readSessionSettings(settingsPath);
  if (!settings) {
    return { ok: false, reason: `No session settings found at ${settingsPath}` };
  }

  if (!settings.tokenUsage || Object.keys(settings.tokenUsage).length === 0) {
    return { ok: false, reason: "No token usage data available" };
  }
  const tokens = tokenUsageSchema.parse(settings.tokenUsage);

  const endTimestamp =
    findLastTimestamp(expandHome(input.transcriptPath)) ?? now().toISOString();

  return {
    ok: true,
    record: {
      sessionId: input.sessionId,
      location: locationFor(input.cwd),
      modelId: settings.model,
      inputTokens: tokens.inputTokens,
      outputTokens: tokens.outputTokens,
      cacheWriteTokens: tokens.cacheCreationTokens,
      cacheReadTokens: tokens.cacheReadTokens,
      endTimestamp,
      activeDurationMs: settings.assistantActiveTimeMs,
    },
  };
}
