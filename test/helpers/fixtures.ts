import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { Writable } from "node:stream";
import pino from "pino";
import type { Logger } from "../../src/logging/logger.js";
import type { UsageRecord } from "../../src/session/types.js";

export function makeUsageRecord(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    sessionId: "a1b2c3d4-e5f6-7890",
    location: "my-project",
    modelId: "claude-opus-4-6",
    inputTokens: 100_000,
    outputTokens: 50_000,
    cacheWriteTokens: 0,
    cacheReadTokens: 5_000,
    endTimestamp: "2025-01-15T10:30:45Z",
    activeDurationMs: 125_000,
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export interface SessionFiles {
  readonly transcriptPath: string;
  readonly settingsPath: string;
}

/** Writes `<id>.jsonl` and `<id>.settings.json` into `dir`. */
export function writeSessionFiles(
  dir: string,
  sessionId: string,
  settings: unknown,
  transcriptLines: string[] = [],
): SessionFiles {
  const transcriptPath = join(dir, `${sessionId}.jsonl`);
  const settingsPath = join(dir, `${sessionId}.settings.json`);
  writeFileSync(transcriptPath, transcriptLines.join("\n") + "\n");
  writeFileSync(settingsPath, JSON.stringify(settings));
  return { transcriptPath, settingsPath };
}

export const SAMPLE_SETTINGS = {
  tokenUsage: {
    inputTokens: 1000,
    outputTokens: 500,
    cacheCreationTokens: 0,
    cacheReadTokens: 200,
  },
  model: "custom:gpt-5.1",
  assistantActiveTimeMs: 45_000,
};

export const SAMPLE_TRANSCRIPT = [
  JSON.stringify({ type: "message", timestamp: "2025-03-01T09:00:00Z" }),
  JSON.stringify({ type: "message", timestamp: "2025-03-01T09:15:30Z" }),
  "{not json",
  "",
];

export function captureStream(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += String(chunk);
      cb();
    },
  });
  return { stream, output: () => buf };
}
