import { z } from "zod";
import type { HookInput, SessionSettings } from "./types.js";

const hookInputSchema = z.object({
  session_id: z.string().default(""),
  transcript_path: z.string().default(""),
  cwd: z.string().default(""),
});

const settingsSchema = z.object({
  tokenUsage: z.record(z.string(), z.unknown()).nullish(),
  model: z.string().default("unknown"),
  assistantActiveTimeMs: z.number().nonnegative().default(0),
});

const tokenCount = z.number().nonnegative().default(0);

export const tokenUsageSchema = z.object({
  inputTokens: tokenCount,
  outputTokens: tokenCount,
  cacheCreationTokens: tokenCount,
  cacheReadTokens: tokenCount,
});

export function parseHookInput(raw: string): HookInput {
  const parsed = hookInputSchema.parse(JSON.parse(raw));
  return {
    sessionId: parsed.session_id,
    transcriptPath: parsed.transcript_path,
    cwd: parsed.cwd,
  };
}

export function parseSettings(raw: unknown): SessionSettings {
  return settingsSchema.parse(raw);
}
