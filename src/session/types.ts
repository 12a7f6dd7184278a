/** The record the host pipes to the hook on stdin when a session ends. */
export interface HookInput {
  readonly sessionId: string;
  readonly transcriptPath: string;
  readonly cwd: string;
}

export interface SessionSettings {
  readonly tokenUsage?: Record<string, unknown> | null;
  readonly model: string;
  readonly assistantActiveTimeMs: number;
}

export interface UsageRecord {
  readonly sessionId: string;
  readonly location: string;
  readonly modelId: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheWriteTokens: number;
  readonly cacheReadTokens: number;
  readonly endTimestamp: string;
  readonly activeDurationMs: number;
}

export type LoadResult =
  | { readonly ok: true; readonly record: UsageRecord }
  | { readonly ok: false; readonly reason: string };
