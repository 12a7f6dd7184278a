export interface ModelEntry {
  readonly displayName: string;
  readonly multiplier: number;
}

export const MODEL_CATALOG: Readonly<Record<string, ModelEntry>> = {
  "claude-opus-4-6": { displayName: "Claude Opus 4.6", multiplier: 2 },
  "claude-opus-4-6-fast": { displayName: "Claude Opus 4.6 Fast", multiplier: 3 },
  "claude-opus-4-5-20251101": { displayName: "Claude Opus 4.5", multiplier: 2 },
  "claude-sonnet-4-5-20250929": { displayName: "Claude Sonnet 4.5", multiplier: 1.2 },
  "claude-haiku-4-5-20251001": { displayName: "Claude Haiku 4.5", multiplier: 0.4 },
  "gpt-5.1-codex-max": { displayName: "GPT-5.1 Codex Max", multiplier: 1 },
  "gpt-5.1-codex": { displayName: "GPT-5.1 Codex", multiplier: 0.5 },
  "gpt-5.1": { displayName: "GPT-5.1", multiplier: 0.5 },
  "gpt-5.2": { displayName: "GPT-5.2", multiplier: 0.7 },
  "gpt-5.2-codex": { displayName: "GPT-5.2 Codex", multiplier: 0.7 },
  "gpt-5.3-codex": { displayName: "GPT-5.3 Codex", multiplier: 0.7 },
  "gemini-3-pro-preview": { displayName: "Gemini 3 Pro", multiplier: 0.8 },
  "gemini-3-flash-preview": { displayName: "Gemini 3 Flash", multiplier: 0.2 },
  "glm-4.7": { displayName: "Droid Core (GLM-4.7)", multiplier: 0.25 },
  "glm-5": { displayName: "Droid Core (GLM-5)", multiplier: 0.4 },
  "kimi-k2.5": { displayName: "Droid Core (Kimi K2.5)", multiplier: 0.25 },
  "minimax-m2.5": { displayName: "MiniMax M2.5", multiplier: 0.12 },
};
