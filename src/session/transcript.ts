import { existsSync, readFileSync } from "node:fs";

function timestampOf(line: string): string | null {
  let entry: unknown;
  try {
    entry = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof entry !== "object" || entry === null || !("timestamp" in entry)) {
    return null;
  }
  return typeof entry.timestamp === "string" ? entry.timestamp : null;
}

/**
 * Timestamp of the last well-formed transcript entry that carries one.
 * Malformed lines are skipped.
 */
export function findLastTimestamp(transcriptPath: string): string | null {
  if (!transcriptPath || !existsSync(transcriptPath)) return null;

  const lines = readFileSync(transcriptPath, "utf-8").split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]?.trim();
    if (!line) continue;
    const timestamp = timestampOf(line);
    if (timestamp !== null) return timestamp;
  }
  return null;
}
