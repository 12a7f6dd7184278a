export const SERVED_BY_PREFIXES = [
  "R2", "C3", "BB", "K2", "IG", "BD", "QT", "AP", "RX", "TC", "GNK", "WED",
] as const;

/**
 * Droid-style cashier name derived from the session id, e.g. `TC-1B2`.
 * Deterministic, not unique.
 */
export function servedByLabel(sessionId: string): string {
  const hex = sessionId.toUpperCase().replace(/[^0-9A-F]/g, "").padEnd(8, "0");
  const prefix = SERVED_BY_PREFIXES[parseInt(hex.charAt(0), 16) % SERVED_BY_PREFIXES.length];
  return `${prefix}-${hex.slice(1, 4)}`;
}
