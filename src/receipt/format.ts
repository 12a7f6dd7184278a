const thousands = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/**
 * `toFixed` with exact ties sent to the even digit (`0.125` → `"0.12"`).
 * Only values whose binary form is exactly halfway count as ties, so
 * `0.085` still becomes `"0.09"`.
 */
export function toFixedEven(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return rounded;

  // 100 places hold the full expansion of any double large enough to tie.
  const exact = Math.abs(value).toFixed(100);
  const point = exact.indexOf(".");
  if (!/^50*$/.test(exact.slice(point + 1 + digits))) return rounded;

  const truncated = exact.slice(0, digits > 0 ? point + 1 + digits : point);
  const lastDigit = Number(truncated[truncated.length - 1]);
  if (lastDigit % 2 !== 0) return rounded;
  return value < 0 && /[1-9]/.test(truncated) ? `-${truncated}` : truncated;
}

export function formatCurrency(usd: number): string {
  return `$${toFixedEven(usd, 2)}`;
}

/** Raw counts, with thousands separators. */
export function formatNumber(n: number): string {
  return thousands.format(Number(toFixedEven(n, 0)));
}

/** Billed counts: `999`, `1.5K`, `2.3M`. */
export function formatTokens(n: number): string {
  if (n >= 1_000_000) return `${toFixedEven(n / 1_000_000, 1)}M`;
  if (n >= 1_000) return `${toFixedEven(n / 1_000, 1)}K`;
  return toFixedEven(n, 0);
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(Math.max(0, ms) / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,]\d+)?)?)?)?(?:[+-](\d{2})(?::?(\d{2}))?)?$/;

/**
 * `YYYY-MM-DD HH:MM:SS` in the offset the timestamp was written in. Anything
 * that does not parse is returned unchanged.
 */
export function formatDate(raw: string): string {
  const match = ISO_PATTERN.exec(raw.trim().replace(/Z$/, "+00:00"));
  if (!match) return raw;

  const [
    ,
    year,
    month,
    day,
    hour = "00",
    minute = "00",
    second = "00",
    offsetHours = "00",
    offsetMinutes = "00",
  ] = match;
  if (Number(offsetHours) > 23 || Number(offsetMinutes) > 59) return raw;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const check = new Date(Date.UTC(y, mo - 1, d, Number(hour), Number(minute), Number(second)));
  if (
    check.getUTCFullYear() !== y ||
    check.getUTCMonth() !== mo - 1 ||
    check.getUTCDate() !== d ||
    check.getUTCHours() !== Number(hour) ||
    check.getUTCMinutes() !== Number(minute) ||
    check.getUTCSeconds() !== Number(second)
  ) {
    return raw;
  }

  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
