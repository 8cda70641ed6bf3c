/**
 * Human-readable formatting and parsing
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Format a byte count for display.
 *
 * @example formatSize(0) → "0 B"
 * @example formatSize(1536) → "1.5 KB"
 * @example formatSize(7) → "7 B"
 */
export function formatSize(bytes: number, precision = 1): string {
  if (bytes <= 0) return "0 B";

  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1);
  const value = bytes / 1024 ** i;

  return `${i === 0 ? value : value.toFixed(precision)} ${SIZE_UNITS[i]}`;
}

/**
 * Parse a duration such as "24h", "90m", "1h30m" or "500ms" into milliseconds.
 * A bare number is taken as seconds.
 *
 * @throws Error on an empty or malformed duration
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === "") {
    throw new Error("Duration must not be empty");
  }
  if (/^\d+(\.\d+)?$/.test(input)) {
    return Number(input) * 1000;
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/g;
  let total = 0;
  let consumed = 0;
  for (const match of input.matchAll(pattern)) {
    if (match.index !== consumed) break;
    const [whole, amount, unit] = match;
    const factor = unit === undefined ? undefined : DURATION_UNITS[unit];
    if (amount === undefined || factor === undefined) break;
    total += Number(amount) * factor;
    consumed += whole.length;
  }

  if (consumed !== input.length) {
    throw new Error(`Invalid duration: "${text}"`);
  }
  return total;
}
