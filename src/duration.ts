const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const DURATION_RE = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h|d|w))+$/;
const PART_RE = /(\d+(?:\.\d+)?)(ms|s|m|h|d|w)/g;

/** True when `value` parses with {@link parseDuration}. */
export function isDuration(value: string): boolean {
  return DURATION_RE.test(value.trim());
}

/**
 * Parse a duration such as `500ms`, `90s`, `1h30m`, `30d` or `2w` into
 * milliseconds.
 * @throws Error when the string is not a duration.
 */
export function parseDuration(value: string): number {
  const input = value.trim();
  if (!DURATION_RE.test(input)) {
    throw new Error(`invalid duration "${value}" (expected e.g. 500ms, 30s, 1h30m, 7d)`);
  }
  let total = 0;
  for (const match of input.matchAll(PART_RE)) {
    total += Number(match[1]) * (UNIT_MS[match[2] ?? ""] ?? 0);
  }
  return Math.round(total);
}

/**
 * Formats a duration in milliseconds into a human-readable string.
 * @param ms - Duration in milliseconds
 * @returns Formatted string (e.g. '500ms', '5s', '2m 30s', '3h', '2d 4h')
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const totalSeconds = Math.floor(ms / 1000);
  const days = Math.floor(totalSeconds / 86_400);
  const hours = Math.floor((totalSeconds % 86_400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (days > 0) return hours > 0 ? `${days}d ${hours}h` : `${days}d`;
  if (hours > 0) return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  if (minutes > 0) return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  return `${seconds}s`;
}
