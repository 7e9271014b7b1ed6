const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/y;

export const DEFAULT_CACHE_TTL_MS = 5000;

/**
 * Parse a duration string such as "5s", "750ms" or "1m30s" into milliseconds.
 * A bare "0" is accepted. Returns null when the string is not a duration.
 */
export function parseDuration(input: string): number | null {
  const value = input.trim();
  if (value === '') {
    return null;
  }
  if (value === '0') {
    return 0;
  }

  let total = 0;
  let offset = 0;
  SEGMENT.lastIndex = 0;
  while (offset < value.length) {
    SEGMENT.lastIndex = offset;
    const match = SEGMENT.exec(value);
    if (!match) {
      return null;
    }
    total += Number(match[1]) * UNIT_MS[match[2]];
    offset = SEGMENT.lastIndex;
  }

  return total;
}

/**
 * TTL for the worktree-validity cache: the parsed value, or the 5s default
 * when the setting is empty or does not parse.
 */
export function parseCacheTtl(input: string | undefined): number {
  if (input === undefined) {
    return DEFAULT_CACHE_TTL_MS;
  }
  return parseDuration(input) ?? DEFAULT_CACHE_TTL_MS;
}
