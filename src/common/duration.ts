const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT_PATTERN = /(\d+(?:\.\d+)?)(ms|s|m|h)/y;

/**
 * Parses duration strings such as `500ms`, `30s` or `1m30s` into milliseconds.
 * Returns `undefined` for anything that is not a positive duration.
 */
export function parseDuration(text: string): number | undefined {
  const source = text.trim();
  if (source.length === 0) {
    return undefined;
  }

  let total = 0;
  SEGMENT_PATTERN.lastIndex = 0;

  while (SEGMENT_PATTERN.lastIndex < source.length) {
    const match = SEGMENT_PATTERN.exec(source);

    if (match === null) {
      return undefined;
    }

    total += Number.parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  return total > 0 ? Math.round(total) : undefined;
}
