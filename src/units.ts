/**
 * reqline - Duration and Size Grammars
 */

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

const DURATION_GROUP = /(\d+(?:\.\d+)?)(ms|s|m|h)/y;
const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB|TB)$/i;

/**
 * Parse `1m30s`, `500ms`, `1.5s` or `0` into milliseconds
 */
export function parseDuration(input: string): number | undefined {
  const text = input.trim();
  if (text === "0") return 0;
  if (text === "") return undefined;

  let total = 0;
  let offset = 0;

  while (offset < text.length) {
    DURATION_GROUP.lastIndex = offset;
    const match = DURATION_GROUP.exec(text);
    if (!match || !match[1] || !match[2]) return undefined;

    const unit = DURATION_UNITS[match[2]];
    if (unit === undefined) return undefined;

    total += parseFloat(match[1]) * unit;
    offset = DURATION_GROUP.lastIndex;
  }

  return Math.round(total);
}

/**
 * Parse `512B`, `10MB` and the like into bytes (1024-based)
 */
export function parseSize(input: string): number | undefined {
  const match = input.trim().match(SIZE_PATTERN);
  if (!match || !match[1] || !match[2]) return undefined;

  const unit = SIZE_UNITS[match[2].toUpperCase()];
  if (unit === undefined) return undefined;

  return Math.floor(parseFloat(match[1]) * unit);
}
