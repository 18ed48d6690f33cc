/**
 * reqline - Nearest-match Suggestions
 */

export const MAX_SUGGESTION_DISTANCE = 2;

/**
 * Levenshtein edit distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Closest vocabulary entry within the maximum distance, ignoring case.
 * The first candidate wins on ties.
 */
export function suggest(
  input: string,
  vocabulary: readonly string[],
  maxDistance = MAX_SUGGESTION_DISTANCE
): string | undefined {
  let best: string | undefined;
  let bestDistance = maxDistance + 1;

  for (const candidate of vocabulary) {
    const distance = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}
