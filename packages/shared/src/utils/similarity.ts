/**
 * Edit-distance helpers for "did you mean" suggestions.
 */

/** Levenshtein distance between two strings. */
export function editDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Candidates within `maxDistance` of `input`, closest first, ties in candidate order.
 * A candidate is only suggested when it is closer than the input is long.
 */
export function findSimilar(
  input: string,
  candidates: readonly string[],
  options: { maxDistance?: number; limit?: number } = {},
): string[] {
  const maxDistance = options.maxDistance ?? 3;
  const limit = options.limit ?? 3;
  if (input.length === 0) return [];

  return candidates
    .map((candidate, index) => ({ candidate, index, distance: editDistance(input, candidate) }))
    .filter((s) => s.candidate.length > 0 && s.distance <= maxDistance && s.distance < input.length)
    .sort((x, y) => x.distance - y.distance || x.index - y.index)
    .slice(0, limit)
    .map((s) => s.candidate);
}
