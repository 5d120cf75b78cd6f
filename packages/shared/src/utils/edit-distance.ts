/**
 * Levenshtein distance and "did you mean" suggestions.
 */

/** Single-row Levenshtein distance. */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
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

export const MAX_SUGGESTION_DISTANCE = 2;

/**
 * Closest candidate within MAX_SUGGESTION_DISTANCE.
 * Ties go to the candidate listed first.
 */
export function closestMatch(
  input: string,
  candidates: readonly string[],
  maxDistance: number = MAX_SUGGESTION_DISTANCE,
): string | undefined {
  let best: string | undefined;
  let bestDistance = maxDistance + 1;
  for (const candidate of candidates) {
    if (candidate === input) continue;
    const distance = editDistance(input, candidate);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}
