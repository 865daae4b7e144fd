/**
 * "Did you mean" suggestions for unknown arguments
 *
 * Only called on the error path.
 */

/**
 * Levenshtein edit distance between two strings
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
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
 * Nearest candidate within `maxDistance`, ties resolved by candidate order
 * @returns The candidate, or undefined when nothing is close enough
 */
export function suggest(
  input: string,
  candidates: Iterable<string>,
  maxDistance = 2
): string | undefined {
  let best: string | undefined;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const distance = editDistance(input, candidate);
    // A candidate as far away as its own length shares nothing with the input
    if (distance > maxDistance || distance >= Math.max(candidate.length, input.length)) continue;
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}
