/**
 * "Did you mean" suggestions by bounded edit distance.
 *
 * @module
 */

/**
 * Largest edit distance at which a name is still suggested
 */
export const MAX_SUGGESTION_DISTANCE = 2;

/**
 * Levenshtein distance (insertions, deletions, substitutions).
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
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
  return previous[b.length] ?? Math.max(a.length, b.length);
}

/**
 * Nearest candidate within `maxDistance`. Ties go to the shortest name,
 * then to the lexicographically first.
 */
export function findSuggestion(
  name: string,
  candidates: Iterable<string>,
  maxDistance: number = MAX_SUGGESTION_DISTANCE
): string | null {
  let best: { candidate: string; distance: number } | null = null;

  for (const candidate of new Set(candidates)) {
    if (candidate === name) continue;
    const distance = levenshtein(name, candidate);
    if (distance > maxDistance) continue;

    if (
      best === null ||
      distance < best.distance ||
      (distance === best.distance &&
        (candidate.length < best.candidate.length ||
          (candidate.length === best.candidate.length && candidate < best.candidate)))
    ) {
      best = { candidate, distance };
    }
  }

  return best?.candidate ?? null;
}
