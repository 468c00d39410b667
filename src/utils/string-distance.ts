/**
 * Levenshtein distance and "did you mean" suggestions for type names
 */

/**
 * Compute the Levenshtein edit distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  let prev = Array.from({ length: lb + 1 }, (_, i) => i);
  let curr = new Array<number>(lb + 1).fill(0);

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}

// Short names get a tighter threshold so "int" does not suggest "map"
function adaptiveMaxDistance(target: string): number {
  const len = target.length;
  if (len <= 3) return 1;
  if (len <= 6) return 2;
  return 3;
}

/**
 * Candidates within `maxDistance` of `target`, closest first.
 * Comparison is case-insensitive; a case-only difference counts as distance 0.
 */
export function findClosestMatches(
  target: string,
  candidates: Iterable<string>,
  maxDistance?: number,
  limit = 3
): string[] {
  const effectiveMax = maxDistance ?? adaptiveMaxDistance(target);
  const lowered = target.toLowerCase();
  return [...new Set(candidates)]
    .filter((c) => c !== target)
    .map((c) => ({ name: c, distance: levenshteinDistance(lowered, c.toLowerCase()) }))
    .filter((s) => s.distance <= effectiveMax)
    .sort((a, b) => a.distance - b.distance || a.name.localeCompare(b.name))
    .slice(0, limit)
    .map((s) => s.name);
}
