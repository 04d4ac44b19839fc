/**
 * Edit distance between two strings (case-insensitive).
 */
export function editDistance(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) return 0;
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, j) => j);
  for (let i = 1; i <= left.length; i++) {
    const current = [i];
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[right.length];
}

/**
 * Names close to `target`: containment either way, or an edit distance of at
 * most a third of the longer name. Closest first, at most `limit`.
 */
export function findSimilarNames(target: string, candidates: Iterable<string>, limit = 3): string[] {
  const lower = target.toLowerCase();
  const scored: Array<{ name: string; distance: number }> = [];

  for (const name of candidates) {
    const candidate = name.toLowerCase();
    if (candidate === lower) continue;
    const distance = editDistance(lower, candidate);
    const contained = lower.length >= 3 && candidate.length >= 3 && (candidate.includes(lower) || lower.includes(candidate));
    if (contained || distance <= Math.max(1, Math.floor(Math.max(lower.length, candidate.length) / 3))) {
      scored.push({ name, distance });
    }
  }

  scored.sort((a, b) => a.distance - b.distance || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return scored.slice(0, limit).map((s) => s.name);
}

/**
 * " Did you mean: a, b?" or an empty string.
 */
export function didYouMean(target: string, candidates: Iterable<string>): string {
  const similar = findSimilarNames(target, candidates);
  return similar.length > 0 ? ` Did you mean: ${similar.join(', ')}?` : '';
}
