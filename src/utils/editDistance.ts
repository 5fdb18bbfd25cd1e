/**
 * Levenshtein distance with unit cost for insert, delete and substitute.
 * Keeps a single row sized to the shorter string.
 */
export function editDistance(a: string, b: string): number {
  if (a.length < b.length) {
    return editDistance(b, a);
  }
  if (b.length === 0) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 0; i < a.length; i++) {
    const current = [i + 1];
    for (let j = 0; j < b.length; j++) {
      const cost = a[i] === b[j] ? 0 : 1;
      current.push(Math.min(previous[j + 1] + 1, current[j] + 1, previous[j] + cost));
    }
    previous = current;
  }
  return previous[b.length];
}
