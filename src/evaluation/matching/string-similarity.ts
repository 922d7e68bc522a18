export function normalizeSeriesName(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .replace(/[–—−/\\]/g, '-')
    .replace(/\s+/g, ' ');
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }
  return previous[b.length];
}

export function editSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(a, b) / longest;
}

export function tokenJaccard(a: string, b: string): number {
  const tokensA = new Set(a.split(' ').filter(Boolean));
  const tokensB = new Set(b.split(' ').filter(Boolean));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  let shared = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) shared++;
  }
  return shared / (tokensA.size + tokensB.size - shared);
}

/**
 * 0.8 when one name contains the other, otherwise the longest shared run of
 * at least three characters relative to the longer name. Names of three
 * characters or fewer score 0.
 */
export function substringSimilarity(a: string, b: string): number {
  if (a.length <= 3 || b.length <= 3) return 0;
  if (a.includes(b) || b.includes(a)) return 0.8;

  let longestRun = 0;
  for (let i = 0; i < a.length; i++) {
    for (let j = i + 3; j <= a.length; j++) {
      if (!b.includes(a.slice(i, j))) break;
      longestRun = Math.max(longestRun, j - i);
    }
  }
  return longestRun / Math.max(a.length, b.length);
}

export function seriesNameSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;

  const left = normalizeSeriesName(a);
  const right = normalizeSeriesName(b);
  if (left === right) return 1;

  return (
    0.4 * editSimilarity(left, right) +
    0.4 * tokenJaccard(left, right) +
    0.2 * substringSimilarity(left, right)
  );
}
