/**
 * Normalised Indel similarity in [0, 1]: `2 * LCS / (|a| + |b|)`.
 * Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  if (a === b) {
    return 1;
  }

  return (2 * longestCommonSubsequence(a, b)) / total;
}

function longestCommonSubsequence(a: string, b: string): number {
  const [longer, shorter] = a.length >= b.length ? [a, b] : [b, a];
  let previous = new Array<number>(shorter.length + 1).fill(0);
  let current = new Array<number>(shorter.length + 1).fill(0);

  for (let i = 1; i <= longer.length; i += 1) {
    for (let j = 1; j <= shorter.length; j += 1) {
      current[j] =
        longer.charCodeAt(i - 1) === shorter.charCodeAt(j - 1)
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[shorter.length];
}
