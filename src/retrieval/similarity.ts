/**
 * Ratcliff/Obershelp similarity: 2 * matching characters / total length.
 * Matching characters come from the longest common block, then recursively
 * from the pieces left and right of it.
 */

function longestCommonBlock(a: string, b: string): { aStart: number; bStart: number; size: number } {
  let best = { aStart: 0, bStart: 0, size: 0 };
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        const run = (previous[j - 1] ?? 0) + 1;
        current[j] = run;
        if (run > best.size) {
          best = { aStart: i - run, bStart: j - run, size: run };
        }
      }
    }
    previous = current;
  }

  return best;
}

function matchingCharacters(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  const block = longestCommonBlock(a, b);
  if (block.size === 0) return 0;
  return (
    block.size +
    matchingCharacters(a.slice(0, block.aStart), b.slice(0, block.bStart)) +
    matchingCharacters(a.slice(block.aStart + block.size), b.slice(block.bStart + block.size))
  );
}

export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}
