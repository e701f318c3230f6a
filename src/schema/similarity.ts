type MatchBlock = { aStart: number; bStart: number; size: number };

const longestCommonBlock = (
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): MatchBlock => {
  let best: MatchBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) continue;
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
};

const countMatches = (
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): number => {
  if (aLo >= aHi || bLo >= bHi) return 0;
  const block = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);
  if (block.size === 0) return 0;
  return (
    block.size +
    countMatches(a, aLo, block.aStart, b, bLo, block.bStart) +
    countMatches(a, block.aStart + block.size, aHi, b, block.bStart + block.size, bHi)
  );
};

/**
 * Ratcliff/Obershelp similarity: twice the number of matching characters
 * over the combined length, in [0, 1].
 */
export const similarityRatio = (a: string, b: string): number => {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatches(a, 0, a.length, b, 0, b.length)) / total;
};

export const findClosestMatch = (
  word: string,
  candidates: Iterable<string>,
  cutoff = 0.6
): string | undefined => {
  let bestScore = cutoff;
  let best: string | undefined;

  for (const candidate of candidates) {
    const score = similarityRatio(word, candidate);
    // Ties go to the lexically greatest name.
    if (score > bestScore || (score === bestScore && (best === undefined || candidate > best))) {
      bestScore = score;
      best = candidate;
    }
  }

  return best;
};
