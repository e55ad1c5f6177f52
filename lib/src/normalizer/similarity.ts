/**
 * String Similarity
 *
 * Gestalt pattern matching (Ratcliff/Obershelp): find the longest common
 * substring, recurse on the pieces to its left and right, and score
 * `2 * matched / (len(a) + len(b))`. Scores lie in [0, 1]; identical strings
 * score 1.
 */

interface MatchBlock {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of `a[aLo:aHi]` and `b[bLo:bHi]`. Ties resolve to
 * the earliest position in `a`, then in `b`.
 */
function findLongestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchBlock {
  let best: MatchBlock = { aStart: aLo, bStart: bLo, size: 0 };
  // lengths of matches ending at b[j] for the previous row of a
  let previous = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) {
        continue;
      }
      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

/**
 * Total characters covered by non-overlapping matching blocks
 */
export function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) {
      break;
    }
    const [aLo, aHi, bLo, bHi] = range;
    const block = findLongestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) {
      continue;
    }

    matched += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      queue.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return matched;
}

export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}

/**
 * Best candidate scoring at least `cutoff` against `word`, or `null`.
 * Ties on score resolve to the lexicographically greater candidate.
 *
 * @example
 * findClosestMatch('ponorgo', ['Ponorogo', 'Gong'], 0.8, { ignoreCase: true }) // 'Ponorogo'
 */
export function findClosestMatch(
  word: string,
  candidates: readonly string[],
  cutoff: number,
  options?: { ignoreCase?: boolean }
): string | null {
  const ignoreCase = options?.ignoreCase ?? false;
  const needle = ignoreCase ? word.toLowerCase() : word;

  let bestCandidate: string | null = null;
  let bestScore = -1;

  for (const candidate of candidates) {
    const score = similarityRatio(needle, ignoreCase ? candidate.toLowerCase() : candidate);
    if (score < cutoff) {
      continue;
    }
    if (
      score > bestScore ||
      (score === bestScore && bestCandidate !== null && candidate > bestCandidate)
    ) {
      bestCandidate = candidate;
      bestScore = score;
    }
  }

  return bestCandidate;
}
