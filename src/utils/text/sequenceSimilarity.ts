/**
 * Sequence similarity (Ratcliff/Obershelp "gestalt" matching)
 *
 * Finds the longest common block of characters, then recurses on the
 * unmatched text to its left and right. The ratio is twice the number
 * of matched characters over the combined length:
 *
 *   ratio = 2 * M / (|a| + |b|)
 *
 * The measure is not symmetric: `a` is scanned in order and ties go to
 * the earliest block in `a`, then in `b`. Callers pass the query as `a`.
 *
 * Strings are compared per code point, with no case folding.
 */

import { AUTOJUNK_MIN_LENGTH } from "@/constants/matching";

type MatchingBlock = {
  aStart: number;
  bStart: number;
  size: number;
};

type Range = [aLow: number, aHigh: number, bLow: number, bHigh: number];

/**
 * Indexes the positions of every character of b.
 *
 * For long candidates, characters that occur in more than 1% of the
 * positions (+1) are not indexed, so they never seed a block. They can
 * still extend one.
 */
function indexPositions(b: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((char, j) => {
    const list = positions.get(char);
    if (list) {
      list.push(j);
    } else {
      positions.set(char, [j]);
    }
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [char, list] of positions) {
      if (list.length > limit) {
        positions.delete(char);
      }
    }
  }

  return positions;
}

/**
 * Longest block common to a[aLow:aHigh] and b[bLow:bHigh].
 *
 * Returns size 0 when nothing matches.
 */
function findLongestMatch(
  a: readonly string[],
  b: readonly string[],
  positions: Map<string, number[]>,
  [aLow, aHigh, bLow, bHigh]: Range,
): MatchingBlock {
  let bestA = aLow;
  let bestB = bLow;
  let bestSize = 0;

  // runLengths.get(j) = length of the match ending at a[i - 1], b[j]
  let runLengths = new Map<number, number>();
  for (let i = aLow; i < aHigh; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLow) continue;
      if (j >= bHigh) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    runLengths = next;
  }

  // Extend over characters excluded from the index
  while (bestA > aLow && bestB > bLow && a[bestA - 1] === b[bestB - 1]) {
    bestA--;
    bestB--;
    bestSize++;
  }
  while (
    bestA + bestSize < aHigh &&
    bestB + bestSize < bHigh &&
    a[bestA + bestSize] === b[bestB + bestSize]
  ) {
    bestSize++;
  }

  return { aStart: bestA, bStart: bestB, size: bestSize };
}

/**
 * Total number of characters covered by the matching blocks of a and b.
 */
function countMatchedCharacters(a: readonly string[], b: readonly string[]): number {
  const positions = indexPositions(b);
  const pending: Range[] = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLow, aHigh, bLow, bHigh] = range;
    const block = findLongestMatch(a, b, positions, range);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLow < block.aStart && bLow < block.bStart) {
      pending.push([aLow, block.aStart, bLow, block.bStart]);
    }
    const aEnd = block.aStart + block.size;
    const bEnd = block.bStart + block.size;
    if (aEnd < aHigh && bEnd < bHigh) {
      pending.push([aEnd, aHigh, bEnd, bHigh]);
    }
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1], 1 = identical.
 *
 * Two empty strings are identical (ratio 1).
 *
 * @example
 * similarityRatio("abcd", "bcde") // 0.75
 * similarityRatio("bag", "bag")   // 1
 * similarityRatio("abc", "xyz")   // 0
 */
export function similarityRatio(a: string, b: string): number {
  const aChars = Array.from(a);
  const bChars = Array.from(b);
  const total = aChars.length + bChars.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchedCharacters(aChars, bChars)) / total;
}

/**
 * Distance in [0, 1], 0 = identical (1 - similarityRatio).
 */
export function sequenceDistance(a: string, b: string): number {
  return 1 - similarityRatio(a, b);
}
