/**
 * Closest-Match Backend
 *
 * Single-answer lookup: compares the raw question with every raw prompt using
 * the Ratcliff/Obershelp similarity ratio and returns the best prompt above a
 * cutoff. Independent of the inverted index and of the weighted ranking.
 *
 * @module fts/ClosestMatcher
 */

import type { DocumentStore } from '../documents/DocumentStore';
import type { ClosestMatch } from './types';

export const DEFAULT_CLOSEST_MATCH_CUTOFF = 0.4;

export interface ClosestMatcherOptions {
  /**
   * Minimum similarity ratio for a match.
   * @default 0.4
   */
  cutoff?: number;
}

/**
 * Ratcliff/Obershelp similarity: 2·M / (|a| + |b|), where M is the number of
 * characters in the recursively found longest common blocks.
 *
 * @returns 1 for two empty strings
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}

function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const [i, j, size] = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (size === 0) continue;

    matched += size;
    if (aLo < i && bLo < j) {
      queue.push([aLo, i, bLo, j]);
    }
    if (i + size < aHi && j + size < bHi) {
      queue.push([i + size, aHi, j + size, bHi]);
    }
  }

  return matched;
}

/**
 * Longest common block of a[aLo:aHi] and b[bLo:bHi]; earliest in `a`, then in `b`.
 */
function longestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): [number, number, number] {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;

  // lengths[j] = length of the common suffix ending at a[i - 1], b[j]
  let previous = new Array<number>(bHi - bLo).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (j > bLo ? previous[j - bLo - 1] : 0) + 1;
      current[j - bLo] = size;
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    previous = current;
  }

  return [bestI, bestJ, bestSize];
}

/**
 * Closest-match lookup over a document store.
 *
 * @example
 * ```typescript
 * const matcher = new ClosestMatcher({ cutoff: 0.4 });
 * const match = matcher.match('dose of atezolizumab', store);
 * // { document: {...}, ratio: 0.62 } or null
 * ```
 */
export class ClosestMatcher {
  readonly cutoff: number;

  constructor(options?: ClosestMatcherOptions) {
    const cutoff = options?.cutoff ?? DEFAULT_CLOSEST_MATCH_CUTOFF;
    if (!(cutoff >= 0 && cutoff <= 1)) {
      throw new RangeError(`cutoff must be in [0, 1], got ${cutoff}`);
    }
    this.cutoff = cutoff;
  }

  /**
   * Best document for the question, ties going to the lower id (not to the
   * lexically largest prompt). Each prompt is the first sequence of the ratio,
   * which is not symmetric.
   *
   * @returns null if the question is blank or nothing reaches the cutoff
   */
  match(question: string, store: DocumentStore): ClosestMatch | null {
    if (question.trim().length === 0) {
      return null;
    }

    let best: ClosestMatch | null = null;
    for (const document of store.all()) {
      const ratio = similarityRatio(document.prompt, question);
      if (ratio < this.cutoff) continue;
      if (!best || ratio > best.ratio) {
        best = { document, ratio };
      }
    }
    return best;
  }
}
