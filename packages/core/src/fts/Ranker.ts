/**
 * Ranking Engine
 *
 * Weighted token-overlap ranking. A document is a candidate if it shares any
 * token with the query; its score counts prompt matches twice:
 *
 * score = 2 × |Q ∩ prompt| + |Q ∩ completion|
 *
 * Ties are broken by ascending document id.
 *
 * @module fts/Ranker
 */

import type { DocumentStore } from '../documents/DocumentStore';
import type { InvertedIndex } from './InvertedIndex';
import type { RankOptions, ScoredResult } from './types';

export const PROMPT_MATCH_WEIGHT = 2;
export const COMPLETION_MATCH_WEIGHT = 1;

/**
 * Rank documents against a query.
 *
 * @returns Results by descending score; empty for a query with no tokens
 */
export function search(
  query: string,
  store: DocumentStore,
  index: InvertedIndex,
  options: RankOptions = {}
): ScoredResult[] {
  const queryTokens = index.tokenizer.normalize(query);
  if (queryTokens.size === 0) {
    return [];
  }

  const candidates = new Set<number>();
  for (const token of queryTokens) {
    for (const docId of index.postings(token)) {
      candidates.add(docId);
    }
  }

  const results: ScoredResult[] = [];
  for (const docId of candidates) {
    const document = store.get(docId);
    if (!document) continue;

    const promptTokens = index.promptTokens(docId);
    const completionTokens = index.completionTokens(docId);

    let promptMatches = 0;
    let completionMatches = 0;
    const matchedTokens: string[] = [];

    for (const token of queryTokens) {
      const inPrompt = promptTokens.has(token);
      const inCompletion = completionTokens.has(token);
      if (inPrompt) promptMatches++;
      if (inCompletion) completionMatches++;
      if (inPrompt || inCompletion) matchedTokens.push(token);
    }

    const score = PROMPT_MATCH_WEIGHT * promptMatches + COMPLETION_MATCH_WEIGHT * completionMatches;
    if (score <= 0) continue;

    results.push({
      document,
      score,
      promptMatches,
      completionMatches,
      matchedTokens: matchedTokens.sort(),
    });
  }

  results.sort(compareResults);

  if (options.limit !== undefined && options.limit >= 0 && results.length > options.limit) {
    return results.slice(0, options.limit);
  }
  return results;
}

/**
 * Descending score, then ascending document id.
 */
export function compareResults(a: ScoredResult, b: ScoredResult): number {
  return b.score - a.score || a.document.id - b.document.id;
}
