/**
 * Retrieval Types
 *
 * Type definitions shared by the tokenizer, inverted index, ranker
 * and facet filter.
 *
 * @module fts/types
 */

import type { ClinicalDocument } from '../documents/types';

/**
 * Options for configuring the Tokenizer.
 */
export interface TokenizerOptions {
  /**
   * Minimum token length to include in results.
   * @default 3
   */
  minLength?: number;
}

/**
 * A document matched by a query, with its overlap counts.
 */
export interface ScoredResult {
  document: ClinicalDocument;

  /** 2 × promptMatches + completionMatches */
  score: number;

  /** Distinct query tokens present in the prompt */
  promptMatches: number;

  /** Distinct query tokens present in the completion */
  completionMatches: number;

  /** Query tokens found in prompt or completion, sorted */
  matchedTokens: string[];
}

/**
 * Options for a ranked search.
 */
export interface RankOptions {
  /** Keep only the best N results */
  limit?: number;
}

/**
 * Facet dimensions usable in category filters.
 */
export type FacetName = 'cancer_type' | 'genes';

/**
 * Category filters: OR within a facet, AND across facets.
 */
export type CategoryFilters = Partial<Record<FacetName, Iterable<string>>>;

/**
 * Result of the closest-match backend.
 */
export interface ClosestMatch {
  document: ClinicalDocument;

  /** Similarity ratio in [0, 1] */
  ratio: number;
}
