/**
 * Retrieval Module
 *
 * Token-overlap retrieval over clinical Q&A documents:
 * - Tokenizer with punctuation stripping and a minimum token length
 * - Inverted index with per-field token sets
 * - Weighted ranking (prompt matches count double)
 * - Facet filtering and a separate closest-match backend
 *
 * @module fts
 */

// Types
export type {
  TokenizerOptions,
  ScoredResult,
  RankOptions,
  FacetName,
  CategoryFilters,
  ClosestMatch,
} from './types';

// Tokenizer
export {
  Tokenizer,
  ENGLISH_STOPWORDS,
  PUNCTUATION_PATTERN,
  DEFAULT_MIN_TOKEN_LENGTH,
  normalizeConcept,
} from './Tokenizer';

// Inverted Index
export { InvertedIndex } from './InvertedIndex';

// Ranking
export { search, compareResults, PROMPT_MATCH_WEIGHT, COMPLETION_MATCH_WEIGHT } from './Ranker';

// Facets
export { filterResults } from './FacetFilter';

// Closest match
export { ClosestMatcher, similarityRatio, DEFAULT_CLOSEST_MATCH_CUTOFF } from './ClosestMatcher';
export type { ClosestMatcherOptions } from './ClosestMatcher';
