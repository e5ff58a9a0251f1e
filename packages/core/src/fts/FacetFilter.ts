/**
 * Facet Filter
 *
 * Post-filters ranked results. Pure and order-preserving.
 *
 * @module fts/FacetFilter
 */

import type { ClinicalDocument } from '../documents/types';
import { PUNCTUATION_PATTERN } from './Tokenizer';
import type { CategoryFilters, FacetName, ScoredResult } from './types';

const FACETS: readonly FacetName[] = ['cancer_type', 'genes'];

const FACET_VALUES: Record<FacetName, (doc: ClinicalDocument) => ReadonlySet<string>> = {
  cancer_type: (doc) => doc.cancerTypes,
  genes: (doc) => doc.genes,
};

/**
 * Keep results that satisfy every filter.
 *
 * - `score >= minScore`
 * - some keyword filter, normalized like a token, equals a matched token, unless there are none
 * - per non-empty facet filter, the document shares at least one value with it
 */
export function filterResults(
  results: readonly ScoredResult[],
  minScore = 0,
  keywordFilters: Iterable<string> = [],
  categoryFilters: CategoryFilters = {}
): ScoredResult[] {
  const keywords = new Set<string>();
  for (const keyword of keywordFilters) {
    const normalized = keyword.toLowerCase().replace(PUNCTUATION_PATTERN, '').trim();
    if (normalized.length > 0) keywords.add(normalized);
  }

  const facets: Array<[FacetName, ReadonlySet<string>]> = [];
  for (const facet of FACETS) {
    const wanted = categoryFilters[facet];
    if (!wanted) continue;
    const values = new Set(wanted);
    if (values.size > 0) facets.push([facet, values]);
  }

  return results.filter((result) => {
    if (result.score < minScore) return false;

    if (keywords.size > 0 && !result.matchedTokens.some((token) => keywords.has(token.toLowerCase()))) {
      return false;
    }

    for (const [facet, wanted] of facets) {
      if (!intersects(FACET_VALUES[facet](result.document), wanted)) return false;
    }

    return true;
  });
}

function intersects(have: ReadonlySet<string>, wanted: ReadonlySet<string>): boolean {
  for (const value of have) {
    if (wanted.has(value)) return true;
  }
  return false;
}
