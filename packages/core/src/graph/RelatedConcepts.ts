/**
 * Related-Concept Retriever
 *
 * @module graph/RelatedConcepts
 */

import { Tokenizer } from '../fts/Tokenizer';
import type { KnowledgeGraph } from './KnowledgeGraph';
import { DEFAULT_CONCEPT_MIN_LENGTH } from './KnowledgeGraphBuilder';
import type { RelatedConcept } from './types';

const defaultConceptTokenizer = new Tokenizer({ minLength: DEFAULT_CONCEPT_MIN_LENGTH });

/**
 * Concepts adjacent to the query's tokens, weighted by the sum of the incident
 * edge weights over all query tokens. Document nodes are never returned.
 * Sorted by weight descending, then concept key ascending.
 *
 * @example
 * ```typescript
 * relatedConcepts(graph, 'atezolizumab in nsclc', 3);
 * // [{ concept: 'pdl1', kind: 'gene', label: 'PD-L1', weight: 7 }, ...]
 * ```
 */
export function relatedConcepts(
  graph: KnowledgeGraph,
  query: string,
  topN: number,
  tokenizer: Tokenizer = defaultConceptTokenizer
): RelatedConcept[] {
  if (!(topN > 0)) {
    return [];
  }

  const scores = new Map<string, number>();
  for (const token of tokenizer.normalize(query)) {
    if (!graph.hasNode(token)) continue;

    for (const [neighborKey, edge] of graph.neighbors(token)) {
      scores.set(neighborKey, (scores.get(neighborKey) ?? 0) + edge.weight);
    }
  }

  const related: RelatedConcept[] = [];
  for (const [concept, weight] of scores) {
    const node = graph.getNode(concept);
    if (!node || node.kind === 'document') continue;
    related.push({ concept, kind: node.kind, label: node.label, weight });
  }

  related.sort((a, b) => b.weight - a.weight || (a.concept < b.concept ? -1 : a.concept > b.concept ? 1 : 0));
  return related.slice(0, Math.floor(topN));
}
