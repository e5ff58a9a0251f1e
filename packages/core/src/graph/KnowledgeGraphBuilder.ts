/**
 * Knowledge Graph Builder
 *
 * Builds, in one pass over the documents:
 * - co-occurrence edges between the keywords of each document
 *   (normalized cancer types, genes and significant prompt terms)
 * - `about` / `involves` / `mentions` edges from each document node to its
 *   cancer types, genes and significant prompt + completion terms
 *
 * A term is significant when it is alphabetic, at least `conceptMinLength`
 * characters long and not an English stopword.
 *
 * @module graph/KnowledgeGraphBuilder
 */

import type { ClinicalDocument } from '../documents/types';
import { ENGLISH_STOPWORDS, Tokenizer, normalizeConcept } from '../fts/Tokenizer';
import { hashHex } from '../utils/hash';
import { logger } from '../utils/logger';
import { KnowledgeGraph } from './KnowledgeGraph';
import type { ConceptKind, ConceptNode, GraphEdge, GraphNode, KnowledgeGraphOptions, RelationKind } from './types';

export const DEFAULT_MAX_KEYWORDS_PER_DOCUMENT = 24;
export const DEFAULT_CONCEPT_MIN_LENGTH = 4;

const KIND_PRECEDENCE: Record<ConceptKind, number> = {
  cancer_type: 3,
  gene: 2,
  term: 1,
};

const ALPHABETIC = /^\p{L}+$/u;

/**
 * Build a knowledge graph. Deterministic for a fixed document list.
 *
 * @example
 * ```typescript
 * const graph = buildKnowledgeGraph(store.all());
 * graph.getEdge('pdl1', 'nsclc'); // { kind: 'cooccurs', weight: 2, ... }
 * ```
 */
export function buildKnowledgeGraph(
  documents: readonly ClinicalDocument[],
  options: KnowledgeGraphOptions = {}
): KnowledgeGraph {
  const maxKeywords = options.maxKeywordsPerDocument ?? DEFAULT_MAX_KEYWORDS_PER_DOCUMENT;
  if (!Number.isInteger(maxKeywords) || maxKeywords < 2) {
    throw new RangeError(`maxKeywordsPerDocument must be an integer >= 2, got ${maxKeywords}`);
  }
  const termTokenizer = new Tokenizer({ minLength: options.conceptMinLength ?? DEFAULT_CONCEPT_MIN_LENGTH });

  const nodes = new Map<string, GraphNode>();
  const edges = new Map<string, GraphEdge>();
  const documentKeyCounts = new Map<string, number>();
  let truncatedDocuments = 0;

  const addConcept = (concept: ConceptNode): void => {
    const existing = nodes.get(concept.key);
    if (existing && existing.kind === 'document') {
      throw new RangeError(`Concept ${concept.key} collides with a document key`);
    }
    if (!existing || KIND_PRECEDENCE[concept.kind] > KIND_PRECEDENCE[existing.kind]) {
      nodes.set(concept.key, { kind: concept.kind, key: concept.key, label: concept.label });
    }
  };

  const addRelation = (kind: RelationKind, documentKey: string, conceptKey: string): void => {
    const pairKey = `${documentKey}\u0000${conceptKey}`;
    // A concept reached by several relations keeps the first one.
    if (!edges.has(pairKey)) {
      edges.set(pairKey, { kind, source: documentKey, target: conceptKey, weight: 1 });
    }
  };

  const addCooccurrence = (a: string, b: string): void => {
    const [source, target] = a < b ? [a, b] : [b, a];
    const pairKey = `${source}\u0000${target}`;
    const edge = edges.get(pairKey);
    if (edge) {
      edge.weight++;
    } else {
      edges.set(pairKey, { kind: 'cooccurs', source, target, weight: 1 });
    }
  };

  for (const doc of documents) {
    const documentKey = documentKeyFor(doc, documentKeyCounts);
    nodes.set(documentKey, { kind: 'document', key: documentKey, documentId: doc.id });

    const cancerTypes = facetConcepts(doc.cancerTypes, 'cancer_type');
    const genes = facetConcepts(doc.genes, 'gene');
    const promptTerms = significantTerms(termTokenizer, doc.prompt);
    const documentTerms = significantTerms(termTokenizer, `${doc.prompt}\n${doc.completion}`);

    for (const concept of [...cancerTypes, ...genes, ...documentTerms]) {
      addConcept(concept);
    }
    for (const concept of cancerTypes) addRelation('about', documentKey, concept.key);
    for (const concept of genes) addRelation('involves', documentKey, concept.key);
    for (const concept of documentTerms) addRelation('mentions', documentKey, concept.key);

    const keywords = [...new Set([...cancerTypes, ...genes, ...promptTerms].map((concept) => concept.key))];
    if (keywords.length > maxKeywords) {
      truncatedDocuments++;
      keywords.length = maxKeywords;
    }
    for (let i = 0; i < keywords.length; i++) {
      for (let j = i + 1; j < keywords.length; j++) {
        addCooccurrence(keywords[i], keywords[j]);
      }
    }
  }

  if (truncatedDocuments > 0) {
    logger.debug({ truncatedDocuments, maxKeywords }, 'Keyword sets truncated for co-occurrence');
  }

  return new KnowledgeGraph(nodes.values(), edges.values(), options.fingerprint ?? null);
}

function documentKeyFor(doc: ClinicalDocument, counts: Map<string, number>): string {
  const base = `doc:${hashHex(`${doc.prompt}\n${doc.completion}`)}`;
  const seen = counts.get(base) ?? 0;
  counts.set(base, seen + 1);
  return seen === 0 ? base : `${base}:${seen}`;
}

function facetConcepts(values: ReadonlySet<string>, kind: ConceptKind): ConceptNode[] {
  const concepts: ConceptNode[] = [];
  for (const label of values) {
    const key = normalizeConcept(label);
    if (key.length > 0) {
      concepts.push({ kind, key, label });
    }
  }
  return concepts;
}

/**
 * Significant terms in order of first appearance, deduplicated.
 */
export function significantTerms(tokenizer: Tokenizer, text: string): ConceptNode[] {
  const terms: ConceptNode[] = [];
  for (const token of tokenizer.normalize(text)) {
    if (ALPHABETIC.test(token) && !ENGLISH_STOPWORDS.has(token)) {
      terms.push({ kind: 'term', key: token, label: token });
    }
  }
  return terms;
}
