/**
 * Knowledge Graph Module
 *
 * @module graph
 */

export type {
  ConceptKind,
  DocumentNode,
  ConceptNode,
  GraphNode,
  RelationKind,
  EdgeKind,
  GraphEdge,
  KnowledgeGraphOptions,
  RelatedConcept,
} from './types';

export { KnowledgeGraph } from './KnowledgeGraph';
export {
  buildKnowledgeGraph,
  significantTerms,
  DEFAULT_MAX_KEYWORDS_PER_DOCUMENT,
  DEFAULT_CONCEPT_MIN_LENGTH,
} from './KnowledgeGraphBuilder';
export { relatedConcepts } from './RelatedConcepts';
export { GraphSerializer } from './GraphSerializer';
