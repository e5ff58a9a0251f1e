/**
 * Knowledge Graph Types
 *
 * @module graph/types
 */

export type ConceptKind = 'cancer_type' | 'gene' | 'term';

/**
 * A question/answer record in the entity graph.
 */
export interface DocumentNode {
  kind: 'document';

  /** `doc:<fnv1a of prompt and completion>`, suffixed `:<n>` for repeated content */
  key: string;

  documentId: number;
}

/**
 * A cancer type, gene or significant term. Keyed by its normalized text.
 */
export interface ConceptNode {
  kind: ConceptKind;
  key: string;

  /** Text as it appears in the dataset */
  label: string;
}

export type GraphNode = DocumentNode | ConceptNode;

/** Document → concept relationships */
export type RelationKind = 'about' | 'involves' | 'mentions';

export type EdgeKind = 'cooccurs' | RelationKind;

/**
 * Undirected edge. `cooccurs` edges join two concepts with `source < target`;
 * relationship edges always have the document as `source`.
 */
export interface GraphEdge {
  kind: EdgeKind;
  source: string;
  target: string;

  /** At least 1 */
  weight: number;
}

export interface KnowledgeGraphOptions {
  /**
   * Cap on keywords per document for co-occurrence pairs.
   * @default 24
   */
  maxKeywordsPerDocument?: number;

  /**
   * Minimum length of a significant term.
   * @default 4
   */
  conceptMinLength?: number;

  /** Identity of the document set the graph is built from */
  fingerprint?: string | null;
}

/**
 * A concept related to a query, with its aggregate edge weight.
 */
export interface RelatedConcept {
  concept: string;
  kind: ConceptKind;
  label: string;
  weight: number;
}
