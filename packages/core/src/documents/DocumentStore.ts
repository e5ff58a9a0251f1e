/**
 * Document Store
 *
 * Validates raw dataset records and holds the accepted ones as immutable
 * ClinicalDocuments. Each record is decoded on its own: a record that does
 * not decode is skipped, never failing the batch.
 *
 * @module documents/DocumentStore
 */

import { EmptyDatasetError, ParseError } from '../errors';
import { logger } from '../utils/logger';
import { RawRecordSchema } from './record-schema';
import type { ClinicalDocument } from './types';

/**
 * Immutable, id-addressed collection of documents.
 *
 * @example
 * ```typescript
 * const store = DocumentStore.fromRecords([
 *   { prompt: 'What is PD-L1?', completion: 'A checkpoint ligand', cancer_type: 'NSCLC' },
 *   { title: 'not a record' },
 * ]);
 * store.size;    // 1
 * store.skipped; // 1
 * ```
 */
export class DocumentStore {
  private readonly documents: readonly ClinicalDocument[];

  /** Number of raw records dropped by validation */
  readonly skipped: number;

  constructor(documents: readonly ClinicalDocument[], skipped = 0) {
    documents.forEach((doc, position) => {
      if (doc.id !== position) {
        throw new RangeError(`Document ids must be dense: expected ${position}, got ${doc.id}`);
      }
    });
    this.documents = Object.freeze([...documents]);
    this.skipped = skipped;
  }

  /**
   * Decode raw records into a store.
   *
   * @param raw - Parsed dataset; must be an array
   * @param source - Label used in error messages
   * @throws ParseError if `raw` is not an array
   * @throws EmptyDatasetError if no record is valid
   */
  static fromRecords(raw: unknown, source = '<memory>'): DocumentStore {
    if (!Array.isArray(raw)) {
      throw new ParseError(source, 'expected a JSON array of records');
    }

    const documents: ClinicalDocument[] = [];
    let skipped = 0;

    raw.forEach((record: unknown, position) => {
      const decoded = RawRecordSchema.safeParse(record);
      if (!decoded.success) {
        skipped++;
        logger.debug({ source, position, issues: decoded.error.issues.length }, 'Skipping invalid record');
        return;
      }

      const { prompt, completion, cancer_type, genes, ...metadata } = decoded.data;
      documents.push(
        Object.freeze({
          id: documents.length,
          prompt,
          completion,
          cancerTypes: cancer_type,
          genes,
          metadata: Object.freeze(metadata),
        })
      );
    });

    if (documents.length === 0) {
      throw new EmptyDatasetError(skipped);
    }

    if (skipped > 0) {
      logger.warn({ source, accepted: documents.length, skipped }, 'Dropped invalid dataset records');
    }

    return new DocumentStore(documents, skipped);
  }

  get size(): number {
    return this.documents.length;
  }

  get(id: number): ClinicalDocument | undefined {
    return this.documents[id];
  }

  all(): readonly ClinicalDocument[] {
    return this.documents;
  }

  /**
   * Canonical text of everything the index and graph are built from.
   * Hash it to key caches by dataset content.
   */
  fingerprintSource(): string {
    return JSON.stringify(
      this.documents.map((doc) => [
        doc.prompt,
        doc.completion,
        [...doc.cancerTypes].sort(),
        [...doc.genes].sort(),
      ])
    );
  }
}

/**
 * Decode raw records. See {@link DocumentStore.fromRecords}.
 */
export function loadDocuments(raw: unknown, source?: string): DocumentStore {
  return DocumentStore.fromRecords(raw, source);
}
