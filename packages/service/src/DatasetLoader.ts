/**
 * Dataset Loader
 *
 * Reads a JSON dataset, decodes its records and builds the inverted index.
 *
 * @module DatasetLoader
 */

import { readFile } from 'fs/promises';
import { createHash } from 'crypto';
import {
  DEFAULT_CONCEPT_MIN_LENGTH,
  DEFAULT_MAX_KEYWORDS_PER_DOCUMENT,
  DocumentStore,
  InvertedIndex,
  LoadError,
  ParseError,
  Tokenizer,
  type KnowledgeGraphOptions,
} from '@oncoqa/core';
import { logger } from './utils/logger';

export interface LoadDatasetOptions {
  /** Tokenizer shared by the index and every query against it */
  tokenizer?: Tokenizer;
}

export interface LoadedDataset {
  store: DocumentStore;
  index: InvertedIndex;
}

/**
 * Load a dataset from a JSON file path or from already parsed records.
 *
 * @throws LoadError if the file cannot be read
 * @throws ParseError if the content is not a JSON array
 * @throws EmptyDatasetError if no record is valid
 */
export async function loadDataset(
  source: string | readonly unknown[],
  options: LoadDatasetOptions = {}
): Promise<LoadedDataset> {
  const label = describeSource(source);
  const raw = typeof source === 'string' ? await readDatasetFile(source) : source;

  const store = DocumentStore.fromRecords(raw, label);
  const index = InvertedIndex.build(store.all(), options.tokenizer ?? new Tokenizer());

  logger.info(
    { source: label, documents: store.size, skipped: store.skipped, terms: index.getTermCount() },
    'Dataset loaded'
  );

  return { store, index };
}

async function readDatasetFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new LoadError(path, err);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ParseError(path, err instanceof Error ? err.message : 'invalid JSON', err);
  }
}

export function describeSource(source: string | readonly unknown[]): string {
  return typeof source === 'string' ? source : `<${source.length} in-memory records>`;
}

/**
 * SHA-256 over the document content and the graph build options.
 * Any change to either produces a different fingerprint.
 */
export function datasetFingerprint(
  store: DocumentStore,
  options: Omit<KnowledgeGraphOptions, 'fingerprint'> = {}
): string {
  return createHash('sha256')
    .update(
      JSON.stringify({
        documents: store.fingerprintSource(),
        maxKeywordsPerDocument: options.maxKeywordsPerDocument ?? DEFAULT_MAX_KEYWORDS_PER_DOCUMENT,
        conceptMinLength: options.conceptMinLength ?? DEFAULT_CONCEPT_MIN_LENGTH,
      })
    )
    .digest('hex');
}
