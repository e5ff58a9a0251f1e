// Retrieval: tokenizer, inverted index, ranking, facets, closest match
export * from './fts';

// Documents
export { DocumentStore, loadDocuments } from './documents/DocumentStore';
export { RawRecordSchema, splitFacetList } from './documents/record-schema';
export type { ClinicalDocument } from './documents/types';

// Knowledge graph
export * from './graph';

// Schemas
export * from './schemas';

// Errors
export {
  RetrievalError,
  LoadError,
  ParseError,
  EmptyDatasetError,
  GraphCacheError,
  DatasetNotLoadedError,
} from './errors';

// Utilities
export { serialize, deserialize } from './serializer';
export { hashString, hashHex } from './utils/hash';
export { logger } from './utils/logger';
export type { Logger } from './utils/logger';
