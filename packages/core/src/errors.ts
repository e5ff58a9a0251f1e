/**
 * Retrieval Errors
 *
 * Load-time failures halt processing and reach the caller.
 * GraphCacheError is always recoverable by rebuilding the graph.
 */

/**
 * Base error class for retrieval errors
 */
export class RetrievalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalError';
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when the dataset source cannot be read
 */
export class LoadError extends RetrievalError {
  public readonly source: string;

  constructor(source: string, cause?: unknown) {
    super(`Cannot read dataset from ${source}: ${describeCause(cause)}`, { cause });
    this.name = 'LoadError';
    this.source = source;
  }
}

/**
 * Thrown when the dataset is not a JSON array of records
 */
export class ParseError extends RetrievalError {
  public readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super(`Malformed dataset ${source}: ${reason}`, { cause });
    this.name = 'ParseError';
    this.source = source;
  }
}

/**
 * Thrown when no record survives validation
 */
export class EmptyDatasetError extends RetrievalError {
  public readonly skipped: number;

  constructor(skipped: number) {
    super(`Dataset contains no valid records (${skipped} skipped)`);
    this.name = 'EmptyDatasetError';
    this.skipped = skipped;
  }
}

/**
 * Thrown when a persisted graph is unreadable or does not decode
 */
export class GraphCacheError extends RetrievalError {
  public readonly location: string;

  constructor(location: string, reason: string, cause?: unknown) {
    super(`Graph cache ${location} unusable: ${reason}`, { cause });
    this.name = 'GraphCacheError';
    this.location = location;
  }
}

/**
 * Thrown when a query arrives before any dataset was published
 */
export class DatasetNotLoadedError extends RetrievalError {
  constructor() {
    super('No dataset has been loaded');
    this.name = 'DatasetNotLoadedError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
