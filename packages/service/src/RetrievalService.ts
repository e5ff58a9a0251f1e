/**
 * RetrievalService - publishes dataset snapshots and answers queries
 *
 * A snapshot (documents, inverted index, knowledge graph) is built completely
 * off to the side and then published by swapping one reference. Queries read
 * whichever snapshot is current when they start and never mutate it.
 *
 * @module RetrievalService
 */

import {
  ClosestMatchRequestSchema,
  ClosestMatcher,
  DEFAULT_CONCEPT_MIN_LENGTH,
  DatasetNotLoadedError,
  RelatedConceptsRequestSchema,
  SearchRequestSchema,
  Tokenizer,
  filterResults,
  relatedConcepts,
  search,
  type ClosestMatch,
  type ClosestMatchRequest,
  type DocumentStore,
  type InvertedIndex,
  type KnowledgeGraph,
  type RelatedConcept,
  type RelatedConceptsRequest,
  type ScoredResult,
  type SearchRequest,
} from '@oncoqa/core';
import { describeSource, loadDataset } from './DatasetLoader';
import { GraphCache } from './GraphCache';
import { logger } from './utils/logger';

/**
 * Configuration for a RetrievalService.
 */
export interface RetrievalServiceConfig {
  /** Minimum token length for indexing and ranked search (default 3) */
  minTokenLength?: number;

  /** Minimum length of graph terms and related-concept query tokens (default 4) */
  conceptMinLength?: number;

  /** Co-occurrence keyword cap per document (default 24) */
  maxKeywordsPerDocument?: number;

  /** Where to persist the knowledge graph; no caching when absent */
  graphCachePath?: string;

  /** Similarity cutoff for the closest-match backend (default 0.4) */
  closestMatchCutoff?: number;
}

/**
 * Immutable structures for one dataset version.
 */
export interface DatasetSnapshot {
  readonly source: string;
  readonly store: DocumentStore;
  readonly index: InvertedIndex;
  readonly graph: KnowledgeGraph;
  readonly fingerprint: string | null;
  readonly loadedAt: number;
}

/**
 * One page of ranked results.
 */
export interface SearchResponse {
  results: ScoredResult[];

  /** Number of results after filtering, before pagination */
  total: number;

  offset: number;
}

/**
 * RetrievalService
 *
 * @example
 * ```typescript
 * const service = new RetrievalService({ graphCachePath: './cache/graph.msgpack' });
 * await service.load('./data/clinical_qa.json');
 *
 * const page = service.search({ query: 'atezolizumab dose', categoryFilters: { cancer_type: ['NSCLC'] } });
 * const concepts = service.relatedConcepts({ query: 'atezolizumab', topN: 5 });
 * ```
 */
export class RetrievalService {
  private snapshot: DatasetSnapshot | null = null;

  /** Loads in progress, keyed by file path */
  private readonly inFlight = new Map<string, Promise<DatasetSnapshot>>();

  /** Every load takes a generation; only a newer one may replace the snapshot */
  private loadGeneration = 0;
  private publishedGeneration = 0;

  private readonly tokenizer: Tokenizer;
  private readonly conceptTokenizer: Tokenizer;
  private readonly graphCache: GraphCache;
  private readonly matcher: ClosestMatcher;
  private readonly graphCachePath: string | undefined;

  constructor(config: RetrievalServiceConfig = {}) {
    this.tokenizer = new Tokenizer({ minLength: config.minTokenLength });
    this.conceptTokenizer = new Tokenizer({ minLength: config.conceptMinLength ?? DEFAULT_CONCEPT_MIN_LENGTH });
    this.graphCache = new GraphCache({
      maxKeywordsPerDocument: config.maxKeywordsPerDocument,
      conceptMinLength: config.conceptMinLength,
    });
    this.matcher = new ClosestMatcher({ cutoff: config.closestMatchCutoff });
    this.graphCachePath = config.graphCachePath;
    logger.debug('RetrievalService initialized');
  }

  /**
   * Load a dataset and publish it. Concurrent loads of the same file share
   * one build. On failure the previous snapshot stays published.
   */
  load(source: string | readonly unknown[]): Promise<DatasetSnapshot> {
    if (typeof source !== 'string') {
      return this.loadAndPublish(source);
    }

    const pending = this.inFlight.get(source);
    if (pending) {
      logger.debug({ source }, 'Joining in-flight dataset load');
      return pending;
    }

    const loading = this.loadAndPublish(source).finally(() => {
      this.inFlight.delete(source);
    });
    this.inFlight.set(source, loading);
    return loading;
  }

  private async loadAndPublish(source: string | readonly unknown[]): Promise<DatasetSnapshot> {
    const generation = ++this.loadGeneration;

    const { store, index } = await loadDataset(source, { tokenizer: this.tokenizer });
    const graph = await this.graphCache.buildOrLoad(store, this.graphCachePath);

    const next: DatasetSnapshot = Object.freeze({
      source: describeSource(source),
      store,
      index,
      graph,
      fingerprint: graph.fingerprint,
      loadedAt: Date.now(),
    });

    if (generation > this.publishedGeneration) {
      this.snapshot = next;
      this.publishedGeneration = generation;
      logger.info({ source: next.source, documents: store.size, generation }, 'Dataset snapshot published');
    } else {
      logger.info({ source: next.source, generation }, 'Newer snapshot already published, discarding');
    }
    return next;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * @throws DatasetNotLoadedError before the first successful load
   */
  getSnapshot(): DatasetSnapshot {
    if (!this.snapshot) {
      throw new DatasetNotLoadedError();
    }
    return this.snapshot;
  }

  /**
   * Ranked search with facet filters and pagination.
   *
   * @throws ZodError if the request is malformed
   */
  search(request: SearchRequest): SearchResponse {
    const { query, minScore, keywordFilters, categoryFilters, limit, offset } = SearchRequestSchema.parse(request);
    const { store, index } = this.getSnapshot();

    const ranked = search(query, store, index);
    const filtered = filterResults(ranked, minScore, keywordFilters, categoryFilters);
    const results = filtered.slice(offset, limit === undefined ? undefined : offset + limit);

    logger.debug({ query, candidates: ranked.length, total: filtered.length, returned: results.length }, 'Search executed');

    return { results, total: filtered.length, offset };
  }

  relatedConcepts(request: RelatedConceptsRequest): RelatedConcept[] {
    const { query, topN } = RelatedConceptsRequestSchema.parse(request);
    const { graph } = this.getSnapshot();
    return relatedConcepts(graph, query, topN, this.conceptTokenizer);
  }

  /**
   * Single best answer by prompt similarity, independent of ranked search.
   */
  closestMatch(request: ClosestMatchRequest): ClosestMatch | null {
    const { question } = ClosestMatchRequestSchema.parse(request);
    return this.matcher.match(question, this.getSnapshot().store);
  }
}
