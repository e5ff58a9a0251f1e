/**
 * GraphCache - build or reload the knowledge graph
 *
 * The cache file holds a MessagePack-encoded graph together with the
 * fingerprint of the dataset it was built from. A missing, unreadable,
 * corrupt or stale file is never fatal: the graph is rebuilt and the file
 * rewritten.
 *
 * @module GraphCache
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  GraphCacheError,
  GraphSerializer,
  buildKnowledgeGraph,
  type DocumentStore,
  type KnowledgeGraph,
  type KnowledgeGraphOptions,
} from '@oncoqa/core';
import { datasetFingerprint } from './DatasetLoader';
import { logger } from './utils/logger';

export type GraphBuildOptions = Omit<KnowledgeGraphOptions, 'fingerprint'>;

/**
 * Builds in progress, shared by every GraphCache in the process. The key
 * holds the fingerprint, which already covers the build options.
 */
const inFlight = new Map<string, Promise<KnowledgeGraph>>();

let temporaryFileCounter = 0;

/**
 * Builds graphs, reusing a cache file when its fingerprint matches.
 * Concurrent requests for the same dataset and location share one build,
 * across instances.
 *
 * @example
 * ```typescript
 * const cache = new GraphCache({ maxKeywordsPerDocument: 24 });
 * const graph = await cache.buildOrLoad(store, '/var/cache/oncoqa/graph.msgpack');
 * ```
 */
export class GraphCache {
  private readonly serializer = new GraphSerializer();

  constructor(private readonly options: GraphBuildOptions = {}) {}

  buildOrLoad(store: DocumentStore, cacheLocation?: string): Promise<KnowledgeGraph> {
    const fingerprint = datasetFingerprint(store, this.options);
    const key = `${cacheLocation ?? ''}\u0000${fingerprint}`;

    const pending = inFlight.get(key);
    if (pending) {
      logger.debug({ cacheLocation, fingerprint }, 'Joining in-flight graph build');
      return pending;
    }

    const build = this.resolve(store, fingerprint, cacheLocation).finally(() => {
      inFlight.delete(key);
    });
    inFlight.set(key, build);
    return build;
  }

  private async resolve(store: DocumentStore, fingerprint: string, cacheLocation?: string): Promise<KnowledgeGraph> {
    if (cacheLocation) {
      try {
        const cached = await this.read(cacheLocation);
        if (cached && cached.fingerprint === fingerprint) {
          logger.info({ cacheLocation, nodes: cached.nodeCount, edges: cached.edgeCount }, 'Graph loaded from cache');
          return cached;
        }
        if (cached) {
          logger.info({ cacheLocation }, 'Graph cache is stale, rebuilding');
        }
      } catch (err) {
        if (!(err instanceof GraphCacheError)) throw err;
        logger.warn({ cacheLocation, err }, 'Graph cache unusable, rebuilding');
      }
    }

    const graph = buildKnowledgeGraph(store.all(), { ...this.options, fingerprint });
    logger.info({ nodes: graph.nodeCount, edges: graph.edgeCount }, 'Graph built');

    if (cacheLocation) {
      await this.write(cacheLocation, graph);
    }
    return graph;
  }

  /**
   * @returns null if there is no cache file
   * @throws GraphCacheError if the file exists but cannot be used
   */
  async read(cacheLocation: string): Promise<KnowledgeGraph | null> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(cacheLocation);
    } catch (err) {
      if (isMissingFile(err)) {
        logger.debug({ cacheLocation }, 'No graph cache file');
        return null;
      }
      throw new GraphCacheError(cacheLocation, 'cannot read file', err);
    }
    return this.serializer.decode(bytes, cacheLocation);
  }

  /**
   * Write through a temporary file and rename, so readers never see a partial
   * cache. Failures are logged and ignored; the temporary file is removed.
   */
  async write(cacheLocation: string, graph: KnowledgeGraph): Promise<void> {
    const temporary = `${cacheLocation}.${process.pid}.${++temporaryFileCounter}.tmp`;
    try {
      await mkdir(dirname(cacheLocation), { recursive: true });
      await writeFile(temporary, this.serializer.encode(graph));
      await rename(temporary, cacheLocation);
      logger.debug({ cacheLocation }, 'Graph cache written');
    } catch (err) {
      logger.warn({ cacheLocation, err }, 'Failed to write graph cache');
      await unlink(temporary).catch((cleanupErr: unknown) => {
        if (!isMissingFile(cleanupErr)) {
          logger.warn({ temporary, err: cleanupErr }, 'Failed to remove temporary graph cache file');
        }
      });
    }
  }
}

/**
 * Matches on `code` alone: fs errors fail `instanceof Error` inside Jest's VM sandbox.
 */
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Build the knowledge graph for a store, or reload it from `cacheLocation`
 * when the cache matches the store's fingerprint.
 */
export function buildOrLoadGraph(
  store: DocumentStore,
  cacheLocation?: string,
  options: GraphBuildOptions = {}
): Promise<KnowledgeGraph> {
  return new GraphCache(options).buildOrLoad(store, cacheLocation);
}
