import { GraphCacheError } from '../errors';
import { GRAPH_FORMAT_VERSION, SerializedGraphSchema, type SerializedGraph } from '../schemas/graph-schemas';
import { deserialize, serialize } from '../serializer';
import { KnowledgeGraph } from './KnowledgeGraph';

/**
 * Serializer for KnowledgeGraph
 *
 * Round trip reproduces the same nodes, edges, kinds and weights, and keeps
 * the fingerprint so a cache can tell which dataset it was built from.
 */
export class GraphSerializer {
  serialize(graph: KnowledgeGraph): SerializedGraph {
    return {
      version: GRAPH_FORMAT_VERSION,
      fingerprint: graph.fingerprint,
      nodes: [...graph.nodes()].map((node) => ({ ...node })),
      edges: graph.edges().map((edge) => ({ ...edge })),
    };
  }

  /**
   * @param location - Label for errors, usually the cache file path
   * @throws GraphCacheError if the data is not a valid graph
   */
  deserialize(data: unknown, location = '<memory>'): KnowledgeGraph {
    const parsed = SerializedGraphSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new GraphCacheError(location, `invalid graph data${where}`, parsed.error);
    }

    try {
      return new KnowledgeGraph(parsed.data.nodes, parsed.data.edges, parsed.data.fingerprint);
    } catch (err) {
      throw new GraphCacheError(location, err instanceof Error ? err.message : String(err), err);
    }
  }

  /**
   * Encode to MessagePack.
   */
  encode(graph: KnowledgeGraph): Uint8Array {
    return serialize(this.serialize(graph));
  }

  /**
   * Decode from MessagePack.
   *
   * @throws GraphCacheError if the bytes are not a valid graph
   */
  decode(bytes: Uint8Array, location = '<memory>'): KnowledgeGraph {
    let data: unknown;
    try {
      data = deserialize(bytes);
    } catch (err) {
      throw new GraphCacheError(location, 'not valid MessagePack', err);
    }
    return this.deserialize(data, location);
  }
}
