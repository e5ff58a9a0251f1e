/**
 * Knowledge Graph
 *
 * Immutable undirected graph holding both the concept co-occurrence edges and
 * the document → concept relationship edges. At most one edge per node pair.
 *
 * @module graph/KnowledgeGraph
 */

import type { GraphEdge, GraphNode } from './types';

const NO_NEIGHBORS: ReadonlyMap<string, GraphEdge> = new Map();

export class KnowledgeGraph {
  private readonly nodeMap: Map<string, GraphNode>;

  /** node key → neighbor key → shared edge */
  private readonly adjacency: Map<string, Map<string, GraphEdge>>;

  /** Edges in insertion order */
  private readonly edgeList: GraphEdge[];

  /** Identity of the document set this graph was built from */
  readonly fingerprint: string | null;

  /**
   * @throws RangeError on duplicate nodes, dangling edges, self-loops,
   * repeated node pairs or weights below 1
   */
  constructor(nodes: Iterable<GraphNode>, edges: Iterable<GraphEdge>, fingerprint: string | null = null) {
    this.nodeMap = new Map();
    this.adjacency = new Map();
    this.edgeList = [];
    this.fingerprint = fingerprint;

    for (const node of nodes) {
      if (this.nodeMap.has(node.key)) {
        throw new RangeError(`Duplicate node ${node.key}`);
      }
      this.nodeMap.set(node.key, Object.freeze({ ...node }));
      this.adjacency.set(node.key, new Map());
    }

    for (const edge of edges) {
      this.addEdge(Object.freeze({ ...edge }));
    }
  }

  private addEdge(edge: GraphEdge): void {
    const { source, target } = edge;
    if (source === target) {
      throw new RangeError(`Self-loop on ${source}`);
    }
    const sourceNeighbors = this.adjacency.get(source);
    const targetNeighbors = this.adjacency.get(target);
    if (!sourceNeighbors || !targetNeighbors) {
      throw new RangeError(`Edge ${source} -- ${target} references an unknown node`);
    }
    if (sourceNeighbors.has(target)) {
      throw new RangeError(`Duplicate edge ${source} -- ${target}`);
    }
    if (!Number.isInteger(edge.weight) || edge.weight < 1) {
      throw new RangeError(`Edge ${source} -- ${target} has invalid weight ${edge.weight}`);
    }

    sourceNeighbors.set(target, edge);
    targetNeighbors.set(source, edge);
    this.edgeList.push(edge);
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  getNode(key: string): GraphNode | undefined {
    return this.nodeMap.get(key);
  }

  hasNode(key: string): boolean {
    return this.nodeMap.has(key);
  }

  /**
   * Edge between two nodes, in either direction.
   */
  getEdge(a: string, b: string): GraphEdge | undefined {
    return this.adjacency.get(a)?.get(b);
  }

  /**
   * Incident edges of a node keyed by neighbor.
   */
  neighbors(key: string): ReadonlyMap<string, GraphEdge> {
    return this.adjacency.get(key) ?? NO_NEIGHBORS;
  }

  nodes(): IterableIterator<GraphNode> {
    return this.nodeMap.values();
  }

  edges(): readonly GraphEdge[] {
    return this.edgeList;
  }
}
