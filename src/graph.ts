import { dijkstra, type ShortestPathResult } from "./algorithms/dijkstra.js";
import {
  findCycle,
  hasCycles,
  hasCyclesIterative,
  topologicalSort,
  type TopologicalSortResult,
} from "./algorithms/topology.js";
import { bfs, dfs, dfsIterative, type TraversalVisitor } from "./algorithms/traversal.js";
import { loadMatrixGrowthFromEnv } from "./config/settings.js";
import { silentLogger, type GraphLogger } from "./logger.js";
import { CsrStorage, type SortedEdge } from "./storage/csr.js";
import { MatrixStorage, type MatrixGrowth } from "./storage/matrix.js";
import type { AdjacencyView, GraphStorage, NeighborEntry, NodeIndex } from "./storage/types.js";
import type { WeightOps } from "./weight.js";

/** Lazy `(neighbor, weight)` sequence; every call starts a fresh one. */
export type NeighborIterator<E> = IterableIterator<NeighborEntry<E>>;

export interface GraphOptions {
  /** Receives debug events about bulk operations. Silent by default. */
  readonly logger?: GraphLogger;
}

export interface MatrixGraphOptions extends GraphOptions {
  /** Defaults to `GRAPH_MATRIX_GROWTH`, itself defaulting to `double`. */
  readonly growth?: MatrixGrowth;
}

/**
 * Directed graph front-end generic over node weights `N`, edge weights `E`
 * and the storage backend `S` (CSR unless stated otherwise). Storage calls
 * are forwarded untouched; algorithms only see the adjacency surface, so
 * they behave the same on every backend and never mutate the graph.
 */
export class Graph<N, E, S extends GraphStorage<N, E> = CsrStorage<N, E>> implements AdjacencyView<E> {
  private readonly logger: GraphLogger;

  constructor(
    readonly storage: S,
    options: GraphOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Empty graph on the CSR backend. */
  static create<N, E>(options: GraphOptions = {}): Graph<N, E> {
    return new Graph<N, E>(new CsrStorage<N, E>(), options);
  }

  /** Empty graph on the dense matrix backend. */
  static withMatrix<N, E>(options: MatrixGraphOptions = {}): Graph<N, E, MatrixStorage<N, E>> {
    const logger = options.logger ?? silentLogger;
    const growth = options.growth ?? loadMatrixGrowthFromEnv();
    const storage = new MatrixStorage<N, E>({
      growth,
      onGrow: (event) => logger.debug("matrix_storage_grown", event),
    });
    return new Graph<N, E, MatrixStorage<N, E>>(storage, { logger });
  }

  /** CSR graph built in one pass from edges sorted by (source, target). */
  static fromSortedEdges<N, E>(
    edges: readonly SortedEdge<E>[],
    defaultNodeWeight: N,
    options: GraphOptions = {},
  ): Graph<N, E> {
    const graph = new Graph<N, E>(CsrStorage.fromSortedEdges<N, E>(edges, defaultNodeWeight), options);
    graph.logger.debug("graph_bulk_loaded", { nodes: graph.nodeCount(), edges: graph.edgeCount() });
    return graph;
  }

  addNode(weight: N): NodeIndex {
    return this.storage.addNode(weight);
  }

  /** Adds `source -> target`; `false` when that edge already exists. */
  addEdge(source: NodeIndex, target: NodeIndex, weight: E): boolean {
    return this.storage.addEdge(source, target, weight);
  }

  containsEdge(source: NodeIndex, target: NodeIndex): boolean {
    return this.storage.containsEdge(source, target);
  }

  nodeCount(): number {
    return this.storage.nodeCount();
  }

  edgeCount(): number {
    return this.storage.edgeCount();
  }

  getNodeWeight(node: NodeIndex): N {
    return this.storage.getNodeWeight(node);
  }

  setNodeWeight(node: NodeIndex, weight: N): void {
    this.storage.setNodeWeight(node, weight);
  }

  /**
   * Targets of `node` in ascending order. On CSR this is a zero-copy window
   * into the live adjacency: do not write to it, and do not keep it across
   * a mutation of the graph.
   */
  neighbors(node: NodeIndex): Uint32Array {
    return this.storage.neighborsSlice(node);
  }

  /** Same read-only, mutation-scoped view as {@link neighbors}. */
  neighborsSlice(node: NodeIndex): Uint32Array {
    return this.storage.neighborsSlice(node);
  }

  /** Weights of the outgoing edges of `node`, aligned with {@link neighbors}. */
  edges(node: NodeIndex): E[] {
    return this.storage.edgesSlice(node);
  }

  outDegree(node: NodeIndex): number {
    return this.storage.outDegree(node);
  }

  neighborIterator(node: NodeIndex): NeighborIterator<E> {
    return this.storage.neighborEntries(node);
  }

  neighborEntries(node: NodeIndex): NeighborIterator<E> {
    return this.storage.neighborEntries(node);
  }

  clearEdges(): void {
    const dropped = this.edgeCount();
    this.storage.clearEdges();
    this.logger.debug("graph_edges_cleared", { nodes: this.nodeCount(), dropped });
  }

  /** Shortest paths from `start`; `null` when `start` is not a node. */
  dijkstra(start: NodeIndex, ops: WeightOps<E>): ShortestPathResult<E> | null {
    const result = dijkstra(this, start, ops);
    this.logger.debug("dijkstra_completed", { start, nodes: this.nodeCount(), computed: result !== null });
    return result;
  }

  bfs<T>(start: NodeIndex, visitor: TraversalVisitor<T>, state: T): void {
    bfs(this, start, visitor, state);
  }

  dfs<T>(start: NodeIndex, visitor: TraversalVisitor<T>, state: T): void {
    dfs(this, start, visitor, state);
  }

  dfsIterative<T>(start: NodeIndex, visitor: TraversalVisitor<T>, state: T): void {
    dfsIterative(this, start, visitor, state);
  }

  topologicalSort(): TopologicalSortResult {
    const result = topologicalSort(this);
    this.logger.debug("topological_sort_completed", {
      nodes: this.nodeCount(),
      ordered: result.order.length,
      hasCycles: result.hasCycles,
    });
    return result;
  }

  hasCycles(): boolean {
    return hasCycles(this);
  }

  hasCyclesIterative(): boolean {
    return hasCyclesIterative(this);
  }

  /** One cycle as a closed walk, or `null` for a DAG. */
  findCycle(): NodeIndex[] | null {
    return findCycle(this);
  }
}
