/** Opaque node handle: a dense index below 2^32. */
export type NodeIndex = number;

/** Identifiers of the shipped storage engines. */
export type StorageKind = "csr" | "matrix";

/** Single step of a neighbor enumeration. */
export interface NeighborEntry<E> {
  readonly neighbor: NodeIndex;
  readonly weight: E;
}

/**
 * Read-only adjacency surface consumed by the algorithm layer. Algorithms
 * never see backend internals, only the node count and the outgoing
 * adjacency of each node.
 */
export interface AdjacencyView<E> {
  nodeCount(): number;
  /** Targets of `node` in adjacency order. Callers must not mutate it. */
  neighborsSlice(node: NodeIndex): Uint32Array;
  /** Lazy `(neighbor, weight)` sequence in adjacency order. */
  neighborEntries(node: NodeIndex): IterableIterator<NeighborEntry<E>>;
}

/** Operations every storage backend provides to the graph facade. */
export interface GraphStorage<N, E> extends AdjacencyView<E> {
  readonly kind: StorageKind;
  addNode(weight: N): NodeIndex;
  /** Returns `false` when the edge already exists; nothing changes in that case. */
  addEdge(source: NodeIndex, target: NodeIndex, weight: E): boolean;
  containsEdge(source: NodeIndex, target: NodeIndex): boolean;
  edgeCount(): number;
  getNodeWeight(node: NodeIndex): N;
  setNodeWeight(node: NodeIndex, weight: N): void;
  edgesSlice(node: NodeIndex): E[];
  outDegree(node: NodeIndex): number;
  /** Drops every edge while keeping the nodes and their weights. */
  clearEdges(): void;
}

/** Largest representable node index plus one. */
export const MAX_NODE_COUNT = 0x1_0000_0000;

/** True when `value` is an integer usable as a node index. */
export function isNodeIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < MAX_NODE_COUNT;
}
