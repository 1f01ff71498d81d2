import { EdgesNotSortedError, IndicesOutOfBoundsError } from "../errors.js";
import { IndexBuffer } from "./indexBuffer.js";
import { PayloadColumn } from "./payloadColumn.js";
import { MAX_NODE_COUNT, isNodeIndex, type GraphStorage, type NeighborEntry, type NodeIndex } from "./types.js";

/**
 * Degree below which the sorted adjacency is searched linearly. Short sorted
 * runs are scanned faster than they are bisected.
 */
export const LINEAR_SCAN_THRESHOLD = 32;

/** Bulk-load triple: `[source, target, weight]`. */
export type SortedEdge<E> = readonly [source: NodeIndex, target: NodeIndex, weight: E];

/** Outcome of locating `target` inside the adjacency of a source node. */
interface EdgeSlot {
  readonly found: boolean;
  readonly offset: number;
}

/**
 * Compressed Sparse Row storage.
 *
 * `row` holds `nodeCount + 1` offsets into `column`; the targets of node `i`
 * live in `column[row[i]..row[i + 1])`, sorted ascending without duplicates,
 * and `edges` carries the matching weights at the same offsets. Space is
 * O(V + E) and the adjacency of a node is one contiguous window.
 */
export class CsrStorage<N, E> implements GraphStorage<N, E> {
  readonly kind = "csr" as const;

  private readonly column = new IndexBuffer();
  private readonly edges = new PayloadColumn<E>();
  private readonly row = new IndexBuffer();
  private readonly nodeWeights = new PayloadColumn<N>();

  constructor() {
    this.row.push(0);
  }

  /** Empty graph; same as `new CsrStorage()`. */
  static init<N, E>(): CsrStorage<N, E> {
    return new CsrStorage<N, E>();
  }

  /** Graph with `count` edge-less nodes all carrying `defaultWeight`. */
  static withNodes<N, E>(count: number, defaultWeight: N): CsrStorage<N, E> {
    if (!Number.isInteger(count) || count < 0 || count >= MAX_NODE_COUNT) {
      throw new RangeError(`node count must be an integer in [0, 2^32), received ${count}`);
    }
    const storage = new CsrStorage<N, E>();
    for (let index = 0; index < count; index += 1) {
      storage.row.push(0);
    }
    storage.nodeWeights.fill(count, defaultWeight);
    return storage;
  }

  /**
   * Builds the graph in O(V + E) from edges sorted ascending by
   * (source, target) with unique pairs. The node count is the largest index
   * plus one. The whole input is validated before anything is built, so a
   * rejected call leaves nothing behind.
   */
  static fromSortedEdges<N, E>(edges: readonly SortedEdge<E>[], defaultNodeWeight: N): CsrStorage<N, E> {
    let maxNode = -1;
    for (let position = 0; position < edges.length; position += 1) {
      const [source, target] = edges[position];
      // The node count must itself stay below 2^32, so the top index is unusable.
      if (!isNodeIndex(source) || !isNodeIndex(target) || Math.max(source, target) >= MAX_NODE_COUNT - 1) {
        throw new IndicesOutOfBoundsError([source, target], MAX_NODE_COUNT - 1);
      }
      if (position > 0) {
        const [previousSource, previousTarget] = edges[position - 1];
        if (source < previousSource || (source === previousSource && target <= previousTarget)) {
          throw new EdgesNotSortedError(position, [previousSource, previousTarget], [source, target]);
        }
      }
      maxNode = Math.max(maxNode, source, target);
    }

    const storage = CsrStorage.withNodes<N, E>(maxNode + 1, defaultNodeWeight);
    let cursor = 0;
    for (let node = 0; node < maxNode + 1; node += 1) {
      storage.row.set(node, storage.column.length);
      while (cursor < edges.length && edges[cursor][0] === node) {
        const [, target, weight] = edges[cursor];
        storage.column.push(target);
        storage.edges.push(weight);
        cursor += 1;
      }
    }
    storage.row.set(maxNode + 1, storage.column.length);
    return storage;
  }

  nodeCount(): number {
    return this.row.length - 1;
  }

  edgeCount(): number {
    return this.column.length;
  }

  addNode(weight: N): NodeIndex {
    const node = this.nodeCount();
    // The new node starts (and ends) where the column currently ends, so the
    // sentinel offset is simply duplicated.
    this.row.push(this.column.length);
    this.nodeWeights.push(weight);
    return node;
  }

  addEdge(source: NodeIndex, target: NodeIndex, weight: E): boolean {
    this.assertNodes(source, target);
    const slot = this.locate(source, target);
    if (slot.found) {
      return false;
    }
    // Every allocation happens before the first visible write: a failure
    // leaves row, column and weights exactly as they were.
    this.column.reserve(this.column.length + 1);
    this.edges.insert(slot.offset, weight);
    this.column.insert(slot.offset, target);
    this.row.addFrom(source + 1, 1);
    return true;
  }

  containsEdge(source: NodeIndex, target: NodeIndex): boolean {
    if (!this.hasNode(source) || !this.hasNode(target)) {
      return false;
    }
    return this.locate(source, target).found;
  }

  getNodeWeight(node: NodeIndex): N {
    this.assertNodes(node);
    return this.nodeWeights.get(node);
  }

  setNodeWeight(node: NodeIndex, weight: N): void {
    this.assertNodes(node);
    this.nodeWeights.set(node, weight);
  }

  /** Zero-copy view on the targets of `node`; valid until the next mutation. */
  neighborsSlice(node: NodeIndex): Uint32Array {
    this.assertNodes(node);
    return this.column.view(this.row.get(node), this.row.get(node + 1));
  }

  edgesSlice(node: NodeIndex): E[] {
    this.assertNodes(node);
    return this.edges.slice(this.row.get(node), this.row.get(node + 1));
  }

  outDegree(node: NodeIndex): number {
    this.assertNodes(node);
    return this.row.get(node + 1) - this.row.get(node);
  }

  neighborEntries(node: NodeIndex): IterableIterator<NeighborEntry<E>> {
    this.assertNodes(node);
    return this.walk(this.row.get(node), this.row.get(node + 1));
  }

  clearEdges(): void {
    this.column.clear();
    this.edges.clear();
    this.row.zero();
  }

  /** Copy of the row offsets, mostly useful to check the layout. */
  rowOffsets(): number[] {
    return this.row.toArray();
  }

  /** Copy of the column (target) indices. */
  columnIndices(): number[] {
    return this.column.toArray();
  }

  isEdgePayloadAllocated(): boolean {
    return this.edges.isAllocated();
  }

  isNodePayloadAllocated(): boolean {
    return this.nodeWeights.isAllocated();
  }

  private *walk(start: number, end: number): IterableIterator<NeighborEntry<E>> {
    for (let offset = start; offset < end; offset += 1) {
      yield { neighbor: this.column.get(offset), weight: this.edges.get(offset) };
    }
  }

  private locate(source: NodeIndex, target: NodeIndex): EdgeSlot {
    const start = this.row.get(source);
    const end = this.row.get(source + 1);

    if (end - start < LINEAR_SCAN_THRESHOLD) {
      for (let offset = start; offset < end; offset += 1) {
        const neighbor = this.column.get(offset);
        if (neighbor === target) {
          return { found: true, offset };
        }
        if (neighbor > target) {
          return { found: false, offset };
        }
      }
      return { found: false, offset: end };
    }

    let low = start;
    let high = end;
    while (low < high) {
      const mid = low + Math.floor((high - low) / 2);
      const neighbor = this.column.get(mid);
      if (neighbor === target) {
        return { found: true, offset: mid };
      }
      if (neighbor < target) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return { found: false, offset: low };
  }

  private hasNode(node: NodeIndex): boolean {
    return Number.isInteger(node) && node >= 0 && node < this.nodeCount();
  }

  private assertNodes(...nodes: NodeIndex[]): void {
    if (!nodes.every((node) => this.hasNode(node))) {
      throw new IndicesOutOfBoundsError(nodes, this.nodeCount());
    }
  }
}
