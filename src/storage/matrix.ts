import { IndicesOutOfBoundsError } from "../errors.js";
import { PayloadColumn } from "./payloadColumn.js";
import { MAX_NODE_COUNT, type GraphStorage, type NeighborEntry, type NodeIndex } from "./types.js";

/**
 * How the matrix grows once the node count exceeds its capacity:
 * `double` amortises reallocations, `exact` keeps `capacity === nodeCount`.
 */
export type MatrixGrowth = "double" | "exact";

export interface MatrixStorageOptions {
  readonly growth?: MatrixGrowth;
  /** Called after every reallocation, e.g. to log it. */
  readonly onGrow?: (event: { previousCapacity: number; capacity: number }) => void;
}

/** Occupied slot of the adjacency matrix. */
interface EdgeSlot<E> {
  readonly weight: E;
}

/**
 * Dense adjacency matrix storage: `capacity²` optional slots where slot
 * `row * capacity + col` holds the weight of edge `row -> col`.
 *
 * Edge insertion and lookup are O(1); enumerating the neighbors of a node
 * scans its whole row, O(V). This favours dense graphs, while the CSR
 * backend favours sparse ones.
 */
export class MatrixStorage<N, E> implements GraphStorage<N, E> {
  readonly kind = "matrix" as const;

  private readonly nodeWeights = new PayloadColumn<N>();
  private slots: Array<EdgeSlot<E> | null> = [];
  private capacity = 0;
  private edges = 0;
  private readonly growth: MatrixGrowth;
  private readonly onGrow?: MatrixStorageOptions["onGrow"];

  constructor(options: MatrixStorageOptions = {}) {
    this.growth = options.growth ?? "double";
    this.onGrow = options.onGrow;
  }

  /** Graph with `count` edge-less nodes all carrying `defaultWeight`. */
  static withNodes<N, E>(count: number, defaultWeight: N, options: MatrixStorageOptions = {}): MatrixStorage<N, E> {
    if (!Number.isInteger(count) || count < 0 || count >= MAX_NODE_COUNT) {
      throw new RangeError(`node count must be an integer in [0, 2^32), received ${count}`);
    }
    const storage = new MatrixStorage<N, E>(options);
    storage.nodeWeights.fill(count, defaultWeight);
    storage.ensureCapacity(count);
    return storage;
  }

  /** Number of node slots per matrix row. */
  nodeCapacity(): number {
    return this.capacity;
  }

  nodeCount(): number {
    return this.nodeWeights.length;
  }

  edgeCount(): number {
    return this.edges;
  }

  addNode(weight: N): NodeIndex {
    const node = this.nodeCount();
    this.ensureCapacity(node + 1);
    this.nodeWeights.push(weight);
    return node;
  }

  addEdge(source: NodeIndex, target: NodeIndex, weight: E): boolean {
    this.assertNodes(source, target);
    const index = source * this.capacity + target;
    if (this.slots[index] !== null) {
      return false;
    }
    this.slots[index] = { weight };
    this.edges += 1;
    return true;
  }

  containsEdge(source: NodeIndex, target: NodeIndex): boolean {
    if (!this.hasNode(source) || !this.hasNode(target)) {
      return false;
    }
    return this.slots[source * this.capacity + target] !== null;
  }

  getNodeWeight(node: NodeIndex): N {
    this.assertNodes(node);
    return this.nodeWeights.get(node);
  }

  setNodeWeight(node: NodeIndex, weight: N): void {
    this.assertNodes(node);
    this.nodeWeights.set(node, weight);
  }

  /** Freshly allocated list of the targets of `node`, built by a row scan. */
  neighborsSlice(node: NodeIndex): Uint32Array {
    this.assertNodes(node);
    const targets: number[] = [];
    for (const entry of this.walkRow(node)) {
      targets.push(entry.neighbor);
    }
    return Uint32Array.from(targets);
  }

  edgesSlice(node: NodeIndex): E[] {
    this.assertNodes(node);
    const weights: E[] = [];
    for (const entry of this.walkRow(node)) {
      weights.push(entry.weight);
    }
    return weights;
  }

  outDegree(node: NodeIndex): number {
    this.assertNodes(node);
    const start = node * this.capacity;
    const count = this.nodeCount();
    let degree = 0;
    for (let target = 0; target < count; target += 1) {
      if (this.slots[start + target] !== null) {
        degree += 1;
      }
    }
    return degree;
  }

  neighborEntries(node: NodeIndex): IterableIterator<NeighborEntry<E>> {
    this.assertNodes(node);
    return this.walkRow(node);
  }

  clearEdges(): void {
    this.slots.fill(null);
    this.edges = 0;
  }

  private *walkRow(node: NodeIndex): IterableIterator<NeighborEntry<E>> {
    const start = node * this.capacity;
    const count = this.nodeCount();
    for (let target = 0; target < count; target += 1) {
      const slot = this.slots[start + target];
      if (slot !== null) {
        yield { neighbor: target, weight: slot.weight };
      }
    }
  }

  /**
   * Reallocates the matrix when `required` nodes no longer fit. The row stride
   * changes with the capacity, so every existing row is copied to its new
   * offset; node indices and edges are preserved.
   */
  private ensureCapacity(required: number): void {
    if (required <= this.capacity) {
      return;
    }
    const previousCapacity = this.capacity;
    const capacity = this.growth === "exact" ? required : Math.max(required, previousCapacity * 2, 4);
    const slots: Array<EdgeSlot<E> | null> = new Array<EdgeSlot<E> | null>(capacity * capacity).fill(null);
    for (let row = 0; row < previousCapacity; row += 1) {
      const from = row * previousCapacity;
      const to = row * capacity;
      for (let col = 0; col < previousCapacity; col += 1) {
        slots[to + col] = this.slots[from + col];
      }
    }
    this.slots = slots;
    this.capacity = capacity;
    this.onGrow?.({ previousCapacity, capacity });
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
