import type { AdjacencyView, NodeIndex } from "../storage/types.js";
import type { WeightOps } from "../weight.js";
import { MinHeap } from "./minHeap.js";

interface QueueEntry<E> {
  node: NodeIndex;
  priority: E;
}

/**
 * Distances and predecessors computed from one start node. Instances are
 * detached from the graph: later graph mutations do not affect them.
 */
export class ShortestPathResult<E> {
  constructor(
    readonly start: NodeIndex,
    private readonly distances: readonly E[],
    private readonly reached: Uint8Array,
    private readonly predecessors: Float64Array,
  ) {}

  /** Number of nodes the result covers. */
  get nodeCount(): number {
    return this.reached.length;
  }

  /** Shortest distance to `node`, `undefined` when unreached or out of range. */
  distanceTo(node: NodeIndex): E | undefined {
    return this.isReachable(node) ? this.distances[node] : undefined;
  }

  isReachable(node: NodeIndex): boolean {
    return this.inRange(node) && this.reached[node] === 1;
  }

  /** Node preceding `node` on its shortest path, `null` for the start and unreached nodes. */
  predecessorOf(node: NodeIndex): NodeIndex | null {
    if (!this.inRange(node)) {
      return null;
    }
    const predecessor = this.predecessors[node];
    return predecessor < 0 ? null : predecessor;
  }

  /** Nodes on the shortest path from the start to `target`, both included. */
  pathTo(target: NodeIndex): NodeIndex[] | null {
    if (!this.isReachable(target)) {
      return null;
    }
    const path: NodeIndex[] = [target];
    let current = target;
    while (current !== this.start) {
      const predecessor = this.predecessors[current];
      if (predecessor < 0) {
        break;
      }
      path.push(predecessor);
      current = predecessor;
    }
    return path.reverse();
  }

  /** Every reached node in index order. */
  reachableNodes(): NodeIndex[] {
    const nodes: NodeIndex[] = [];
    this.reached.forEach((flag, node) => {
      if (flag === 1) {
        nodes.push(node);
      }
    });
    return nodes;
  }

  private inRange(node: NodeIndex): boolean {
    return Number.isInteger(node) && node >= 0 && node < this.reached.length;
  }
}

/**
 * Single-source shortest paths over non-negative weights.
 *
 * A node is settled the first time it leaves the heap; later (stale) heap
 * entries for it are skipped. A neighbor is relaxed only when the candidate
 * distance is strictly smaller, so among equal-cost paths the first one found
 * is kept. Returns `null` when `start` is not a node of the graph.
 */
export function dijkstra<E>(view: AdjacencyView<E>, start: NodeIndex, ops: WeightOps<E>): ShortestPathResult<E> | null {
  const count = view.nodeCount();
  if (!Number.isInteger(start) || start < 0 || start >= count) {
    return null;
  }

  const distances = new Array<E>(count);
  const reached = new Uint8Array(count);
  const settled = new Uint8Array(count);
  const predecessors = new Float64Array(count).fill(-1);

  distances[start] = ops.zero();
  reached[start] = 1;

  const queue = new MinHeap<QueueEntry<E>>((a, b) => ops.compare(a.priority, b.priority));
  queue.enqueue({ node: start, priority: distances[start] });

  while (!queue.isEmpty()) {
    const current = queue.dequeue();
    if (!current || settled[current.node] === 1) {
      continue;
    }
    settled[current.node] = 1;
    const base = distances[current.node];

    for (const { neighbor, weight } of view.neighborEntries(current.node)) {
      if (settled[neighbor] === 1) {
        continue;
      }
      const tentative = ops.add(base, weight);
      if (reached[neighbor] === 0 || ops.compare(tentative, distances[neighbor]) < 0) {
        distances[neighbor] = tentative;
        reached[neighbor] = 1;
        predecessors[neighbor] = current.node;
        queue.enqueue({ node: neighbor, priority: tentative });
      }
    }
  }

  return new ShortestPathResult(start, distances, reached, predecessors);
}
