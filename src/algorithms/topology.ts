import type { AdjacencyView, NodeIndex } from "../storage/types.js";

export interface TopologicalSortResult {
  /**
   * Nodes ordered so that every edge points forward. When the graph has
   * cycles only the nodes outside (and not downstream of) a cycle appear.
   */
  readonly order: NodeIndex[];
  readonly hasCycles: boolean;
}

/**
 * Kahn's algorithm. In-degrees are computed in one pass over every
 * adjacency list, zero in-degree nodes are seeded in index order and
 * processed FIFO. A result shorter than the node count means a cycle.
 */
export function topologicalSort(view: AdjacencyView<unknown>): TopologicalSortResult {
  const count = view.nodeCount();
  const inDegrees = new Uint32Array(count);

  for (let node = 0; node < count; node += 1) {
    for (const neighbor of view.neighborsSlice(node)) {
      inDegrees[neighbor] += 1;
    }
  }

  const queue: NodeIndex[] = [];
  for (let node = 0; node < count; node += 1) {
    if (inDegrees[node] === 0) {
      queue.push(node);
    }
  }

  // Every dequeued node is appended to the order, so the queue array doubles
  // as the result once the head cursor has walked through it.
  for (let head = 0; head < queue.length; head += 1) {
    for (const neighbor of view.neighborsSlice(queue[head])) {
      inDegrees[neighbor] -= 1;
      if (inDegrees[neighbor] === 0) {
        queue.push(neighbor);
      }
    }
  }

  return { order: queue, hasCycles: queue.length !== count };
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Three-colour depth-first cycle detection over every component. Reaching a
 * gray node (one still on the current path) is a back edge. Recursion depth
 * follows the longest path; see {@link hasCyclesIterative}.
 */
export function hasCycles(view: AdjacencyView<unknown>): boolean {
  const count = view.nodeCount();
  const colors = new Uint8Array(count);

  const visit = (node: NodeIndex): boolean => {
    colors[node] = GRAY;
    for (const neighbor of view.neighborsSlice(node)) {
      if (colors[neighbor] === GRAY) {
        return true;
      }
      if (colors[neighbor] === WHITE && visit(neighbor)) {
        return true;
      }
    }
    colors[node] = BLACK;
    return false;
  };

  for (let node = 0; node < count; node += 1) {
    if (colors[node] === WHITE && visit(node)) {
      return true;
    }
  }
  return false;
}

interface CycleFrame {
  readonly node: NodeIndex;
  readonly phase: "enter" | "leave";
}

/** Same answer as {@link hasCycles} with heap-bounded depth. */
export function hasCyclesIterative(view: AdjacencyView<unknown>): boolean {
  return searchCycle(view) !== null;
}

/**
 * Returns one directed cycle as a closed walk (`[a, b, c, a]`), or `null`
 * when the graph is acyclic. A self loop yields `[a, a]`.
 */
export function findCycle(view: AdjacencyView<unknown>): NodeIndex[] | null {
  return searchCycle(view);
}

/**
 * Explicit-stack three-colour search. `enter` frames turn a white node gray
 * and schedule its `leave` frame below its white neighbors; `leave` frames
 * turn it black. The gray nodes always form the current path, tracked by
 * `parents` so a back edge can be unrolled into the cycle.
 */
function searchCycle(view: AdjacencyView<unknown>): NodeIndex[] | null {
  const count = view.nodeCount();
  const colors = new Uint8Array(count);
  const parents = new Float64Array(count).fill(-1);
  const stack: CycleFrame[] = [];

  for (let root = 0; root < count; root += 1) {
    if (colors[root] !== WHITE) {
      continue;
    }
    stack.push({ node: root, phase: "enter" });

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) {
        break;
      }
      if (frame.phase === "leave") {
        colors[frame.node] = BLACK;
        continue;
      }
      if (colors[frame.node] !== WHITE) {
        continue;
      }
      colors[frame.node] = GRAY;
      stack.push({ node: frame.node, phase: "leave" });

      const neighbors = view.neighborsSlice(frame.node);
      for (let index = neighbors.length - 1; index >= 0; index -= 1) {
        const neighbor = neighbors[index];
        if (colors[neighbor] === GRAY) {
          return unrollCycle(parents, frame.node, neighbor);
        }
        if (colors[neighbor] === WHITE) {
          parents[neighbor] = frame.node;
          stack.push({ node: neighbor, phase: "enter" });
        }
      }
    }
  }
  return null;
}

function unrollCycle(parents: Float64Array, from: NodeIndex, to: NodeIndex): NodeIndex[] {
  const cycle: NodeIndex[] = [to];
  let current = from;
  while (current !== to && current >= 0) {
    cycle.push(current);
    current = parents[current];
  }
  cycle.push(to);
  return cycle.reverse();
}
