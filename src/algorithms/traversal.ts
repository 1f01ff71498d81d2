import type { AdjacencyView, NodeIndex } from "../storage/types.js";

/**
 * Callback invoked once per visited node. `state` is the caller-owned value
 * handed to the traversal, passed through untouched so visitors can mutate it
 * instead of capturing outer variables. Returning `false` stops the traversal.
 */
export type TraversalVisitor<S> = (node: NodeIndex, state: S) => void | boolean;

function inRange(view: AdjacencyView<unknown>, node: NodeIndex): boolean {
  return Number.isInteger(node) && node >= 0 && node < view.nodeCount();
}

/**
 * Breadth-first traversal from `start`: nodes are visited in level order, each
 * reachable node exactly once, neighbors enqueued in adjacency order. An
 * out-of-range start visits nothing.
 */
export function bfs<S>(view: AdjacencyView<unknown>, start: NodeIndex, visitor: TraversalVisitor<S>, state: S): void {
  if (!inRange(view, start)) {
    return;
  }

  const visited = new Uint8Array(view.nodeCount());
  const queue: NodeIndex[] = [start];
  visited[start] = 1;

  // The head cursor gives O(1) dequeues without shifting the array.
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (visitor(current, state) === false) {
      return;
    }
    for (const neighbor of view.neighborsSlice(current)) {
      if (visited[neighbor] === 0) {
        visited[neighbor] = 1;
        queue.push(neighbor);
      }
    }
  }
}

/**
 * Recursive depth-first pre-order traversal. Call stack depth grows with the
 * longest explored path; prefer {@link dfsIterative} for deep graphs.
 */
export function dfs<S>(view: AdjacencyView<unknown>, start: NodeIndex, visitor: TraversalVisitor<S>, state: S): void {
  if (!inRange(view, start)) {
    return;
  }

  const visited = new Uint8Array(view.nodeCount());

  const visit = (node: NodeIndex): boolean => {
    visited[node] = 1;
    if (visitor(node, state) === false) {
      return false;
    }
    for (const neighbor of view.neighborsSlice(node)) {
      if (visited[neighbor] === 0 && !visit(neighbor)) {
        return false;
      }
    }
    return true;
  };

  visit(start);
}

/**
 * Depth-first pre-order traversal driven by an explicit stack. Neighbors are
 * pushed in reverse adjacency order and a node is visited when popped (if it
 * was not visited meanwhile), which yields exactly the order of {@link dfs}.
 */
export function dfsIterative<S>(
  view: AdjacencyView<unknown>,
  start: NodeIndex,
  visitor: TraversalVisitor<S>,
  state: S,
): void {
  if (!inRange(view, start)) {
    return;
  }

  const visited = new Uint8Array(view.nodeCount());
  const stack: NodeIndex[] = [start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || visited[current] === 1) {
      continue;
    }
    visited[current] = 1;
    if (visitor(current, state) === false) {
      return;
    }
    const neighbors = view.neighborsSlice(current);
    for (let index = neighbors.length - 1; index >= 0; index -= 1) {
      if (visited[neighbors[index]] === 0) {
        stack.push(neighbors[index]);
      }
    }
  }
}

/** Nodes reachable from `start` in breadth-first order. */
export function bfsOrder(view: AdjacencyView<unknown>, start: NodeIndex): NodeIndex[] {
  const order: NodeIndex[] = [];
  bfs(view, start, (node, collected) => {
    collected.push(node);
  }, order);
  return order;
}

/** Nodes reachable from `start` in depth-first pre-order. */
export function dfsOrder(
  view: AdjacencyView<unknown>,
  start: NodeIndex,
  mode: "recursive" | "iterative" = "iterative",
): NodeIndex[] {
  const order: NodeIndex[] = [];
  const traverse = mode === "recursive" ? dfs : dfsIterative;
  traverse(view, start, (node: NodeIndex, collected: NodeIndex[]) => {
    collected.push(node);
  }, order);
  return order;
}
