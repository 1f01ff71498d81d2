/**
 * Capabilities an edge-weight type must expose to take part in shortest-path
 * computations. The algorithm never inspects the weights: it only combines
 * them with {@link WeightOps.add} and orders them with
 * {@link WeightOps.compare}, so composite costs whose combination is not an
 * arithmetic sum are supported as long as the order stays total.
 */
export interface WeightOps<E> {
  /** Identity element of {@link add}; distance of the start node. */
  zero(): E;
  /** Combines a path cost with the weight of the next edge. */
  add(a: E, b: E): E;
  /** Negative when `a < b`, zero when equal, positive when `a > b`. */
  compare(a: E, b: E): number;
}

/** Explicit "no payload" weight for graphs whose nodes or edges carry nothing. */
export type Unit = undefined;

export const numberWeight: WeightOps<number> = {
  zero: () => 0,
  add: (a, b) => a + b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
};

export const bigintWeight: WeightOps<bigint> = {
  zero: () => 0n,
  add: (a, b) => a + b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
};
