export * from "./errors.js";
export * from "./weight.js";
export * from "./logger.js";
export * from "./config/settings.js";
export * from "./storage/types.js";
export { CsrStorage, LINEAR_SCAN_THRESHOLD, type SortedEdge } from "./storage/csr.js";
export { MatrixStorage, type MatrixGrowth, type MatrixStorageOptions } from "./storage/matrix.js";
export * from "./graph.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/traversal.js";
export * from "./algorithms/topology.js";
