/**
 * @fileoverview Micro-benchmark comparing the CSR and dense matrix backends on
 * the same random graph. Usage: `npm run bench -- [nodes] [degree] [seed]`.
 * Timings are reported through the structured logger configured by the
 * `GRAPH_*` environment variables, forced to at least `info`.
 */

import { resolve } from "node:path";
import { performance } from "node:perf_hooks";
import { pathToFileURL } from "node:url";

import { createLoggerFromSettings, resolveGraphSettings } from "../src/config/settings.js";
import { Graph } from "../src/graph.js";
import type { GraphLogger } from "../src/logger.js";
import type { GraphStorage } from "../src/storage/types.js";
import { numberWeight, type Unit } from "../src/weight.js";

export interface BenchmarkOptions {
  readonly nodes: number;
  /** Edges drawn per node; duplicates are dropped by the storage. */
  readonly degree: number;
  readonly seed: number;
}

export interface BackendTimings {
  readonly backend: string;
  readonly edges: number;
  /** Sum of every edge weight, read back through the neighbor iterator. */
  readonly weightSum: number;
  readonly buildMs: number;
  readonly scanMs: number;
  readonly dijkstraMs: number;
  readonly bfsMs: number;
  readonly topologicalSortMs: number;
}

/** Deterministic 32-bit linear congruential generator. */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
}

function time(action: () => void): number {
  const startedAt = performance.now();
  action();
  return performance.now() - startedAt;
}

function measure(
  backend: string,
  graph: Graph<Unit, number, GraphStorage<Unit, number>>,
  options: BenchmarkOptions,
): BackendTimings {
  const next = createRandom(options.seed);
  const buildMs = time(() => {
    for (let node = 0; node < options.nodes; node += 1) {
      graph.addNode(undefined);
    }
    for (let source = 0; source < options.nodes; source += 1) {
      for (let draw = 0; draw < options.degree; draw += 1) {
        graph.addEdge(source, next() % options.nodes, (next() % 100) + 1);
      }
    }
  });

  let weightSum = 0;
  const scanMs = time(() => {
    for (let node = 0; node < options.nodes; node += 1) {
      for (const { weight } of graph.neighborEntries(node)) {
        weightSum += weight;
      }
    }
  });

  const dijkstraMs = time(() => {
    graph.dijkstra(0, numberWeight);
  });
  const bfsMs = time(() => {
    graph.bfs(0, () => undefined, null);
  });
  const topologicalSortMs = time(() => {
    graph.topologicalSort();
  });

  return {
    backend,
    edges: graph.edgeCount(),
    weightSum,
    buildMs,
    scanMs,
    dijkstraMs,
    bfsMs,
    topologicalSortMs,
  };
}

/** Runs the benchmark on both backends and logs one entry per backend. */
export function runGraphBenchmark(options: BenchmarkOptions, logger: GraphLogger): BackendTimings[] {
  if (!Number.isInteger(options.nodes) || options.nodes < 1) {
    throw new RangeError(`nodes must be a positive integer, received ${options.nodes}`);
  }
  const results = [
    measure("csr", Graph.create<Unit, number>(), options),
    measure("matrix", Graph.withMatrix<Unit, number>(), options),
  ];
  for (const result of results) {
    logger.info("graph_benchmark", { ...options, ...result });
  }
  return results;
}

function parseArgument(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

const entryPoint = process.argv[1];
if (entryPoint !== undefined && import.meta.url === pathToFileURL(resolve(entryPoint)).href) {
  const [nodes, degree, seed] = process.argv.slice(2);
  const settings = resolveGraphSettings();
  const logger = createLoggerFromSettings({
    ...settings,
    logLevel: settings.logLevel === "debug" ? "debug" : "info",
  });
  try {
    runGraphBenchmark(
      {
        nodes: parseArgument(nodes, 2_000),
        degree: parseArgument(degree, 8),
        seed: parseArgument(seed, 42),
      },
      logger,
    );
  } catch (error) {
    logger.error("graph_benchmark_failed", { message: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  }
  logger.flush().catch((error) => {
    console.error("Unexpected error while flushing benchmark logs:", error);
    process.exitCode = 1;
  });
}
