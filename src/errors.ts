import type { z } from "zod";

/** Stable error codes surfaced by the graph library. */
export const GRAPH_ERROR_CODES = {
  INDEX_OUT_OF_BOUNDS: "E-GRAPH-INDEX",
  EDGES_NOT_SORTED: "E-GRAPH-UNSORTED",
  INVALID_CONFIGURATION: "E-GRAPH-CONFIG",
} as const;

export type GraphErrorCode = (typeof GRAPH_ERROR_CODES)[keyof typeof GRAPH_ERROR_CODES];

/** Base error used by the storage engines and the facade. */
export class GraphError extends Error {
  constructor(
    message: string,
    public readonly code: GraphErrorCode,
    public readonly hint: string,
  ) {
    super(message);
    this.name = "GraphError";
  }
}

/** Error thrown when a node index does not address an existing node. */
export class IndicesOutOfBoundsError extends GraphError {
  public readonly details: { indices: number[]; nodeCount: number };

  constructor(indices: number[], nodeCount: number) {
    super(
      `node indices [${indices.join(", ")}] are out of bounds for a graph of ${nodeCount} node(s)`,
      GRAPH_ERROR_CODES.INDEX_OUT_OF_BOUNDS,
      "add the nodes first or use indices returned by addNode",
    );
    this.name = "IndicesOutOfBoundsError";
    this.details = { indices, nodeCount };
  }
}

/** Error thrown when the bulk loader receives edges out of (source, target) order. */
export class EdgesNotSortedError extends GraphError {
  public readonly details: {
    position: number;
    previous: readonly [number, number];
    current: readonly [number, number];
  };

  constructor(position: number, previous: readonly [number, number], current: readonly [number, number]) {
    super(
      `edge #${position} (${current[0]} -> ${current[1]}) does not follow (${previous[0]} -> ${previous[1]})`,
      GRAPH_ERROR_CODES.EDGES_NOT_SORTED,
      "sort the edges ascending by (source, target) and drop duplicate pairs",
    );
    this.name = "EdgesNotSortedError";
    this.details = { position, previous, current };
  }
}

/** Error thrown when graph settings fail validation. */
export class GraphConfigurationError extends GraphError {
  public readonly details: { issues: z.ZodIssue[] };

  constructor(issues: z.ZodIssue[]) {
    super(
      `invalid graph configuration: ${issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ")}`,
      GRAPH_ERROR_CODES.INVALID_CONFIGURATION,
      "check the GRAPH_* environment variables and the settings overrides",
    );
    this.name = "GraphConfigurationError";
    this.details = { issues };
  }
}
