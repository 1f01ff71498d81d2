import { describe, it } from "mocha";
import { expect } from "chai";

import { dijkstra } from "../../src/algorithms/dijkstra.js";
import { Graph } from "../../src/graph.js";
import { bigintWeight, numberWeight, type Unit, type WeightOps } from "../../src/weight.js";
import { BACKENDS, buildWeightedGraph } from "../helpers/graphs.js";

type Terrain = "grass" | "water" | "mountain";

const TERRAIN_RANK: Record<Terrain, number> = { grass: 1, water: 2, mountain: 3 };

/** Path cost is the hardest terrain crossed, not a sum. */
const dominantTerrain: WeightOps<Terrain> = {
  zero: () => "grass",
  add: (a, b) => (TERRAIN_RANK[b] > TERRAIN_RANK[a] ? b : a),
  compare: (a, b) => TERRAIN_RANK[a] - TERRAIN_RANK[b],
};

for (const backend of BACKENDS) {
  describe(`algorithms/dijkstra (${backend.name})`, () => {
    it("computes shortest distances and paths", () => {
      const graph = buildWeightedGraph(backend, 4, [
        [0, 1, 1],
        [0, 2, 10],
        [1, 3, 3],
        [2, 3, 1],
      ]);

      const result = graph.dijkstra(0, numberWeight);
      expect(result).to.not.equal(null);
      if (!result) {
        return;
      }
      expect([0, 1, 2, 3].map((node) => result.distanceTo(node))).to.deep.equal([0, 1, 10, 4]);
      expect(result.pathTo(3)).to.deep.equal([0, 1, 3]);
      expect(result.pathTo(0)).to.deep.equal([0]);
      expect(result.predecessorOf(3)).to.equal(1);
      expect(result.predecessorOf(0)).to.equal(null);
      expect(result.nodeCount).to.equal(4);
      expect(result.start).to.equal(0);
    });

    it("improves a tentative distance found earlier", () => {
      const graph = buildWeightedGraph(backend, 3, [
        [0, 1, 10],
        [0, 2, 1],
        [2, 1, 2],
      ]);

      const result = graph.dijkstra(0, numberWeight);
      expect(result?.distanceTo(1)).to.equal(3);
      expect(result?.pathTo(1)).to.deep.equal([0, 2, 1]);
      expect(result?.reachableNodes()).to.deep.equal([0, 1, 2]);
    });

    it("keeps the first path found among equal-cost ones", () => {
      const graph = buildWeightedGraph(backend, 4, [
        [0, 1, 1],
        [0, 2, 1],
        [1, 3, 1],
        [2, 3, 1],
      ]);

      const result = graph.dijkstra(0, numberWeight);
      expect(result?.distanceTo(3)).to.equal(2);
      expect(result?.predecessorOf(3)).to.equal(1);
    });

    it("leaves unreachable nodes without distance or path", () => {
      const graph = buildWeightedGraph(backend, 4, [
        [0, 1, 2],
        [3, 0, 1],
      ]);

      const result = graph.dijkstra(0, numberWeight);
      expect(result?.isReachable(3)).to.equal(false);
      expect(result?.distanceTo(3)).to.equal(undefined);
      expect(result?.pathTo(3)).to.equal(null);
      expect(result?.predecessorOf(3)).to.equal(null);
      expect(result?.isReachable(2)).to.equal(false);
      expect(result?.reachableNodes()).to.deep.equal([0, 1]);
    });

    it("ignores self loops and cycles back to the start", () => {
      const graph = buildWeightedGraph(backend, 2, [
        [0, 0, 5],
        [0, 1, 1],
        [1, 0, 1],
      ]);

      const result = graph.dijkstra(0, numberWeight);
      expect(result?.distanceTo(0)).to.equal(0);
      expect(result?.distanceTo(1)).to.equal(1);
      expect(result?.predecessorOf(0)).to.equal(null);
    });

    it("returns null for a start outside the graph and undefined for out-of-range queries", () => {
      const graph = buildWeightedGraph(backend, 2, [[0, 1, 1]]);

      expect(graph.dijkstra(2, numberWeight)).to.equal(null);
      expect(graph.dijkstra(-1, numberWeight)).to.equal(null);

      const result = graph.dijkstra(0, numberWeight);
      expect(result?.distanceTo(42)).to.equal(undefined);
      expect(result?.isReachable(-3)).to.equal(false);
      expect(result?.pathTo(2)).to.equal(null);
      expect(result?.predecessorOf(1.5)).to.equal(null);
    });

    it("supports composite costs that are not sums", () => {
      const graph = backend.create<Unit, Terrain>();
      for (let index = 0; index < 4; index += 1) {
        graph.addNode(undefined);
      }
      graph.addEdge(0, 1, "mountain");
      graph.addEdge(1, 3, "grass");
      graph.addEdge(0, 2, "water");
      graph.addEdge(2, 3, "water");

      const result = graph.dijkstra(0, dominantTerrain);
      expect(result?.distanceTo(0)).to.equal("grass");
      expect(result?.distanceTo(1)).to.equal("mountain");
      expect(result?.distanceTo(3)).to.equal("water");
      expect(result?.pathTo(3)).to.deep.equal([0, 2, 3]);
    });

    it("works with bigint weights", () => {
      const graph = backend.create<Unit, bigint>();
      for (let index = 0; index < 3; index += 1) {
        graph.addNode(undefined);
      }
      graph.addEdge(0, 1, 5n);
      graph.addEdge(1, 2, 7n);
      graph.addEdge(0, 2, 20n);

      expect(graph.dijkstra(0, bigintWeight)?.distanceTo(2)).to.equal(12n);
    });
  });
}

describe("algorithms/dijkstra results", () => {
  it("are detached from later graph mutations", () => {
    const graph = Graph.create<Unit, number>();
    graph.addNode(undefined);
    graph.addNode(undefined);
    graph.addNode(undefined);
    graph.addEdge(0, 1, 4);

    const before = dijkstra(graph, 0, numberWeight);
    graph.addEdge(0, 2, 1);
    graph.addEdge(2, 1, 1);

    expect(before?.distanceTo(1)).to.equal(4);
    expect(before?.isReachable(2)).to.equal(false);
    expect(dijkstra(graph, 0, numberWeight)?.distanceTo(1)).to.equal(2);
  });
});
