import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { IndicesOutOfBoundsError } from "../../src/errors.js";
import { MatrixStorage } from "../../src/storage/matrix.js";
import type { Unit } from "../../src/weight.js";

describe("storage/matrix", () => {
  it("stores edges in constant-time slots and rejects duplicates", () => {
    const storage = MatrixStorage.withNodes<Unit, number>(3, undefined);

    expect(storage.addEdge(0, 2, 7)).to.equal(true);
    expect(storage.addEdge(0, 1, 3)).to.equal(true);
    expect(storage.addEdge(0, 2, 9)).to.equal(false);

    expect(storage.edgeCount()).to.equal(2);
    expect(storage.containsEdge(0, 2)).to.equal(true);
    expect(storage.containsEdge(2, 0)).to.equal(false);
    expect(Array.from(storage.neighborsSlice(0))).to.deep.equal([1, 2]);
    expect(storage.edgesSlice(0)).to.deep.equal([3, 7]);
    expect(storage.outDegree(0)).to.equal(2);
    expect(storage.outDegree(1)).to.equal(0);
  });

  it("builds a fresh neighbor array on every call", () => {
    const storage = MatrixStorage.withNodes<Unit, Unit>(2, undefined);
    storage.addEdge(0, 1, undefined);

    const first = storage.neighborsSlice(0);
    first[0] = 0;

    expect(Array.from(storage.neighborsSlice(0))).to.deep.equal([1]);
    expect(storage.neighborsSlice(0).buffer).to.not.equal(first.buffer);
  });

  it("grows to the exact node count when asked to", () => {
    const onGrow = sinon.spy();
    const storage = new MatrixStorage<Unit, Unit>({ growth: "exact", onGrow });
    storage.addNode(undefined);
    storage.addNode(undefined);
    storage.addNode(undefined);

    expect(storage.nodeCapacity()).to.equal(3);
    expect(onGrow.callCount).to.equal(3);
    expect(onGrow.lastCall.args[0]).to.deep.equal({ previousCapacity: 2, capacity: 3 });
  });

  it("doubles its capacity by default", () => {
    const onGrow = sinon.spy();
    const storage = new MatrixStorage<Unit, Unit>({ onGrow });
    for (let index = 0; index < 5; index += 1) {
      storage.addNode(undefined);
    }

    expect(storage.nodeCount()).to.equal(5);
    expect(storage.nodeCapacity()).to.equal(8);
    expect(onGrow.getCalls().map((call) => call.args[0])).to.deep.equal([
      { previousCapacity: 0, capacity: 4 },
      { previousCapacity: 4, capacity: 8 },
    ]);
  });

  it("preserves existing edges and weights when rows move during growth", () => {
    const storage = new MatrixStorage<string, number>({ growth: "exact" });
    const a = storage.addNode("a");
    const b = storage.addNode("b");
    storage.addEdge(a, b, 1);
    storage.addEdge(b, a, 2);
    storage.addEdge(b, b, 3);

    const c = storage.addNode("c");
    storage.addEdge(c, a, 4);

    expect(storage.edgeCount()).to.equal(4);
    expect(Array.from(storage.neighborsSlice(a))).to.deep.equal([b]);
    expect(Array.from(storage.neighborsSlice(b))).to.deep.equal([a, b]);
    expect(storage.edgesSlice(b)).to.deep.equal([2, 3]);
    expect(storage.edgesSlice(c)).to.deep.equal([4]);
    expect(storage.getNodeWeight(b)).to.equal("b");
    expect(storage.containsEdge(a, c)).to.equal(false);
  });

  it("throws on out-of-range edges instead of silently ignoring them", () => {
    const storage = MatrixStorage.withNodes<Unit, Unit>(2, undefined);

    expect(() => storage.addEdge(0, 2, undefined)).to.throw(IndicesOutOfBoundsError);
    expect(storage.edgeCount()).to.equal(0);
    expect(storage.containsEdge(0, 2)).to.equal(false);
    expect(storage.containsEdge(-1, 0)).to.equal(false);
  });

  it("clears every edge but keeps nodes and capacity", () => {
    const storage = MatrixStorage.withNodes<number, Unit>(4, 1, { growth: "exact" });
    storage.addEdge(0, 1, undefined);
    storage.addEdge(3, 2, undefined);

    storage.clearEdges();

    expect(storage.edgeCount()).to.equal(0);
    expect(storage.nodeCount()).to.equal(4);
    expect(storage.nodeCapacity()).to.equal(4);
    expect(storage.containsEdge(0, 1)).to.equal(false);
    expect(storage.getNodeWeight(3)).to.equal(1);
  });

  it("rejects invalid node counts", () => {
    expect(() => MatrixStorage.withNodes<Unit, Unit>(-1, undefined)).to.throw(RangeError);
    expect(() => MatrixStorage.withNodes<Unit, Unit>(1.5, undefined)).to.throw(RangeError);
  });

  it("yields neighbor entries lazily in ascending target order", () => {
    const storage = MatrixStorage.withNodes<Unit, string>(4, undefined);
    storage.addEdge(1, 3, "x");
    storage.addEdge(1, 0, "y");

    const iterator = storage.neighborEntries(1);
    expect(iterator.next()).to.deep.equal({ value: { neighbor: 0, weight: "y" }, done: false });
    expect(iterator.next()).to.deep.equal({ value: { neighbor: 3, weight: "x" }, done: false });
    expect(iterator.next().done).to.equal(true);
    expect(() => storage.neighborEntries(4)).to.throw(IndicesOutOfBoundsError);
  });
});
