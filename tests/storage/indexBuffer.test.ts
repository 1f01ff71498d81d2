import { describe, it } from "mocha";
import { expect } from "chai";

import { IndexBuffer } from "../../src/storage/indexBuffer.js";

describe("storage/indexBuffer", () => {
  it("grows past its initial capacity while keeping the contents", () => {
    const buffer = new IndexBuffer(2);
    for (let value = 0; value < 5; value += 1) {
      buffer.push(value * 10);
    }

    expect(buffer.length).to.equal(5);
    expect(buffer.toArray()).to.deep.equal([0, 10, 20, 30, 40]);
  });

  it("inserts by shifting the tail", () => {
    const buffer = new IndexBuffer(4);
    buffer.push(1);
    buffer.push(3);
    buffer.push(4);
    buffer.push(5);
    buffer.insert(1, 2);
    buffer.insert(0, 0);

    expect(buffer.toArray()).to.deep.equal([0, 1, 2, 3, 4, 5]);
  });

  it("shifts offsets from a position onwards", () => {
    const buffer = new IndexBuffer();
    [0, 2, 2, 5].forEach((value) => buffer.push(value));
    buffer.addFrom(2, 1);

    expect(buffer.toArray()).to.deep.equal([0, 2, 3, 6]);
  });

  it("hands out windows sharing the live storage", () => {
    const buffer = new IndexBuffer();
    [7, 8, 9].forEach((value) => buffer.push(value));
    const window = buffer.view(1, 3);
    buffer.set(2, 42);

    expect(Array.from(window)).to.deep.equal([8, 42]);
  });

  it("zeroes and clears", () => {
    const buffer = new IndexBuffer();
    [4, 5].forEach((value) => buffer.push(value));
    buffer.zero();
    expect(buffer.toArray()).to.deep.equal([0, 0]);

    buffer.clear();
    expect(buffer.length).to.equal(0);
    expect(buffer.toArray()).to.deep.equal([]);
  });
});
