import { describe, it, expect } from "vitest";
import { RingBuffer } from "./ring-buffer.js";

describe("RingBuffer", () => {
  it("keeps insertion order", () => {
    const buf = new RingBuffer<number>(3);
    buf.push(1);
    buf.push(2);
    expect(buf.toArray()).toEqual([1, 2]);
    expect(buf.length).toBe(2);
  });

  it("evicts the oldest entry once full", () => {
    const buf = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buf.push(n);
    expect(buf.toArray()).toEqual([3, 4, 5]);
    expect(buf.length).toBe(3);
  });

  it("newest returns the most recent entries newest first", () => {
    const buf = new RingBuffer<string>(10);
    for (const s of ["a", "b", "c", "d"]) buf.push(s);
    expect(buf.newest(2)).toEqual(["d", "c"]);
    expect(buf.newest(10)).toEqual(["d", "c", "b", "a"]);
  });

  it("latest returns the most recent entries oldest first", () => {
    const buf = new RingBuffer<string>(10);
    for (const s of ["a", "b", "c", "d"]) buf.push(s);
    expect(buf.latest(3)).toEqual(["b", "c", "d"]);
  });

  it("returns nothing for a zero count", () => {
    const buf = new RingBuffer<number>(2);
    buf.push(1);
    expect(buf.newest(0)).toEqual([]);
    expect(buf.latest(0)).toEqual([]);
  });

  it("clear empties the buffer", () => {
    const buf = new RingBuffer<number>(2);
    buf.push(1);
    buf.clear();
    expect(buf.length).toBe(0);
    expect(buf.toArray()).toEqual([]);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new RingBuffer(0)).toThrow("positive integer");
  });
});
