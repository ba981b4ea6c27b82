import { describe, it, expect } from "vitest";
import { buildRange, linspace } from "../src/sweep/ranges";

describe("sweep ranges", () => {
  it("linspace includes both ends", () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(linspace(3, 9, 1)).toEqual([3]);
    const xs = linspace(-0.49, 0.99, 100);
    expect(xs).toHaveLength(100);
    expect(xs[0]).toBe(-0.49);
    expect(xs[99]).toBe(0.99);
  });

  it("integer ranges stop before the end", () => {
    expect(buildRange({ kind: "integer", start: 4, stop: 8 })).toEqual([4, 5, 6, 7]);
    expect(buildRange({ kind: "integer", start: 4, stop: 4 })).toEqual([]);
  });

  it("powers of a base", () => {
    expect(buildRange({ kind: "powers", base: 2, startExponent: 0, stopExponent: 5 })).toEqual([1, 2, 4, 8, 16]);
  });

  it("explicit lists are copied", () => {
    const values = [3, 1, 2];
    const out = buildRange({ kind: "list", values });
    expect(out).toEqual([3, 1, 2]);
    expect(out).not.toBe(values);
  });
});
