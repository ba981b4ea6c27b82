import type { RangeSpec } from "../config/schema";

/** Evenly spaced, both ends included. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}

export function buildRange(spec: RangeSpec): number[] {
  switch (spec.kind) {
    case "linear":
      return linspace(spec.start, spec.stop, spec.count);
    case "integer": {
      const out: number[] = [];
      for (let i = spec.start; i < spec.stop; i++) out.push(i);
      return out;
    }
    case "powers": {
      const out: number[] = [];
      for (let e = spec.startExponent; e < spec.stopExponent; e++) out.push(spec.base ** e);
      return out;
    }
    case "list":
      return [...spec.values];
  }
}
