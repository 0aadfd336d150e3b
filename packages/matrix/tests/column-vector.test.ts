import { afterEach, describe, expect, expectTypeOf, it, vi } from "vitest";
import { config, DimensionError } from "@fixalg/core";
import {
  columnVector,
  dotProduct,
  filled,
  matMul,
  mul,
  norm,
  normalize,
  normalized,
  normSquared,
  scale,
  transposed,
  type ColumnVector,
  type Matrix,
} from "../src/index.js";

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

describe("columnVector", () => {
  it("is a D x 1 matrix", () => {
    const v = columnVector(3, [1, 2, 3]);
    expectTypeOf(v).toEqualTypeOf<Matrix<3, 1>>();
    expectTypeOf<ColumnVector<3>>().toEqualTypeOf<Matrix<3, 1>>();
    expect(Array.from(v)).toEqual([1, 2, 3]);
  });

  it("rejects a wrong entry count", () => {
    expect(() => columnVector(3, [1, 2])).toThrow(DimensionError);
  });

  it("accepts every matrix operation", () => {
    const v = scale(columnVector(2, [1, 2]), 2);
    expect(Array.from(v)).toEqual([2, 4]);
    const m = matMul(filled(2, 2, 1), v);
    expectTypeOf(m).toEqualTypeOf<ColumnVector<2>>();
    expect(Array.from(m)).toEqual([6, 6]);
  });
});

describe("dotProduct", () => {
  const v1 = columnVector(4, [1, 2, 3, 4]);
  const v2 = columnVector(4, [5, 6, 7, 8]);

  it("sums the entry-wise products", () => {
    expect(dotProduct(v1, v2)).toBe(70);
  });

  it("agrees with the row-times-column product", () => {
    expect(dotProduct(v1, v2)).toBe(mul(transposed(v1), v2));
  });

  it("rounds to the element precision", () => {
    const a = columnVector(2, [0.1, 0.2], "f32");
    const expected = Math.fround(
      Math.fround(Math.fround(0.1) * Math.fround(0.1)) +
        Math.fround(Math.fround(0.2) * Math.fround(0.2))
    );
    expect(dotProduct(a, a)).toBe(expected);
    expect(mul(transposed(a), a)).toBe(expected);
  });

  it("rejects vectors of different dimension", () => {
    // @ts-expect-error - 4 and 3 entries
    dotProduct(v1, columnVector(3));
  });
});

describe("norm", () => {
  it("is the square root of normSquared", () => {
    const v = columnVector(3, [3, 0, 4]);
    expect(normSquared(v)).toBe(25);
    expect(norm(v)).toBe(5);
  });

  it("of a 4-vector of threes is sqrt(36)", () => {
    expect(norm(filled(4, 1, 3))).toBe(Math.sqrt(36));
  });
});

describe("normalize", () => {
  it("scales to unit length in place", () => {
    const v = filled(4, 1, 3);
    expect(normalize(v)).toBe(v);
    expect(Array.from(v)).toEqual([0.5, 0.5, 0.5, 0.5]);
    expect(norm(v)).toBe(1);
  });

  it("normalized returns a copy", () => {
    const v = columnVector(3, [3, 0, 4]);
    const u = normalized(v);
    expect(Array.from(v)).toEqual([3, 0, 4]);
    expect(u[0]).toBeCloseTo(0.6);
    expect(u[2]).toBeCloseTo(0.8);
    expect(norm(u)).toBeCloseTo(1);
  });

  it("turns a zero vector into NaN entries", () => {
    const v = normalize(columnVector(2));
    expect(Number.isNaN(v[0])).toBe(true);
    expect(Number.isNaN(v[1])).toBe(true);
  });

  it("warns about a zero vector in debug mode", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ debug: true });
    normalize(columnVector(2));
    expect(warn).toHaveBeenCalledWith("[fixalg:matrix] normalizing a zero-length 2-vector");
  });
});
