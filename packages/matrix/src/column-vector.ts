/**
 * ColumnVector<D, E> - a D×1 matrix
 *
 * `ColumnVector<D, E>` is an alias of `Matrix<D, 1, E>`, not a wrapper: every
 * matrix operation accepts a column vector as-is, and a D×1 result of a
 * matrix operation is a column vector.
 *
 * @example
 * ```typescript
 * const v = columnVector(3, [3, 0, 4]);
 * norm(v);                             // 5
 * normalize(v);                        // v is now [0.6, 0, 0.8]
 * dotProduct(v, columnVector(3, [1, 1, 1]));
 * ```
 */

import { debugWarn } from "@fixalg/core";
import type { Precision } from "./element.js";
import { matrix, scaleInPlace } from "./matrix.js";
import { clone, elementOf, type Matrix } from "./storage.js";

/** A column vector with D entries */
export type ColumnVector<D extends number, E extends Precision = "f64"> = Matrix<D, 1, E>;

/**
 * Create a column vector. Without entries it is zero-filled.
 *
 * @throws DimensionError if the entry count differs from `dim`
 */
export function columnVector<D extends number>(
  dim: D,
  entries?: ArrayLike<number>
): ColumnVector<D>;
export function columnVector<D extends number, E extends Precision>(
  dim: D,
  entries: ArrayLike<number> | undefined,
  precision: E
): ColumnVector<D, E>;
export function columnVector(
  dim: number,
  entries?: ArrayLike<number>,
  precision: Precision = "f64"
): ColumnVector<number, Precision> {
  return matrix(dim, 1, entries, precision);
}

/**
 * Sum of `v1[i] * v2[i]`, accumulated from zero.
 * Gives the same value as `mul(transposed(v1), v2)`.
 */
export function dotProduct<D extends number, E extends Precision>(
  v1: ColumnVector<D, E>,
  v2: NoInfer<ColumnVector<D, E>>
): number {
  const { round } = elementOf(v1);
  let result = 0;
  for (let i = 0; i < v1.length; i++) {
    result = round(result + round(v1[i] * v2[i]));
  }
  return result;
}

export function normSquared<D extends number, E extends Precision>(v: ColumnVector<D, E>): number {
  return dotProduct(v, v);
}

/** Euclidean length */
export function norm<D extends number, E extends Precision>(v: ColumnVector<D, E>): number {
  return elementOf(v).round(Math.sqrt(normSquared(v)));
}

/**
 * Scale `v` to unit length in place. Returns `v`.
 *
 * A zero vector divides by zero: every entry becomes NaN.
 */
export function normalize<D extends number, E extends Precision>(
  v: ColumnVector<D, E>
): ColumnVector<D, E> {
  const length = norm(v);
  if (length === 0) {
    debugWarn("matrix", `normalizing a zero-length ${v.__rows}-vector`);
  }
  return scaleInPlace(v, 1 / length);
}

/**
 * Unit-length copy of `v`.
 */
export function normalized<D extends number, E extends Precision>(
  v: ColumnVector<D, E>
): ColumnVector<D, E> {
  return normalize(clone(v));
}
