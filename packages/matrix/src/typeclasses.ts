/**
 * Linear algebra typeclasses
 *
 * Vector spaces, inner product spaces and normed spaces over `number`, with
 * instances for fixed-size matrices and column vectors. Code written
 * against these interfaces works for any shape and precision, and for
 * quaternions (see `@fixalg/quaternion`).
 */

import { dotProduct, norm, type ColumnVector } from "./column-vector.js";
import type { Precision } from "./element.js";
import { add, scale } from "./matrix.js";
import { allocate, type Matrix } from "./storage.js";

/**
 * Vector space over a field F.
 *
 * Laws:
 * - vAdd is associative and commutative
 * - vZero is the identity for vAdd
 * - vScale distributes over vAdd
 * - vScale(1, v) = v
 * - vScale(a, vScale(b, v)) = vScale(a * b, v)
 *
 * @typeclass
 */
export interface VectorSpace<V, F> {
  /** Vector addition */
  readonly vAdd: (a: V, b: V) => V;

  /** Scalar multiplication */
  readonly vScale: (scalar: F, v: V) => V;

  /** Zero vector (additive identity) */
  readonly vZero: () => V;
}

/**
 * Inner product space - a vector space equipped with an inner product.
 *
 * Laws:
 * - dot(a, b) = dot(b, a)
 * - dot(a, vAdd(b, c)) = dot(a, b) + dot(a, c)
 * - dot(vScale(k, a), b) = k * dot(a, b)
 * - dot(a, a) >= 0, and dot(a, a) = 0 iff a = vZero
 *
 * @typeclass
 */
export interface InnerProduct<V, F> extends VectorSpace<V, F> {
  /** Inner product / dot product */
  readonly dot: (a: V, b: V) => F;
}

/**
 * Normed space - a type with a notion of "length".
 *
 * Laws:
 * - norm(v) >= 0
 * - norm(v) = 0 iff v is the zero element
 * - norm(scale(k, v)) = |k| * norm(v)
 * - norm(add(a, b)) <= norm(a) + norm(b)
 *
 * @typeclass
 */
export interface Normed<V, F> {
  /** The norm (length/magnitude) of a vector */
  readonly norm: (v: V) => F;
}

// ============================================================================
// Instances
// ============================================================================

function matrixSpace<R extends number, C extends number, E extends Precision>(
  zero: () => Matrix<R, C, E>
): VectorSpace<Matrix<R, C, E>, number> {
  return {
    vAdd: add,
    vScale: (scalar, v) => scale(v, scalar),
    vZero: zero,
  };
}

/**
 * VectorSpace instance for `rows x cols` matrices.
 */
export function vectorSpaceMatrix<R extends number, C extends number>(
  rows: R,
  cols: C
): VectorSpace<Matrix<R, C>, number>;
export function vectorSpaceMatrix<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  precision: E
): VectorSpace<Matrix<R, C, E>, number>;
export function vectorSpaceMatrix<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  precision?: E
): VectorSpace<Matrix<R, C>, number> | VectorSpace<Matrix<R, C, E>, number> {
  return precision === undefined
    ? matrixSpace(() => allocate(rows, cols))
    : matrixSpace(() => allocate(rows, cols, precision));
}

function columnSpace<D extends number, E extends Precision>(
  zero: () => ColumnVector<D, E>
): InnerProduct<ColumnVector<D, E>, number> {
  return {
    ...matrixSpace(zero),
    dot: dotProduct,
  };
}

/**
 * InnerProduct instance for column vectors (Euclidean dot product).
 */
export function innerProductColumnVector<D extends number>(
  dim: D
): InnerProduct<ColumnVector<D>, number>;
export function innerProductColumnVector<D extends number, E extends Precision>(
  dim: D,
  precision: E
): InnerProduct<ColumnVector<D, E>, number>;
export function innerProductColumnVector<D extends number, E extends Precision>(
  dim: D,
  precision?: E
): InnerProduct<ColumnVector<D>, number> | InnerProduct<ColumnVector<D, E>, number> {
  return precision === undefined
    ? columnSpace(() => allocate(dim, 1))
    : columnSpace(() => allocate(dim, 1, precision));
}

/**
 * Normed instance for column vectors of any dimension (Euclidean norm).
 */
export const normedColumnVector: Normed<ColumnVector<number, Precision>, number> = {
  norm,
};

// ============================================================================
// Derived operations
// ============================================================================

/**
 * Subtract two vectors: a - b = a + scale(-1, b)
 */
export function vSub<V>(VS: VectorSpace<V, number>): (a: V, b: V) => V {
  return (a, b) => VS.vAdd(a, VS.vScale(-1, b));
}

/**
 * Compute the distance between two vectors.
 */
export function distance<V>(IP: InnerProduct<V, number>): (a: V, b: V) => number {
  const sub = vSub(IP);
  return (a, b) => {
    const diff = sub(a, b);
    return Math.sqrt(IP.dot(diff, diff));
  };
}

/**
 * Check if two vectors are orthogonal (perpendicular), up to `tolerance`.
 */
export function isOrthogonal<V>(
  IP: InnerProduct<V, number>,
  tolerance = 0
): (a: V, b: V) => boolean {
  return (a, b) => Math.abs(IP.dot(a, b)) <= tolerance;
}

/**
 * Project vector a onto vector b.
 * Projecting onto the zero vector gives the zero vector.
 */
export function project<V>(IP: InnerProduct<V, number>): (a: V, b: V) => V {
  return (a, b) => {
    const dotAB = IP.dot(a, b);
    const dotBB = IP.dot(b, b);
    if (dotBB === 0) return IP.vZero();
    return IP.vScale(dotAB / dotBB, b);
  };
}
