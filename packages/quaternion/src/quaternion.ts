/**
 * Quaternion<E> - `q0 + q1 i + q2 j + q3 k`
 *
 * Stored as a scalar part and a 3-vector part. The vector part is a
 * `Vector3<E>`, so all matrix and vector operations apply to it directly,
 * and its precision is the quaternion's precision.
 *
 * @example
 * ```typescript
 * const i = quaternion(0, 1, 0, 0);
 * const j = quaternion(0, 0, 1, 0);
 * toString(mul(i, j));             // "[0;0;0;1;]" - i * j = k
 * ```
 */

import { debugWarn } from "@fixalg/core";
import {
  MatrixOps,
  VectorOps,
  approxEquals as matrixApproxEquals,
  clone as cloneMatrix,
  crossProduct,
  elementOf,
  equals as matrixEquals,
  formatNumber,
  vector3,
  type FormatOptions,
  type Precision,
  type Vector3,
} from "@fixalg/matrix";

export interface Quaternion<E extends Precision = "f64"> {
  /** Scalar part */
  q0: number;
  /** Vector part `(q1, q2, q3)` */
  qv: Vector3<E>;
}

/** Rounds a scalar to the precision of `q` */
function roundFor<E extends Precision>(q: Quaternion<E>): (value: number) => number {
  return elementOf(q.qv).round;
}

// ============================================================================
// Construction & Access
// ============================================================================

/**
 * Create a quaternion from its four components.
 */
export function quaternion(q0: number, q1: number, q2: number, q3: number): Quaternion;
export function quaternion<E extends Precision>(
  q0: number,
  q1: number,
  q2: number,
  q3: number,
  precision: E
): Quaternion<E>;
export function quaternion(
  q0: number,
  q1: number,
  q2: number,
  q3: number,
  precision: Precision = "f64"
): Quaternion<Precision> {
  return fromParts(q0, vector3(q1, q2, q3, precision));
}

/**
 * Create a quaternion from a scalar part and a vector part.
 * The vector is copied.
 */
export function fromParts<E extends Precision>(q0: number, qv: Vector3<E>): Quaternion<E> {
  return { q0: elementOf(qv).round(q0), qv: cloneMatrix(qv) };
}

/**
 * The identity rotation `(1, (0, 0, 0))`.
 */
export function identity(): Quaternion;
export function identity<E extends Precision>(precision: E): Quaternion<E>;
export function identity(precision: Precision = "f64"): Quaternion<Precision> {
  return quaternion(1, 0, 0, 0, precision);
}

export function clone<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  return fromParts(q.q0, q.qv);
}

export function scalar<E extends Precision>(q: Quaternion<E>): number {
  return q.q0;
}

/** Copy of the vector part */
export function vector<E extends Precision>(q: Quaternion<E>): Vector3<E> {
  return cloneMatrix(q.qv);
}

export function q0<E extends Precision>(q: Quaternion<E>): number {
  return q.q0;
}

export function q1<E extends Precision>(q: Quaternion<E>): number {
  return q.qv[0];
}

export function q2<E extends Precision>(q: Quaternion<E>): number {
  return q.qv[1];
}

export function q3<E extends Precision>(q: Quaternion<E>): number {
  return q.qv[2];
}

// ============================================================================
// Conjugation, Norm & Inverse
// ============================================================================

/**
 * Negate the vector part in place. Returns `q`.
 */
export function conjugate<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  MatrixOps.scaleInPlace(q.qv, -1);
  return q;
}

export function conjugated<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  return conjugate(clone(q));
}

/**
 * Four-component dot product: `p.q0 * q.q0 + dot(p.qv, q.qv)`.
 */
export function dotProduct<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): number {
  const round = roundFor(p);
  return round(round(p.q0 * q.q0) + VectorOps.dotProduct(p.qv, q.qv));
}

export function normSquared<E extends Precision>(q: Quaternion<E>): number {
  return dotProduct(q, q);
}

export function norm<E extends Precision>(q: Quaternion<E>): number {
  return roundFor(q)(Math.sqrt(normSquared(q)));
}

/**
 * Scale to unit norm in place. Returns `q`.
 * The zero quaternion becomes NaN in every component.
 */
export function normalize<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  const l = norm(q);
  if (l === 0) {
    debugWarn("quaternion", "normalizing the zero quaternion");
  }
  q.q0 = roundFor(q)(q.q0 / l);
  MatrixOps.scaleInPlace(q.qv, 1 / l);
  return q;
}

export function normalized<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  return normalize(clone(q));
}

/**
 * Multiplicative inverse: `conjugated(q) / normSquared(q)`.
 * Equals the conjugate for unit quaternions.
 */
export function inverse<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  return scale(1 / normSquared(q), conjugated(q));
}

/**
 * Invert in place. Returns `q`.
 */
export function invert<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  conjugate(q);
  const l2 = normSquared(q);
  q.q0 = roundFor(q)(q.q0 / l2);
  MatrixOps.scaleInPlace(q.qv, 1 / l2);
  return q;
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Hamilton product `p * q`.
 *
 * ```
 * q0 = p.q0 * q.q0 - p.qv · q.qv
 * qv = p.q0 * q.qv + q.q0 * p.qv + p.qv × q.qv
 * ```
 */
export function mul<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): Quaternion<E> {
  const round = roundFor(p);
  const scalarPart = round(
    round(p.q0 * q.q0) - MatrixOps.innerProduct(MatrixOps.transposed(p.qv), q.qv)
  );
  const vectorPart = MatrixOps.addInPlace(
    MatrixOps.addInPlace(MatrixOps.scale(q.qv, p.q0), MatrixOps.scale(p.qv, q.q0)),
    crossProduct(p.qv, q.qv)
  );
  return { q0: scalarPart, qv: vectorPart };
}

/**
 * Multiply every component by a double-precision factor.
 */
export function scale<E extends Precision>(factor: number, q: Quaternion<E>): Quaternion<E> {
  return { q0: roundFor(q)(factor * q.q0), qv: MatrixOps.scale(q.qv, factor) };
}

export function add<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): Quaternion<E> {
  return { q0: roundFor(p)(p.q0 + q.q0), qv: MatrixOps.add(p.qv, q.qv) };
}

export function sub<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): Quaternion<E> {
  return { q0: roundFor(p)(p.q0 - q.q0), qv: MatrixOps.sub(p.qv, q.qv) };
}

export function negate<E extends Precision>(q: Quaternion<E>): Quaternion<E> {
  return scale(-1, q);
}

// ============================================================================
// Comparison & Output
// ============================================================================

/** Exact component-wise equality */
export function equals<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): boolean {
  return p.q0 === q.q0 && matrixEquals(p.qv, q.qv);
}

export function approxEquals<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>,
  tolerance = 1e-10
): boolean {
  return Math.abs(p.q0 - q.q0) <= tolerance && matrixApproxEquals(p.qv, q.qv, tolerance);
}

/**
 * Print as `[q0;q1;q2;q3;]`.
 */
export function toString<E extends Precision>(
  q: Quaternion<E>,
  options: FormatOptions = {}
): string {
  const parts = [q.q0, q.qv[0], q.qv[1], q.qv[2]].map((v) => formatNumber(v, options) + ";");
  return "[" + parts.join("") + "]";
}
