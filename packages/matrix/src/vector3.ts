/**
 * Vector3<E> - 3D column vectors
 *
 * A `Vector3` is a `ColumnVector<3>`, and so a `Matrix<3, 1>`. This module
 * adds named component access and the cross product.
 */

import type { ColumnVector } from "./column-vector.js";
import type { Precision } from "./element.js";
import { matrix } from "./matrix.js";
import { allocateLike } from "./storage.js";

export type Vector3<E extends Precision = "f64"> = ColumnVector<3, E>;

/**
 * Create a 3D vector.
 */
export function vector3(x: number, y: number, z: number): Vector3;
export function vector3<E extends Precision>(
  x: number,
  y: number,
  z: number,
  precision: E
): Vector3<E>;
export function vector3(
  x: number,
  y: number,
  z: number,
  precision: Precision = "f64"
): Vector3<Precision> {
  return matrix(3, 1, [x, y, z], precision);
}

// ============================================================================
// Components
// ============================================================================

export function x<E extends Precision>(v: Vector3<E>): number {
  return v[0];
}

export function y<E extends Precision>(v: Vector3<E>): number {
  return v[1];
}

export function z<E extends Precision>(v: Vector3<E>): number {
  return v[2];
}

export function setX<E extends Precision>(v: Vector3<E>, value: number): Vector3<E> {
  v[0] = value;
  return v;
}

export function setY<E extends Precision>(v: Vector3<E>, value: number): Vector3<E> {
  v[1] = value;
  return v;
}

export function setZ<E extends Precision>(v: Vector3<E>, value: number): Vector3<E> {
  v[2] = value;
  return v;
}

/**
 * Set all three components. Returns `v`.
 */
export function set<E extends Precision>(
  v: Vector3<E>,
  x: number,
  y: number,
  z: number
): Vector3<E> {
  v[0] = x;
  v[1] = y;
  v[2] = z;
  return v;
}

// ============================================================================
// Cross Product
// ============================================================================

/**
 * Cross product (3D only).
 *
 * `a × b = (ay*bz - az*by, az*bx - ax*bz, ax*by - ay*bx)`
 */
export function crossProduct<E extends Precision>(
  a: Vector3<E>,
  b: NoInfer<Vector3<E>>
): Vector3<E> {
  const result = allocateLike(a, 3, 1);
  result[0] = a[1] * b[2] - a[2] * b[1];
  result[1] = a[2] * b[0] - a[0] * b[2];
  result[2] = a[0] * b[1] - a[1] * b[0];
  return result;
}
