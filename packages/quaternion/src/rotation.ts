/**
 * Rotations represented by unit quaternions
 *
 * A unit quaternion `(cos(θ/2), sin(θ/2) n)` rotates by `θ` around the unit
 * axis `n`. None of these functions normalize their input; passing a
 * non-unit quaternion or axis gives a scaled result.
 */

import { debugWarn, invariant } from "@fixalg/core";
import {
  MatrixOps,
  allocateLike,
  crossProduct,
  elementOf,
  normSquared,
  vector3,
  type Matrix,
  type Precision,
  type Vector3,
} from "@fixalg/matrix";
import type { Quaternion } from "./quaternion.js";

export interface AxisAngle<E extends Precision = "f64"> {
  axis: Vector3<E>;
  angle: number;
}

/**
 * Rotation by `angle` radians around a unit `axis`.
 *
 * @example
 * ```typescript
 * const quarterTurn = fromAxisAndAngle(vector3(0, 0, 1), Math.PI / 2);
 * const same = fromAxisAndAngle(0, 0, 1, Math.PI / 2);
 * ```
 */
export function fromAxisAndAngle<E extends Precision>(
  axis: Vector3<E>,
  angle: number
): Quaternion<E>;
export function fromAxisAndAngle(ax: number, ay: number, az: number, angle: number): Quaternion;
export function fromAxisAndAngle<E extends Precision>(
  ax: number,
  ay: number,
  az: number,
  angle: number,
  precision: E
): Quaternion<E>;
export function fromAxisAndAngle(
  axisOrX: Vector3<Precision> | number,
  angleOrY: number,
  az?: number,
  angle?: number,
  precision: Precision = "f64"
): Quaternion<Precision> {
  if (typeof axisOrX !== "number") {
    return rotationAbout(axisOrX, angleOrY);
  }
  invariant(
    az !== undefined && angle !== undefined,
    "fromAxisAndAngle expects an axis vector and an angle, or three axis components and an angle"
  );
  return rotationAbout(vector3(axisOrX, angleOrY, az, precision), angle);
}

function rotationAbout<E extends Precision>(axis: Vector3<E>, angle: number): Quaternion<E> {
  const half = angle / 2;
  return {
    q0: elementOf(axis).round(Math.cos(half)),
    qv: MatrixOps.scale(axis, Math.sin(half)),
  };
}

/**
 * Recover the rotation axis and angle.
 *
 * A scalar part outside `[-1, 1]` yields `((1, 0, 0), 0)`. The identity
 * rotation has no axis: its axis comes back as NaN.
 */
export function getAxisAndAngle<E extends Precision>(q: Quaternion<E>): AxisAngle<E> {
  const c = q.q0 * q.q0;
  if (c > 1) {
    return { axis: vector3(1, 0, 0, q.qv.__precision), angle: 0 };
  }
  if (c === 1) {
    debugWarn("quaternion", "axis of a zero-angle rotation is undefined");
  }
  return {
    axis: MatrixOps.scale(q.qv, 1 / Math.sqrt(1 - c)),
    angle: elementOf(q.qv).round(2 * Math.acos(q.q0)),
  };
}

/**
 * Rotate `v` by the unit quaternion `q`:
 *
 * ```
 * 2 qv (qv · v) - v |qv|² + q0² v + 2 q0 (qv × v)
 * ```
 */
export function transform<E extends Precision>(
  q: Quaternion<E>,
  v: NoInfer<Vector3<E>>
): Vector3<E> {
  const { qv } = q;
  const round = elementOf(qv).round;
  const result = MatrixOps.scale(
    MatrixOps.scale(qv, 2),
    MatrixOps.innerProduct(MatrixOps.transposed(qv), v)
  );
  MatrixOps.subInPlace(result, MatrixOps.scale<3, 1, E>(v, normSquared(qv)));
  MatrixOps.addInPlace(result, MatrixOps.scale<3, 1, E>(v, round(q.q0 * q.q0)));
  MatrixOps.addInPlace(result, MatrixOps.scale(crossProduct(qv, v), 2 * q.q0));
  return result;
}

/**
 * The 3x3 rotation matrix of a unit quaternion: column `j` is the rotated
 * `j`-th basis vector, so `mul(toRotationMatrix(q), v)` agrees with
 * `transform(q, v)`.
 */
export function toRotationMatrix<E extends Precision>(q: Quaternion<E>): Matrix<3, 3, E> {
  const result = allocateLike(q.qv, 3, 3);
  for (let j = 0; j < 3; j++) {
    const basis = allocateLike(q.qv, 3, 1);
    basis[j] = 1;
    const column = transform(q, basis);
    for (let i = 0; i < 3; i++) {
      result[i + j * 3] = column[i];
    }
  }
  return result;
}
