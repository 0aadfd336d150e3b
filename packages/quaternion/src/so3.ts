/**
 * Exponential chart of the rotation group
 *
 * `log` maps a unit quaternion to a pure quaternion (a rotation vector
 * scaled by 1/2) and `exp` maps it back. Interpolation is expressed with
 * the box-plus / box-minus pair `composition` and `difference`:
 *
 * ```
 * composition(p, difference(q, p)) ≈ q
 * slerp(p, q, t) = composition(p, t * difference(q, p))
 * ```
 *
 * A quaternion with a zero vector part (the identity rotation, for one)
 * divides by zero in both `log` and `exp`; the result is NaN.
 */

import { debugWarn } from "@fixalg/core";
import { MatrixOps, VectorOps, elementOf, type Precision } from "@fixalg/matrix";
import { inverse, mul, norm, scale, type Quaternion } from "./quaternion.js";

/**
 * Quaternion logarithm: `(ln |p|, acos(p.q0 / |p|) / |p.qv| * p.qv)`.
 */
export function log<E extends Precision>(p: Quaternion<E>): Quaternion<E> {
  const lq = norm(p);
  const lv = VectorOps.norm(p.qv);
  if (lv === 0) {
    debugWarn("quaternion", "log of a quaternion with zero vector part");
  }
  const a = Math.acos(p.q0 / lq) / lv;
  return {
    q0: elementOf(p.qv).round(Math.log(lq)),
    qv: MatrixOps.scale(p.qv, a),
  };
}

/**
 * Quaternion exponential: `e^p.q0 * (cos |p.qv|, sin |p.qv| / |p.qv| * p.qv)`.
 */
export function exp<E extends Precision>(p: Quaternion<E>): Quaternion<E> {
  const lv = VectorOps.norm(p.qv);
  if (lv === 0) {
    debugWarn("quaternion", "exp of a quaternion with zero vector part");
  }
  const unit: Quaternion<E> = {
    q0: elementOf(p.qv).round(Math.cos(lv)),
    qv: MatrixOps.scale(p.qv, Math.sin(lv) / lv),
  };
  return scale(Math.exp(p.q0), unit);
}

/**
 * `p` raised to a real power: `exp(t * log(p))`.
 */
export function pow<E extends Precision>(p: Quaternion<E>, t: number): Quaternion<E> {
  return exp(scale(t, log(p)));
}

/**
 * Apply the rotation increment `q` to `p`: `p * exp(q / 2)`.
 */
export function composition<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): Quaternion<E> {
  return mul(p, exp(scale<E>(0.5, q)));
}

/**
 * Rotation increment from `q` to `p`: `2 log(q⁻¹ p)`.
 */
export function difference<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>
): Quaternion<E> {
  return scale(2, log(mul(inverse<E>(q), p)));
}

/**
 * Spherical linear interpolation from `p` (`t = 0`) to `q` (`t = 1`).
 */
export function slerp<E extends Precision>(
  p: Quaternion<E>,
  q: NoInfer<Quaternion<E>>,
  t: number
): Quaternion<E> {
  return composition(p, scale(t, difference<E>(q, p)));
}
