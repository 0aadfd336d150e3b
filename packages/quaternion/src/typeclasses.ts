/**
 * Quaternions as a 4-dimensional inner product space, so the generic
 * helpers of `@fixalg/matrix` (distance, projection, orthogonality) apply.
 */

import type { InnerProduct, Normed, Precision } from "@fixalg/matrix";
import { add, dotProduct, norm, quaternion, scale, type Quaternion } from "./quaternion.js";

function quaternionSpace<E extends Precision>(
  zero: () => Quaternion<E>
): InnerProduct<Quaternion<E>, number> {
  return {
    vAdd: add,
    vScale: scale,
    vZero: zero,
    dot: dotProduct,
  };
}

/**
 * InnerProduct instance for quaternions (four-component dot product).
 */
export function innerProductQuaternion(): InnerProduct<Quaternion, number>;
export function innerProductQuaternion<E extends Precision>(
  precision: E
): InnerProduct<Quaternion<E>, number>;
export function innerProductQuaternion<E extends Precision>(
  precision?: E
): InnerProduct<Quaternion, number> | InnerProduct<Quaternion<E>, number> {
  return precision === undefined
    ? quaternionSpace(() => quaternion(0, 0, 0, 0))
    : quaternionSpace(() => quaternion(0, 0, 0, 0, precision));
}

export const normedQuaternion: Normed<Quaternion<Precision>, number> = {
  norm,
};
