/**
 * @fixalg/quaternion - Quaternion algebra and 3D rotations.
 *
 * Quaternions pair a scalar with a `Vector3` from `@fixalg/matrix`, and
 * share its element precisions.
 *
 * @packageDocumentation
 */

export {
  add,
  approxEquals,
  clone,
  conjugate,
  conjugated,
  dotProduct,
  equals,
  fromParts,
  identity,
  inverse,
  invert,
  mul,
  negate,
  norm,
  normalize,
  normalized,
  normSquared,
  q0,
  q1,
  q2,
  q3,
  quaternion,
  scalar,
  scale,
  sub,
  toString,
  vector,
  type Quaternion,
} from "./quaternion.js";

export {
  fromAxisAndAngle,
  getAxisAndAngle,
  toRotationMatrix,
  transform,
  type AxisAngle,
} from "./rotation.js";

export { composition, difference, exp, log, pow, slerp } from "./so3.js";

export { innerProductQuaternion, normedQuaternion } from "./typeclasses.js";
