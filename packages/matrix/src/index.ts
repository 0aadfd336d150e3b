/**
 * @fixalg/matrix - Fixed-size matrices with compile-time dimension checking.
 *
 * Matrices are typed arrays branded with their row count, column count and
 * element precision. Column vectors and 3-vectors are shapes of the same
 * type, so every matrix operation applies to them unchanged.
 *
 * @packageDocumentation
 */

export {
  element,
  f32,
  f64,
  type Element,
  type ElementArrays,
  type Precision,
} from "./element.js";

export type { AnyMatrix, Cols, Elem, Matrix, Rows } from "./storage.js";

export {
  allocate,
  allocateLike,
  approxEquals,
  brand,
  clone,
  cols,
  elementOf,
  equals,
  fill,
  get,
  index,
  notEquals,
  precisionOf,
  rows,
  set,
  shapeOf,
  zeros,
} from "./storage.js";

export {
  add,
  addInPlace,
  col,
  createIdentity,
  filled,
  formatNumber,
  fromRows,
  innerProduct,
  matMul,
  matrix,
  mul,
  negate,
  row,
  scale,
  scaleInPlace,
  sub,
  subInPlace,
  toArray,
  toIdentity,
  toString,
  transposed,
  type FormatOptions,
} from "./matrix.js";

export {
  columnVector,
  dotProduct,
  norm,
  normalize,
  normalized,
  normSquared,
  type ColumnVector,
} from "./column-vector.js";

export {
  crossProduct,
  set as setVector3,
  setX,
  setY,
  setZ,
  vector3,
  x,
  y,
  z,
  type Vector3,
} from "./vector3.js";

export {
  distance,
  innerProductColumnVector,
  isOrthogonal,
  normedColumnVector,
  project,
  vectorSpaceMatrix,
  vSub,
  type InnerProduct,
  type Normed,
  type VectorSpace,
} from "./typeclasses.js";

// Namespaced access, for code that also imports quaternion functions of
// the same names
export * as MatrixOps from "./matrix.js";
export * as VectorOps from "./column-vector.js";
export * as Vector3Ops from "./vector3.js";
