/**
 * Matrix<R, C, E> - Type-safe fixed-size matrices
 *
 * Row and column counts are literal types, so dimension-mismatched
 * operations are caught at compile time:
 *
 * @example
 * ```typescript
 * const a = matrix(2, 3, [1, 2, 3, 4, 5, 6]);  // 2x3, column-major entries
 * const b = matrix(3, 2, [1, 2, 3, 4, 5, 6]);  // 3x2
 * const c = mul(a, b);                         // Matrix<2, 2>
 * // mul(a, a) fails to compile - inner dimensions differ
 *
 * const row = transposed(matrix(3, 1, [1, 2, 3]));
 * mul(row, matrix(3, 1, [4, 5, 6]));           // 32 - a plain number
 * ```
 */

import { config, DimensionError, isFormatPrecision } from "@fixalg/core";
import type { Precision } from "./element.js";
import {
  allocate,
  allocateLike,
  clone,
  elementOf,
  fill,
  index,
  shapeOf,
  type AnyMatrix,
  type Matrix,
} from "./storage.js";

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a matrix from dimensions and column-major entries.
 * Without entries the matrix is zero-filled.
 *
 * @throws DimensionError if the entry count doesn't match the dimensions
 */
export function matrix<R extends number, C extends number>(
  rows: R,
  cols: C,
  entries?: ArrayLike<number>
): Matrix<R, C>;
export function matrix<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  entries: ArrayLike<number> | undefined,
  precision: E
): Matrix<R, C, E>;
export function matrix(
  rows: number,
  cols: number,
  entries?: ArrayLike<number>,
  precision: Precision = "f64"
): AnyMatrix {
  const result = allocate(rows, cols, precision);
  if (entries === undefined) {
    return result;
  }
  if (entries.length !== result.length) {
    throw new DimensionError(
      `Matrix data length ${entries.length} doesn't match dimensions ${rows}x${cols} (expected ${result.length})`,
      `${result.length} entries`,
      `${entries.length} entries`
    );
  }
  for (let i = 0; i < entries.length; i++) {
    result[i] = entries[i];
  }
  return result;
}

/**
 * Create a matrix with every entry set to `value`.
 */
export function filled<R extends number, C extends number>(
  rows: R,
  cols: C,
  value: number
): Matrix<R, C>;
export function filled<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  value: number,
  precision: E
): Matrix<R, C, E>;
export function filled(
  rows: number,
  cols: number,
  value: number,
  precision: Precision = "f64"
): AnyMatrix {
  return fill(allocate(rows, cols, precision), value);
}

/**
 * Create a matrix from row arrays (row-major, the way matrices are written
 * on paper). Storage is still column-major.
 *
 * @throws DimensionError if the rows don't form a `rows x cols` block
 */
export function fromRows<R extends number, C extends number>(
  rows: R,
  cols: C,
  data: readonly (readonly number[])[]
): Matrix<R, C>;
export function fromRows<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  data: readonly (readonly number[])[],
  precision: E
): Matrix<R, C, E>;
export function fromRows(
  rows: number,
  cols: number,
  data: readonly (readonly number[])[],
  precision: Precision = "f64"
): AnyMatrix {
  if (data.length !== rows || data.some((r) => r.length !== cols)) {
    throw new DimensionError(
      `Row data doesn't form a ${rows}x${cols} matrix`,
      `${rows}x${cols}`,
      data.map((r) => r.length).join("/") || "0 rows"
    );
  }
  const result = allocate(rows, cols, precision);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      result[i + j * rows] = data[i][j];
    }
  }
  return result;
}

/**
 * Create an identity matrix: zeros except `(i, i) = 1` for
 * `i < min(rows, cols)`. Defined for non-square shapes as well.
 */
export function createIdentity<R extends number, C extends number>(
  rows: R,
  cols: C
): Matrix<R, C>;
export function createIdentity<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  precision: E
): Matrix<R, C, E>;
export function createIdentity(rows: number, cols: number, precision: Precision = "f64"): AnyMatrix {
  return toIdentity(allocate(rows, cols, precision));
}

// ============================================================================
// Basic Operations
// ============================================================================

/**
 * Set a matrix to identity in place. Returns `m` for chaining.
 */
export function toIdentity<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): Matrix<R, C, E> {
  fill(m, 0);
  const smaller = Math.min(m.__rows, m.__cols);
  for (let i = 0; i < smaller; i++) {
    m[i + i * m.__rows] = 1;
  }
  return m;
}

/**
 * Transpose a matrix: `result(j, i) = m(i, j)`.
 */
export function transposed<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): Matrix<C, R, E> {
  const r = m.__rows;
  const c = m.__cols;
  const result = allocateLike(m, c, r);
  for (let i = 0; i < r; i++) {
    for (let j = 0; j < c; j++) {
      result[j + i * c] = m[i + j * r];
    }
  }
  return result;
}

function checkSameShape(op: string, a: AnyMatrix, b: AnyMatrix): void {
  if (a.__rows !== b.__rows || a.__cols !== b.__cols) {
    throw new DimensionError(
      `Matrix ${op} dimension mismatch: ${shapeOf(a)} and ${shapeOf(b)}`,
      shapeOf(a),
      shapeOf(b)
    );
  }
}

// ============================================================================
// Compound Assignment
// ============================================================================

/**
 * Element-wise `a += b`. Returns `a`.
 */
export function addInPlace<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>
): Matrix<R, C, E> {
  checkSameShape("addition", a, b);
  for (let i = 0; i < a.length; i++) {
    a[i] += b[i];
  }
  return a;
}

/**
 * Element-wise `a -= b`. Returns `a`.
 */
export function subInPlace<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>
): Matrix<R, C, E> {
  checkSameShape("subtraction", a, b);
  for (let i = 0; i < a.length; i++) {
    a[i] -= b[i];
  }
  return a;
}

/**
 * Scale every entry by a double-precision factor. Returns `m`.
 *
 * The factor is a plain `number` whatever the element precision; `f32`
 * storage rounds each product once when it is stored.
 */
export function scaleInPlace<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  factor: number
): Matrix<R, C, E> {
  for (let i = 0; i < m.length; i++) {
    m[i] *= factor;
  }
  return m;
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Element-wise addition.
 */
export function add<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>
): Matrix<R, C, E> {
  return addInPlace(clone(a), b);
}

/**
 * Element-wise subtraction.
 */
export function sub<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>
): Matrix<R, C, E> {
  return subInPlace(clone(a), b);
}

/**
 * Scalar multiplication.
 */
export function scale<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  factor: number
): Matrix<R, C, E> {
  return scaleInPlace(clone(m), factor);
}

/**
 * Negate all elements (`-1 * m`).
 */
export function negate<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): Matrix<R, C, E> {
  return scale(m, -1);
}

// ============================================================================
// Products
// ============================================================================

function product<M extends number, P extends number, E extends Precision>(
  a: Matrix<M, number, E>,
  b: Matrix<number, P, E>
): Matrix<M, P, E> {
  const m = a.__rows;
  const n = a.__cols;
  const p = b.__cols;

  // Runtime dimension check (type system handles static check)
  if (n !== b.__rows) {
    throw new DimensionError(
      `Matrix multiplication dimension mismatch: ${shapeOf(a)} * ${shapeOf(b)}`,
      `${n}x${p}`,
      shapeOf(b)
    );
  }

  const result = allocateLike(a, m, p);
  for (let i = 0; i < m; i++) {
    for (let j = 0; j < p; j++) {
      for (let k = 0; k < n; k++) {
        result[i + j * m] += a[i + k * m] * b[k + j * n];
      }
    }
  }
  return result;
}

function scalarProduct<E extends Precision>(a: AnyMatrix<E>, b: AnyMatrix<E>): number {
  if (a.__rows !== 1 || b.__cols !== 1 || a.__cols !== b.__rows) {
    throw new DimensionError(
      `Inner product needs a 1xN and an Nx1 matrix, got ${shapeOf(a)} and ${shapeOf(b)}`,
      `1x${a.__cols} * ${a.__cols}x1`,
      `${shapeOf(a)} * ${shapeOf(b)}`
    );
  }
  const { round } = elementOf(a);
  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result = round(result + round(a[i] * b[i]));
  }
  return result;
}

/**
 * Matrix multiplication.
 * The inner dimensions must match: (M×N) × (N×P) → (M×P).
 * Always returns a matrix, a 1×1 one included.
 */
export function matMul<M extends number, N extends number, P extends number, E extends Precision>(
  a: Matrix<M, N, E>,
  b: Matrix<NoInfer<N>, P, NoInfer<E>>
): Matrix<M, P, E> {
  return product<M, P, E>(a, b);
}

/**
 * Product of a row and a column: (1×N) × (N×1) → scalar.
 */
export function innerProduct<N extends number, E extends Precision>(
  a: Matrix<1, N, E>,
  b: NoInfer<Matrix<N, 1, E>>
): number {
  return scalarProduct(a, b);
}

/**
 * Multiplication at one call syntax, resolved by the static shapes:
 *
 * - `mul(factor, m)` / `mul(m, factor)` - scaled copy
 * - `mul(row, column)` with (1×N) × (N×1) - a plain number
 * - `mul(a, b)` with (M×N) × (N×P) - the matrix product
 *
 * At runtime the operands' stored shapes select the same branch. Generic
 * code whose shapes are type parameters should call {@link matMul}, which
 * never degenerates to a scalar.
 */
export function mul<R extends number, C extends number, E extends Precision>(
  factor: number,
  m: Matrix<R, C, E>
): Matrix<R, C, E>;
export function mul<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  factor: number
): Matrix<R, C, E>;
export function mul<N extends number, E extends Precision>(
  a: Matrix<1, N, E>,
  b: NoInfer<Matrix<N, 1, E>>
): number;
export function mul<M extends number, N extends number, P extends number, E extends Precision>(
  a: Matrix<M, N, E>,
  b: Matrix<NoInfer<N>, P, NoInfer<E>>
): Matrix<M, P, E>;
export function mul(a: number | AnyMatrix, b: number | AnyMatrix): number | AnyMatrix {
  if (typeof a === "number") {
    return typeof b === "number" ? a * b : scale(b, a);
  }
  if (typeof b === "number") {
    return scale(a, b);
  }
  if (a.__rows === 1 && b.__cols === 1) {
    return scalarProduct(a, b);
  }
  return product(a, b);
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Get a row as an array.
 *
 * @throws IndexOutOfBoundsError when bounds checks are enabled and `i` is
 * not a row of `m`
 */
export function row<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  i: number
): number[] {
  const result: number[] = [];
  for (let j = 0; j < m.__cols; j++) {
    result.push(m[index(m, i, j)]);
  }
  return result;
}

/**
 * Get a column as an array.
 *
 * @throws IndexOutOfBoundsError when bounds checks are enabled and `j` is
 * not a column of `m`
 */
export function col<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  j: number
): number[] {
  const result: number[] = [];
  for (let i = 0; i < m.__rows; i++) {
    result.push(m[index(m, i, j)]);
  }
  return result;
}

/**
 * Convert matrix to a row-major 2D array.
 */
export function toArray<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): number[][] {
  const result: number[][] = [];
  for (let i = 0; i < m.__rows; i++) {
    result.push(row(m, i));
  }
  return result;
}

export interface FormatOptions {
  /**
   * Significant digits, an integer from 1 to 100; defaults to
   * `format.precision` from the config. Other values print the shortest form.
   */
  precision?: number;
}

/**
 * Format one number for text output. Trailing zeros are dropped.
 */
export function formatNumber(value: number, options: FormatOptions = {}): string {
  const precision = options.precision ?? config.settings().formatPrecision;
  if (!isFormatPrecision(precision) || !Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(precision)));
}

/**
 * Print a matrix as `[a b; c d;]` - rows in order, each terminated by `;`.
 * Debugging output, not a parseable format.
 */
export function toString<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  options: FormatOptions = {}
): string {
  const lines = toArray(m).map((r) => r.map((v) => formatNumber(v, options)).join(" ") + ";");
  return "[" + lines.join(" ") + "]";
}
