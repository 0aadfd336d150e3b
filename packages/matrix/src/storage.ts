/**
 * Fixed-size matrix storage
 *
 * A matrix is a typed array branded with its dimensions and element
 * precision. The brands exist at the type level, so shape-mismatched
 * operations fail to compile, and as non-enumerable properties at runtime,
 * so results can be allocated with the shape of their inputs.
 *
 * Entries are stored in column-major order: the entry at row `i`, column `j`
 * lives at flat index `i + j * rows`. The flat index is the typed array's own
 * index, so `m[i]` reads the i-th stored entry.
 *
 * @example
 * ```typescript
 * const m = allocate(2, 3);   // Matrix<2, 3>, zero-filled
 * set(m, 1, 2, 5);
 * m[5];                       // 5 (1 + 2 * 2)
 * ```
 */

import { config, DimensionError, IndexOutOfBoundsError, invariant } from "@fixalg/core";
import { element, type Element, type ElementArrays, type Precision } from "./element.js";

// ============================================================================
// Type Definitions
// ============================================================================

/** Type-level brand for row count */
export interface Rows<N extends number> {
  readonly __rows: N;
}

/** Type-level brand for column count */
export interface Cols<N extends number> {
  readonly __cols: N;
}

/** Type-level brand for element precision */
export interface Elem<E extends Precision> {
  readonly __precision: E;
}

/**
 * Matrix type - branded typed array with dimension and precision tracking.
 * Data is stored in column-major order.
 */
export type Matrix<
  R extends number,
  C extends number,
  E extends Precision = "f64",
> = ElementArrays[E] & Rows<R> & Cols<C> & Elem<E>;

/** A matrix of any shape */
export type AnyMatrix<E extends Precision = Precision> = Matrix<number, number, E>;

// ============================================================================
// Allocation
// ============================================================================

function checkShape(rows: number, cols: number): void {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
    throw new DimensionError(
      `Matrix dimensions must be positive integers, got ${rows}x${cols}`,
      "positive integer dimensions",
      `${rows}x${cols}`
    );
  }
}

/**
 * Attach the runtime shape to a freshly allocated buffer.
 * The buffer must not be shared with another matrix.
 *
 * @throws DimensionError if a dimension is not a positive integer or the
 * buffer doesn't hold exactly `rows * cols` entries
 */
export function brand<R extends number, C extends number, E extends Precision>(
  data: ElementArrays[E],
  rows: R,
  cols: C,
  precision: E
): Matrix<R, C, E> {
  checkShape(rows, cols);
  if (data.length !== rows * cols) {
    throw new DimensionError(
      `Buffer length ${data.length} doesn't match dimensions ${rows}x${cols} (expected ${rows * cols})`,
      `${rows * cols} entries`,
      `${data.length} entries`
    );
  }
  Object.defineProperty(data, "__rows", { value: rows, enumerable: false });
  Object.defineProperty(data, "__cols", { value: cols, enumerable: false });
  Object.defineProperty(data, "__precision", { value: precision, enumerable: false });
  return data as Matrix<R, C, E>;
}

/**
 * Allocate a zero-filled matrix.
 *
 * @throws DimensionError if a dimension is not a positive integer
 */
export function allocate<R extends number, C extends number>(rows: R, cols: C): Matrix<R, C>;
export function allocate<R extends number, C extends number, E extends Precision>(
  rows: R,
  cols: C,
  precision: E
): Matrix<R, C, E>;
export function allocate(rows: number, cols: number, precision: Precision = "f64"): AnyMatrix {
  checkShape(rows, cols);
  return brand(element(precision).alloc(rows * cols), rows, cols, precision);
}

/**
 * Allocate a zero-filled matrix with the precision of `like`.
 */
export function allocateLike<R extends number, C extends number, E extends Precision>(
  like: AnyMatrix<E>,
  rows: R,
  cols: C
): Matrix<R, C, E> {
  return allocate(rows, cols, like.__precision);
}

// ============================================================================
// Runtime Shape Access
// ============================================================================

/** Get the number of rows */
export function rows<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): R {
  return m.__rows;
}

/** Get the number of columns */
export function cols<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): C {
  return m.__cols;
}

/** Get the element precision */
export function precisionOf<E extends Precision>(m: AnyMatrix<E>): E {
  return m.__precision;
}

/** Get the element descriptor */
export function elementOf<E extends Precision>(m: AnyMatrix<E>): Element<E> {
  return element(m.__precision);
}

/** Shape as `"RxC"`, used in error messages */
export function shapeOf(m: AnyMatrix): string {
  return `${m.__rows}x${m.__cols}`;
}

// ============================================================================
// Element Access
// ============================================================================

/**
 * Flat index of (row, col): `row + col * rows`.
 *
 * @throws IndexOutOfBoundsError when bounds checks are enabled and the
 * position lies outside the matrix
 */
export function index<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  row: number,
  col: number
): number {
  if (config.settings().boundsChecks) {
    invariant(
      Number.isInteger(row) &&
        Number.isInteger(col) &&
        row >= 0 &&
        col >= 0 &&
        row < m.__rows &&
        col < m.__cols,
      () => new IndexOutOfBoundsError(row, col, shapeOf(m))
    );
  }
  return row + col * m.__rows;
}

/**
 * Get element at (row, col).
 */
export function get<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  row: number,
  col: number
): number {
  return m[index(m, row, col)];
}

/**
 * Set element at (row, col).
 */
export function set<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  row: number,
  col: number,
  value: number
): Matrix<R, C, E> {
  m[index(m, row, col)] = value;
  return m;
}

// ============================================================================
// Bulk Mutation
// ============================================================================

/**
 * Set every entry to `value`.
 */
export function fill<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>,
  value: number
): Matrix<R, C, E> {
  for (let i = 0; i < m.length; i++) {
    m[i] = value;
  }
  return m;
}

/**
 * Set every entry to zero.
 */
export function zeros<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): Matrix<R, C, E> {
  return fill(m, 0);
}

/**
 * Independent copy with the same shape and precision.
 */
export function clone<R extends number, C extends number, E extends Precision>(
  m: Matrix<R, C, E>
): Matrix<R, C, E> {
  const result = allocateLike(m, m.__rows, m.__cols);
  for (let i = 0; i < m.length; i++) {
    result[i] = m[i];
  }
  return result;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Exact element-wise equality.
 */
export function equals<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>
): boolean {
  if (a.__rows !== b.__rows || a.__cols !== b.__cols) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Negation of {@link equals} */
export function notEquals<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>
): boolean {
  return !equals(a, b);
}

/**
 * Check if two matrices are approximately equal.
 */
export function approxEquals<R extends number, C extends number, E extends Precision>(
  a: Matrix<R, C, E>,
  b: NoInfer<Matrix<R, C, E>>,
  tolerance = 1e-10
): boolean {
  if (a.__rows !== b.__rows || a.__cols !== b.__cols) return false;
  for (let i = 0; i < a.length; i++) {
    if (Math.abs(a[i] - b[i]) > tolerance) return false;
  }
  return true;
}
