/**
 * Error types for shape violations that reach the runtime.
 *
 * Shape mismatches between typed values are rejected by the type checker;
 * these errors cover the values it cannot see (entry lists of the wrong
 * length, matrices widened to `Matrix<number, number>`, computed indices).
 */

/**
 * Thrown when a matrix is built or combined with dimensions that disagree.
 */
export class DimensionError extends RangeError {
  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(message);
    this.name = "DimensionError";
  }
}

/**
 * Thrown by checked element access when a row or column is out of range.
 */
export class IndexOutOfBoundsError extends RangeError {
  constructor(
    public readonly row: number,
    public readonly col: number,
    public readonly shape: string
  ) {
    super(`Index (${row}, ${col}) is out of bounds for a ${shape} matrix`);
    this.name = "IndexOutOfBoundsError";
  }
}
