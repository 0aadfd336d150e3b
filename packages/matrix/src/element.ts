/**
 * Element precisions
 *
 * Matrices store their entries in a typed array. The precision is carried
 * at the type level so that `f32` and `f64` matrices never mix, and at
 * runtime so that results are allocated with the precision of the inputs.
 */

/** Supported element precisions */
export type Precision = "f64" | "f32";

/** Backing array type of each precision */
export interface ElementArrays {
  f64: Float64Array;
  f32: Float32Array;
}

/**
 * Element descriptor - allocation and scalar rounding for one precision.
 *
 * Scalars computed from entries (dot products, norms) are rounded to the
 * element precision before they are returned. Scaling factors are never
 * rounded: an entry is multiplied by the double factor and stored, which
 * rounds the product once.
 */
export interface Element<E extends Precision> {
  readonly precision: E;
  readonly alloc: (length: number) => ElementArrays[E];
  readonly round: (value: number) => number;
}

/** Double precision (the default) */
export const f64: Element<"f64"> = {
  precision: "f64",
  alloc: (length) => new Float64Array(length),
  round: (value) => value,
};

/** Single precision */
export const f32: Element<"f32"> = {
  precision: "f32",
  alloc: (length) => new Float32Array(length),
  round: Math.fround,
};

/**
 * Look up the descriptor of a precision.
 */
export function element<E extends Precision>(precision: E): Element<E>;
export function element(precision: Precision): Element<Precision> {
  return precision === "f32" ? f32 : f64;
}
