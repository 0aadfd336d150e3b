/**
 * Core module exports for @fixalg/core
 *
 * This package provides:
 * - Configuration (debug mode, bounds checks, number formatting)
 * - Error types for runtime shape violations
 * - Runtime safety primitives (invariant, debugOnly, debugWarn)
 */

export {
  config,
  defineConfig,
  isFormatPrecision,
  type FixalgConfig,
  type ChecksConfig,
  type FormatConfig,
  type ResolvedSettings,
} from "./config.js";

export { DimensionError, IndexOutOfBoundsError } from "./errors.js";

export { invariant, debugOnly, debugWarn } from "./safety.js";
