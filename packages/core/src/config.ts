/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the fixalg packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: FIXALG_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@fixalg/core";
 *
 * config.get("debug")            // → boolean
 * config.get("checks.bounds")    // → boolean
 *
 * config.set({ format: { precision: 4 } });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Runtime checks that can be switched off for hot loops.
 */
export interface ChecksConfig {
  /** Validate row/column arguments of get, set and index */
  bounds?: boolean;
}

/**
 * Text output of matrices and quaternions.
 */
export interface FormatConfig {
  /** Significant digits; undefined prints the shortest round-trip form */
  precision?: number;
}

/**
 * Full fixalg configuration schema.
 */
export interface FixalgConfig {
  /** Enable debug diagnostics */
  debug?: boolean;
  checks?: ChecksConfig;
  format?: FormatConfig;
  [key: string]: unknown;
}

/**
 * Typed snapshot of the values the numeric code reads on every call.
 */
export interface ResolvedSettings {
  readonly debug: boolean;
  readonly boundsChecks: boolean;
  readonly formatPrecision: number | undefined;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: FixalgConfig = {};
let programmatic: FixalgConfig = {};
let configLoaded = false;
let resolved: ResolvedSettings = resolve({});

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "FIXALG_";

/** Paths whose values are counts, so "1" and "0" stay numbers */
const NUMERIC_PATHS: ReadonlySet<string> = new Set(["format.precision"]);

/**
 * Load configuration from environment variables.
 * Variables prefixed with FIXALG_ are parsed into the config object.
 *
 * Examples:
 *   FIXALG_DEBUG=1              → { debug: true }
 *   FIXALG_CHECKS_BOUNDS=0      → { checks: { bounds: false } }
 *   FIXALG_FORMAT_PRECISION=4   → { format: { precision: 4 } }
 *   FIXALG_FORMAT_PRECISION=1   → { format: { precision: 1 } }
 */
function loadConfigFromEnv(): FixalgConfig {
  const envConfig: FixalgConfig = {};
  if (typeof process === "undefined" || process.env === undefined) {
    return envConfig;
  }

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(configPath, value));
  }

  return envConfig;
}

function parseEnvValue(path: string, value: string): unknown {
  if (NUMERIC_PATHS.has(path) && /^\d+$/.test(value)) return parseInt(value, 10);
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

const defaults: FixalgConfig = {
  debug: false,
  checks: {
    bounds: true,
  },
  format: {},
};

function initializeConfig(): void {
  if (configLoaded) return;

  // defaults < programmatic < env
  configStore = deepMerge(deepMerge(defaults, programmatic), loadConfigFromEnv()) as FixalgConfig;
  resolved = resolve(configStore);
  configLoaded = true;
}

/**
 * Whether a value is a significant-digit count `toPrecision` accepts.
 */
export function isFormatPrecision(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 100;
}

function resolve(store: FixalgConfig): ResolvedSettings {
  const debug = getNestedValue(store, "debug");
  const bounds = getNestedValue(store, "checks.bounds");
  const precision = getNestedValue(store, "format.precision");
  return {
    debug: debug === true,
    boundsChecks: bounds !== false,
    formatPrecision: isFormatPrecision(precision) ? precision : undefined,
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 *
 * The caller names the expected type; values coming from the environment
 * are only as typed as the variable that set them.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 * Environment variables still take precedence.
 */
function set(values: Partial<FixalgConfig>): void {
  programmatic = deepMerge(programmatic, values) as FixalgConfig;
  configLoaded = false;
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<FixalgConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the typed settings snapshot.
 */
function settings(): ResolvedSettings {
  initializeConfig();
  return resolved;
}

/**
 * Reset configuration to defaults (mainly for testing).
 * The environment is read again on next access.
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  settings,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration objects.
 */
export function defineConfig(cfg: FixalgConfig): FixalgConfig {
  return cfg;
}
