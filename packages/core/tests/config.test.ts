import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { config, defineConfig } from "../src/index.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("has debug off and bounds checks on", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("checks.bounds")).toBe(true);
      expect(config.has("checks.bounds")).toBe(true);
    });

    it("resolves a typed snapshot", () => {
      expect(config.settings()).toEqual({
        debug: false,
        boundsChecks: true,
        formatPrecision: undefined,
      });
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("checks.nothing")).toBeUndefined();
      expect(config.get("debug.nested")).toBeUndefined();
    });
  });

  describe("programmatic", () => {
    it("deep merges partial values", () => {
      config.set({ checks: { bounds: false } });
      config.set({ format: { precision: 3 } });
      expect(config.get("checks.bounds")).toBe(false);
      expect(config.get("format.precision")).toBe(3);
      expect(config.get("debug")).toBe(false);
      expect(config.settings().boundsChecks).toBe(false);
      expect(config.settings().formatPrecision).toBe(3);
    });

    it("ignores a non-positive precision in the snapshot", () => {
      config.set({ format: { precision: 0 } });
      expect(config.settings().formatPrecision).toBeUndefined();
    });

    it("ignores a precision toPrecision would reject", () => {
      config.set({ format: { precision: 101 } });
      expect(config.settings().formatPrecision).toBeUndefined();
      config.set({ format: { precision: 2.5 } });
      expect(config.settings().formatPrecision).toBeUndefined();
    });

    it("reset drops programmatic values", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.get("debug")).toBe(false);
    });

    it("defineConfig returns its argument", () => {
      const cfg = defineConfig({ debug: true });
      expect(cfg).toEqual({ debug: true });
    });
  });

  describe("environment", () => {
    it("parses booleans", () => {
      vi.stubEnv("FIXALG_DEBUG", "1");
      vi.stubEnv("FIXALG_CHECKS_BOUNDS", "false");
      config.reset();
      expect(config.get("debug")).toBe(true);
      expect(config.get("checks.bounds")).toBe(false);
    });

    it("parses integers", () => {
      vi.stubEnv("FIXALG_FORMAT_PRECISION", "4");
      config.reset();
      expect(config.get("format.precision")).toBe(4);
      expect(config.settings().formatPrecision).toBe(4);
    });

    it("reads a precision of one as a number", () => {
      vi.stubEnv("FIXALG_FORMAT_PRECISION", "1");
      config.reset();
      expect(config.get("format.precision")).toBe(1);
      expect(config.settings().formatPrecision).toBe(1);
    });

    it("takes precedence over programmatic values", () => {
      vi.stubEnv("FIXALG_DEBUG", "true");
      config.reset();
      config.set({ debug: false });
      expect(config.get("debug")).toBe(true);
    });

    it("keeps other strings as strings", () => {
      vi.stubEnv("FIXALG_LABEL", "lab");
      config.reset();
      expect(config.get("label")).toBe("lab");
    });
  });
});
