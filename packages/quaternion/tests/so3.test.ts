import { afterEach, describe, expect, it, vi } from "vitest";
import { config } from "@fixalg/core";
import { vector3 } from "@fixalg/matrix";
import {
  approxEquals,
  composition,
  difference,
  equals,
  exp,
  fromAxisAndAngle,
  identity,
  inverse,
  log,
  mul,
  normalize,
  normalized,
  pow,
  quaternion,
  scale,
  slerp,
  transform,
} from "../src/index.js";

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

const q = normalized(quaternion(1, 2, 3, 4));
const rotZ = (angle: number) => fromAxisAndAngle(vector3(0, 0, 1), angle);

describe("log and exp", () => {
  it("log of a unit quaternion is pure", () => {
    expect(log(q).q0).toBeCloseTo(0, 12);
  });

  it("log of a rotation is half its rotation vector", () => {
    const l = log(rotZ(1));
    expect(l.qv[2]).toBeCloseTo(0.5, 12);
  });

  it("exp inverts log", () => {
    expect(approxEquals(exp(log(q)), q, 1e-12)).toBe(true);
  });

  it("exp scales by e to the scalar part", () => {
    const e = exp(quaternion(1, 0, 0, Math.PI / 2));
    expect(e.q0).toBeCloseTo(0, 12);
    expect(e.qv[2]).toBeCloseTo(Math.E, 12);
  });

  it("propagates NaN for a zero vector part", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ debug: true });
    const l = log(identity());
    expect(l.q0).toBe(0);
    expect(Number.isNaN(l.qv[0])).toBe(true);
    const e = exp(quaternion(0, 0, 0, 0));
    expect(e.q0).toBe(1);
    expect(Number.isNaN(e.qv[0])).toBe(true);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe("pow", () => {
  it("pow(q, 1) is q", () => {
    expect(approxEquals(pow(q, 1), q, 1e-12)).toBe(true);
  });

  it("square roots multiply back", () => {
    const root = pow(q, 0.5);
    expect(approxEquals(mul(root, root), q, 1e-12)).toBe(true);
  });

  it("scales the rotation angle", () => {
    expect(approxEquals(pow(rotZ(0.8), 0.25), rotZ(0.2), 1e-12)).toBe(true);
  });
});

describe("composition and difference", () => {
  const p = rotZ(0.3);
  const target = normalized(quaternion(2, -1, 0.5, 1));

  it("composition undoes difference", () => {
    expect(approxEquals(composition(p, difference(target, p)), target, 1e-12)).toBe(true);
  });

  it("difference is twice the log of the relative rotation", () => {
    const d = difference(target, p);
    const expected = scale(2, log(mul(inverse(p), target)));
    expect(equals(d, expected)).toBe(true);
  });
});

describe("slerp", () => {
  const p = normalized(quaternion(1, 0.2, -0.4, 0.1));

  it("equals p * (p⁻¹ q)^t", () => {
    expect(equals(slerp(p, q, 0.5), mul(p, pow(mul(inverse(p), q), 0.5)))).toBe(true);
  });

  it("reaches q at t = 1", () => {
    expect(approxEquals(slerp(p, q, 1), q, 1e-12)).toBe(true);
  });

  it("interpolates the angle of rotations about one axis", () => {
    expect(approxEquals(slerp(identity(), rotZ(1), 0.5), rotZ(0.5), 1e-12)).toBe(true);
    expect(approxEquals(slerp(rotZ(0.2), rotZ(1), 0.25), rotZ(0.4), 1e-12)).toBe(true);
  });
});

describe("integrating a constant angular velocity", () => {
  it("returns to the start after ten full turns", () => {
    const omega = vector3(2 * Math.PI, 0, 0);
    const dt = 0.1;
    let x = vector3(0, 1, 0);
    for (let step = 0; step < 100; step++) {
      const increment = exp(scale(0.5, quaternion(0, omega[0] * dt, 0, 0)));
      const qr = normalize(mul(identity(), increment));
      x = transform(qr, x);
    }
    expect(Math.abs(x[0])).toBe(0);
    expect(Math.abs(1 - 1 / x[1])).toBeLessThan(2e-14);
    expect(x[2]).toBeLessThan(2e-15);
  });
});
