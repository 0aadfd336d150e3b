import { afterEach, describe, expect, it, vi } from "vitest";
import { config } from "@fixalg/core";
import {
  approxEquals,
  equals,
  mul as matMul,
  norm,
  normalized as normalizedVector,
  sub,
  vector3,
} from "@fixalg/matrix";
import {
  equals as quaternionEquals,
  fromAxisAndAngle,
  getAxisAndAngle,
  identity,
  normalized,
  quaternion,
  toRotationMatrix,
  transform,
} from "../src/index.js";

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

const quarterTurn = fromAxisAndAngle(vector3(0, 0, 1), Math.PI / 2);

describe("fromAxisAndAngle", () => {
  it("uses half the angle", () => {
    expect(quarterTurn.q0).toBeCloseTo(Math.SQRT1_2);
    expect(quarterTurn.qv[0]).toBe(0);
    expect(quarterTurn.qv[1]).toBe(0);
    expect(quarterTurn.qv[2]).toBeCloseTo(Math.SQRT1_2);
  });

  it("accepts the axis as three components", () => {
    expect(quaternionEquals(fromAxisAndAngle(0, 0, 1, Math.PI / 2), quarterTurn)).toBe(true);
  });

  it("accepts a precision with the component form", () => {
    expect(fromAxisAndAngle(0, 0, 1, 1, "f32").qv).toBeInstanceOf(Float32Array);
  });
});

describe("getAxisAndAngle", () => {
  it("recovers the axis and angle", () => {
    const { axis, angle } = getAxisAndAngle(fromAxisAndAngle(vector3(0, 0, 1), 1.2));
    expect(angle).toBeCloseTo(1.2, 10);
    expect(axis[0]).toBe(0);
    expect(axis[1]).toBe(0);
    expect(axis[2]).toBeCloseTo(1, 10);
  });

  it("recovers a tilted axis and a small angle to within rounding", () => {
    const axis = normalizedVector(vector3(1, 1, 1));
    const angle = 0.1;
    const out = getAxisAndAngle(fromAxisAndAngle(axis, angle));
    expect(Math.abs(1 - angle / out.angle)).toBeLessThan(2e-14);
    expect(norm(sub(out.axis, axis))).toBeLessThan(2e-14);
  });

  it("falls back to the x axis when the scalar part exceeds one", () => {
    const { axis, angle } = getAxisAndAngle(quaternion(2, 0, 0, 0));
    expect(Array.from(axis)).toEqual([1, 0, 0]);
    expect(angle).toBe(0);
  });

  it("has no axis for the identity rotation", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.set({ debug: true });
    const { axis, angle } = getAxisAndAngle(identity());
    expect(angle).toBe(0);
    expect(Number.isNaN(axis[0])).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      "[fixalg:quaternion] axis of a zero-angle rotation is undefined"
    );
  });
});

describe("transform", () => {
  it("rotates x onto y by a quarter turn around z", () => {
    const v = transform(quarterTurn, vector3(1, 0, 0));
    expect(v[0]).toBeCloseTo(0);
    expect(v[1]).toBeCloseTo(1);
    expect(v[2]).toBeCloseTo(0);
  });

  it("leaves vectors alone under the identity", () => {
    const v = vector3(1, 2, 3);
    expect(equals(transform(identity(), v), v)).toBe(true);
  });

  it("preserves length", () => {
    const q = normalized(quaternion(1, 2, 3, 4));
    const v = vector3(-1, 0.5, 2);
    expect(norm(transform(q, v))).toBeCloseTo(norm(v), 12);
  });

  it("keeps the axis fixed", () => {
    const q = fromAxisAndAngle(vector3(0, 1, 0), 0.7);
    expect(approxEquals(transform(q, vector3(0, 5, 0)), vector3(0, 5, 0), 1e-12)).toBe(true);
  });
});

describe("toRotationMatrix", () => {
  it("has the rotated basis vectors as columns", () => {
    const r = toRotationMatrix(quarterTurn);
    const expected = [0, 1, 0, -1, 0, 0, 0, 0, 1];
    Array.from(r).forEach((value, i) => expect(value).toBeCloseTo(expected[i]));
  });

  it("agrees with transform", () => {
    const q = normalized(quaternion(1, 2, 3, 4));
    const v = vector3(1, 2, 3);
    expect(approxEquals(matMul(toRotationMatrix(q), v), transform(q, v), 1e-12)).toBe(true);
  });
});
