import { describe, expect, it } from "vitest";
import {
  identityTransform,
  interpolateTransform,
  lookDirection,
  normalizeQuat,
  type Quat,
  slerp,
} from "../src/math.js";

const HALF = Math.SQRT1_2;
// 90 degrees around +Y
const QUARTER_TURN: Quat = { x: 0, y: HALF, z: 0, w: HALF };

describe("math", () => {
  it("looks down +Z without rotation", () => {
    expect(lookDirection(identityTransform())).toEqual({ x: 0, y: 0, z: 1 });
  });

  it("rotates the look direction", () => {
    const dir = lookDirection({
      position: { x: 0, y: 0, z: 0 },
      rotation: QUARTER_TURN,
    });
    expect(dir.x).toBeCloseTo(1);
    expect(dir.y).toBeCloseTo(0);
    expect(dir.z).toBeCloseTo(0);
  });

  it("interpolates position linearly and rotation spherically", () => {
    const a = identityTransform();
    const b = {
      position: { x: 10, y: -4, z: 2 },
      rotation: QUARTER_TURN,
    };
    const mid = interpolateTransform(a, b, 0.5);

    expect(mid.position).toEqual({ x: 5, y: -2, z: 1 });
    expect(mid.rotation.x).toBeCloseTo(0);
    expect(mid.rotation.y).toBeCloseTo(Math.sin(Math.PI / 8));
    expect(mid.rotation.z).toBeCloseTo(0);
    expect(mid.rotation.w).toBeCloseTo(Math.cos(Math.PI / 8));
  });

  it("returns the endpoints at t = 0 and t = 1", () => {
    const start = slerp({ x: 0, y: 0, z: 0, w: 1 }, QUARTER_TURN, 0);
    const end = slerp({ x: 0, y: 0, z: 0, w: 1 }, QUARTER_TURN, 1);
    expect(start.w).toBeCloseTo(1);
    expect(end.y).toBeCloseTo(HALF);
    expect(end.w).toBeCloseTo(HALF);
  });

  it("takes the shorter arc", () => {
    const negated: Quat = { x: 0, y: -HALF, z: 0, w: -HALF };
    const mid = slerp({ x: 0, y: 0, z: 0, w: 1 }, negated, 0.5);
    expect(mid.w).toBeCloseTo(Math.cos(Math.PI / 8));
  });

  it("normalizes quaternions", () => {
    expect(normalizeQuat({ x: 0, y: 0, z: 0, w: 2 })).toEqual({
      x: 0,
      y: 0,
      z: 0,
      w: 1,
    });
    expect(normalizeQuat({ x: 0, y: 0, z: 0, w: 0 })).toEqual({
      x: 0,
      y: 0,
      z: 0,
      w: 1,
    });
  });
});
