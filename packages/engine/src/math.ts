import { z } from "zod";

// ---- Schemas ----
// Values arriving through a capability call are plain decoded JSON; these
// schemas give them back their shape.

export const vec2Schema = z.object({ x: z.number(), y: z.number() });
export const vec3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});
export const quatSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
  w: z.number(),
});
export const transformSchema = z.object({
  position: vec3Schema,
  rotation: quatSchema,
});

export type Vec2 = z.infer<typeof vec2Schema>;
export type Vec3 = z.infer<typeof vec3Schema>;
export type Quat = z.infer<typeof quatSchema>;

/** A location and orientation in 3D space. */
export type Transform = z.infer<typeof transformSchema>;

export const VEC2_ZERO: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });
export const VEC3_ZERO: Readonly<Vec3> = Object.freeze({ x: 0, y: 0, z: 0 });
export const QUAT_IDENTITY: Readonly<Quat> = Object.freeze({
  x: 0,
  y: 0,
  z: 0,
  w: 1,
});

export function identityTransform(): Transform {
  return { position: { ...VEC3_ZERO }, rotation: { ...QUAT_IDENTITY } };
}

// ---- Vectors ----

export function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

// ---- Quaternions ----

function dot(a: Quat, b: Quat): number {
  return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
}

export function normalizeQuat(q: Quat): Quat {
  const len = Math.sqrt(dot(q, q));
  if (len === 0) return { ...QUAT_IDENTITY };
  return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

/** Spherical interpolation along the shortest arc. */
export function slerp(a: Quat, b: Quat, t: number): Quat {
  let cos = dot(a, b);
  let end = b;
  if (cos < 0) {
    cos = -cos;
    end = { x: -b.x, y: -b.y, z: -b.z, w: -b.w };
  }

  // Nearly parallel: fall back to a normalized lerp.
  if (cos > 0.9995) {
    return normalizeQuat({
      x: a.x + (end.x - a.x) * t,
      y: a.y + (end.y - a.y) * t,
      z: a.z + (end.z - a.z) * t,
      w: a.w + (end.w - a.w) * t,
    });
  }

  const theta0 = Math.acos(cos);
  const theta = theta0 * t;
  const sin0 = Math.sin(theta0);
  const s0 = Math.cos(theta) - (cos * Math.sin(theta)) / sin0;
  const s1 = Math.sin(theta) / sin0;
  return {
    x: s0 * a.x + s1 * end.x,
    y: s0 * a.y + s1 * end.y,
    z: s0 * a.z + s1 * end.z,
    w: s0 * a.w + s1 * end.w,
  };
}

/** Rotate `v` by the unit quaternion `q`. */
export function rotateVec3(q: Quat, v: Vec3): Vec3 {
  // t = 2 * (q.xyz x v); v' = v + w * t + q.xyz x t
  const tx = 2 * (q.y * v.z - q.z * v.y);
  const ty = 2 * (q.z * v.x - q.x * v.z);
  const tz = 2 * (q.x * v.y - q.y * v.x);
  return {
    x: v.x + q.w * tx + (q.y * tz - q.z * ty),
    y: v.y + q.w * ty + (q.z * tx - q.x * tz),
    z: v.z + q.w * tz + (q.x * ty - q.y * tx),
  };
}

// ---- Transforms ----

/**
 * Interpolates between two transforms: `a` at `t = 0`, `b` at `t = 1`.
 */
export function interpolateTransform(
  a: Transform,
  b: Transform,
  t: number,
): Transform {
  return {
    position: lerpVec3(a.position, b.position, t),
    rotation: slerp(a.rotation, b.rotation, t),
  };
}

/** Front-facing direction (+Z rotated) of a transform. */
export function lookDirection(transform: Transform): Vec3 {
  return rotateVec3(transform.rotation, { x: 0, y: 0, z: 1 });
}
