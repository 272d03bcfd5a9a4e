// ============================================
// Shared Math Helpers
// Small vector helpers for the simulation and its renderers
// ============================================

/**
 * 3D vector. Y is up; the floor plane is X/Z.
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * 2D vector. On the floor plane, `x` is world X and `y` is world Z.
 */
export interface Vec2 {
  x: number;
  y: number;
}

export function vec3(x = 0, y = 0, z = 0): Vec3 {
  return { x, y, z };
}

export function vec2(x = 0, y = 0): Vec2 {
  return { x, y };
}

export function addVec3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subVec3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scaleVec3(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

/**
 * Length (magnitude) of a 3D vector
 */
export function length3(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/**
 * Distance between two points on the floor plane
 */
export function distance2D(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

const TWO_PI = 2 * Math.PI;

/**
 * Wrap an angle into [-PI, PI). Non-finite input gives NaN.
 */
export function normalizeAngle(angle: number): number {
  return angle - TWO_PI * Math.floor((angle + Math.PI) / TWO_PI);
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
