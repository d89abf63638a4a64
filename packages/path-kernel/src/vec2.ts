/** Minimal 2D vectors — plain tuples for speed, helpers for clarity. */
export type Vec2 = readonly [number, number];

/** Machine-space point with the (unused) Z carried for labels. */
export type Vec3 = readonly [number, number, number];

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(a: Vec2, s: number): Vec2 {
  return [a[0] * s, a[1] * s];
}

export function dot(a: Vec2, b: Vec2): number {
  return a[0] * b[0] + a[1] * b[1];
}

/** Z component of the 3D cross product. Positive when b turns left of a. */
export function cross(a: Vec2, b: Vec2): number {
  return a[0] * b[1] - a[1] * b[0];
}

export function length(a: Vec2): number {
  return Math.hypot(a[0], a[1]);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(b[0] - a[0], b[1] - a[1]);
}

export function normalize(a: Vec2): Vec2 {
  const l = length(a);
  return l > 0 ? [a[0] / l, a[1] / l] : [0, 0];
}

export function rotate(a: Vec2, theta: number): Vec2 {
  const c = Math.cos(theta);
  const s = Math.sin(theta);
  return [a[0] * c - a[1] * s, a[0] * s + a[1] * c];
}

/** 90° counter-clockwise perpendicular. */
export function ccw(a: Vec2): Vec2 {
  return [-a[1], a[0]];
}

export function angle(a: Vec2): number {
  return Math.atan2(a[1], a[0]);
}

export function lerp(a: Vec2, b: Vec2, t: number): Vec2 {
  return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t];
}

export function midpoint(a: Vec2, b: Vec2): Vec2 {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2];
}
