/**
 * Bezier Segment Model — one cubic segment of a path.
 *
 * A segment is the tuple (P0, P1, P2, P3): start anchor, start handle,
 * end handle, end anchor. Segments are independent of their neighbours;
 * no C¹ continuity is assumed anywhere in the kernel.
 *
 * Polynomial form (power basis):
 *   x(t) = ax t³ + bx t² + cx t + dx
 *   y(t) = ay t³ + by t² + cy t + dy
 * with (dx, dy) = P0.
 */

import type { Vec2 } from './vec2.js';
import { distance, lerp } from './vec2.js';

// ─── Types ──────────────────────────────────────────────────────

export type BezierSegment = readonly [Vec2, Vec2, Vec2, Vec2];

export interface BezierCoefficients {
  ax: number; ay: number;
  bx: number; by: number;
  cx: number; cy: number;
  dx: number; dy: number;
}

/** A path vertex with its incoming and outgoing control handles. */
export interface Anchor {
  handleIn: Vec2;
  point: Vec2;
  handleOut: Vec2;
}

/** One continuous chain of segments sharing anchors. */
export interface Subpath {
  anchors: Anchor[];
  closed: boolean;
}

const DERIVATIVE_EPSILON = 1e-10;

/** Returned by curvature() where the first derivative vanishes. */
export const INFINITE_CURVATURE = 1e10;

// ─── Algebra ────────────────────────────────────────────────────

export function parameterize(segment: BezierSegment): BezierCoefficients {
  const [[x0, y0], [x1, y1], [x2, y2], [x3, y3]] = segment;

  const cx = 3 * (x1 - x0);
  const bx = 3 * (x2 - x1) - cx;
  const ax = x3 - x0 - cx - bx;

  const cy = 3 * (y1 - y0);
  const by = 3 * (y2 - y1) - cy;
  const ay = y3 - y0 - cy - by;

  return { ax, ay, bx, by, cx, cy, dx: x0, dy: y0 };
}

/** Position at t. Defined for any real t; callers pass t in [0, 1]. */
export function evaluate(segment: BezierSegment, t: number): Vec2 {
  if (t === 0) return segment[0];
  if (t === 1) return segment[3];
  const { ax, ay, bx, by, cx, cy, dx, dy } = parameterize(segment);
  return [
    ((ax * t + bx) * t + cx) * t + dx,
    ((ay * t + by) * t + cy) * t + dy,
  ];
}

export function derivative(segment: BezierSegment, t: number): Vec2 {
  const { ax, ay, bx, by, cx, cy } = parameterize(segment);
  return [3 * ax * t * t + 2 * bx * t + cx, 3 * ay * t * t + 2 * by * t + cy];
}

export function secondDerivative(segment: BezierSegment, t: number): Vec2 {
  const { ax, ay, bx, by } = parameterize(segment);
  return [6 * ax * t + 2 * bx, 6 * ay * t + 2 * by];
}

export function thirdDerivative(segment: BezierSegment): Vec2 {
  const { ax, ay } = parameterize(segment);
  return [6 * ax, 6 * ay];
}

function vanishes(v: Vec2): boolean {
  return Math.abs(v[0]) < DERIVATIVE_EPSILON && Math.abs(v[1]) < DERIVATIVE_EPSILON;
}

/**
 * Unit tangent at t.
 *
 * Cusps and coincident control points zero the first derivative, so fall
 * back to the second and then the (constant) third derivative. A segment
 * with all three vanishing is a point; it gets the +X direction.
 */
export function tangent(segment: BezierSegment, t: number): Vec2 {
  let d = derivative(segment, t);
  if (vanishes(d)) {
    d = secondDerivative(segment, t);
    if (vanishes(d)) {
      d = thirdDerivative(segment);
      if (vanishes(d)) return [1, 0];
    }
  }
  const l = Math.hypot(d[0], d[1]);
  return l > 0 ? [d[0] / l, d[1] / l] : [1, 0];
}

export function normal(segment: BezierSegment, t: number): Vec2 {
  const [tx, ty] = tangent(segment, t);
  return [-ty, tx];
}

/** Signed curvature (x'y'' − y'x'') / (x'² + y'²)^1.5. */
export function curvature(segment: BezierSegment, t: number): number {
  const [fx, fy] = derivative(segment, t);
  const [fxx, fyy] = secondDerivative(segment, t);
  const denominator = Math.pow(fx * fx + fy * fy, 1.5);
  if (Math.abs(denominator) < DERIVATIVE_EPSILON) return INFINITE_CURVATURE;
  return (fx * fyy - fy * fxx) / denominator;
}

// ─── Subdivision ────────────────────────────────────────────────

/**
 * de Casteljau split at t. Both halves share the split point, so
 * left[3] and right[0] are the same value.
 */
export function split(segment: BezierSegment, t = 0.5): [BezierSegment, BezierSegment] {
  const [p0, p1, p2, p3] = segment;
  const p01 = lerp(p0, p1, t);
  const p12 = lerp(p1, p2, t);
  const p23 = lerp(p2, p3, t);
  const p012 = lerp(p01, p12, t);
  const p123 = lerp(p12, p23, t);
  const p0123 = lerp(p012, p123, t);
  return [
    [p0, p01, p012, p0123],
    [p0123, p123, p23, p3],
  ];
}

// ─── Length ─────────────────────────────────────────────────────

const MAX_LENGTH_DEPTH = 10;

/**
 * Adaptive length estimate. Accepts the control polygon length once it is
 * within `tolerance` of the chord; past the depth cap the chord is used.
 */
export function arcLength(segment: BezierSegment, tolerance = 0.001): number {
  return lengthRecursive(segment, tolerance, 0);
}

function lengthRecursive(segment: BezierSegment, tolerance: number, depth: number): number {
  const [p0, p1, p2, p3] = segment;
  if (depth > MAX_LENGTH_DEPTH) return distance(p0, p3);

  const chord = distance(p0, p3);
  const polygon = distance(p0, p1) + distance(p1, p2) + distance(p2, p3);
  if (polygon - chord < tolerance) return polygon;

  const [left, right] = split(segment, 0.5);
  return lengthRecursive(left, tolerance, depth + 1) + lengthRecursive(right, tolerance, depth + 1);
}

// ─── Paths ──────────────────────────────────────────────────────

/** Consecutive-anchor segments of a subpath. Fewer than 2 anchors → none. */
export function subpathSegments(subpath: Subpath): BezierSegment[] {
  const { anchors } = subpath;
  const segments: BezierSegment[] = [];
  for (let i = 1; i < anchors.length; i++) {
    const a = anchors[i - 1];
    const b = anchors[i];
    segments.push([a.point, a.handleOut, b.handleIn, b.point]);
  }
  return segments;
}

/**
 * Map a subpath through a point transform. Bezier curves are affine
 * invariant, so mapping control points maps the curve exactly for any
 * affine `fn`.
 */
export function transformSubpath(subpath: Subpath, fn: (p: Vec2) => Vec2): Subpath {
  return {
    closed: subpath.closed,
    anchors: subpath.anchors.map((a) => ({
      handleIn: fn(a.handleIn),
      point: fn(a.point),
      handleOut: fn(a.handleOut),
    })),
  };
}

export function transformSegment(segment: BezierSegment, fn: (p: Vec2) => Vec2): BezierSegment {
  return [fn(segment[0]), fn(segment[1]), fn(segment[2]), fn(segment[3])];
}

