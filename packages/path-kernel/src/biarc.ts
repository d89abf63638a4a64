/**
 * Biarc Approximator — cubic segment → lines and circular arcs.
 *
 * Per recursion level:
 *   1. depth exhausted      → one line P0→P3
 *   2. chord too short      → one line
 *   3. handles near chord   → one line
 *   4. biarc fits           → two arcs
 *   5. otherwise split at t=0.5 and recurse on both halves
 *
 * Biarc construction (equal tangent lengths):
 *   T0 = unit(P1 − P0), T3 = unit(P3 − P2), v = P3 − P0
 *   d  = (−v·(T0+T3) + √((v·(T0+T3))² + 2(1 − T0·T3)|v|²)) / (2(1 − T0·T3))
 *   J  = ((P0 + d T0) + (P3 − d T3)) / 2          — join point
 * The first arc is tangent to T0 at P0, the second to T3 at P3, and the
 * two meet tangentially at J.
 */

import type { BezierSegment } from './bezier.js';
import { evaluate, split } from './bezier.js';
import type { ArcPrimitive, Primitive } from './primitive.js';
import { arc, line } from './primitive.js';
import type { Vec2 } from './vec2.js';
import { add, ccw, cross, distance, dot, length, normalize, scale, sub, midpoint } from './vec2.js';

// ─── Options ────────────────────────────────────────────────────

export interface BiarcOptions {
  /** Recursion limit; at this depth a segment becomes one line. */
  maxDepth?: number;
  /** Max distance of P1/P2 from the chord for a segment to count as straight. */
  straightness?: number;
  /** Chords shorter than this become a line. */
  minChord?: number;
  /** Max deviation of the curve from a fitted arc pair. */
  tolerance?: number;
}

const TANGENT_EPSILON = 1e-6;
const FIT_SAMPLES = 8;

function resolveOptions(options?: BiarcOptions) {
  const cfg = {
    maxDepth: options?.maxDepth ?? 4,
    straightness: options?.straightness ?? 0.1,
    minChord: options?.minChord ?? 0.01,
    tolerance: options?.tolerance ?? 0.1,
  };
  if (!Number.isInteger(cfg.maxDepth) || cfg.maxDepth < 0) {
    throw new Error(`maxDepth must be a non-negative integer, got ${cfg.maxDepth}`);
  }
  if (cfg.tolerance <= 0) {
    throw new Error(`tolerance must be positive, got ${cfg.tolerance}`);
  }
  return cfg;
}

type ResolvedOptions = ReturnType<typeof resolveOptions>;

// ─── Arc construction ───────────────────────────────────────────

/** Signed sweep from a to b (both relative to the centre) in the given direction. */
function sweep(a: Vec2, b: Vec2, counterclockwise: boolean): number {
  let theta = Math.atan2(cross(a, b), dot(a, b));
  if (counterclockwise && theta < 0) theta += 2 * Math.PI;
  if (!counterclockwise && theta > 0) theta -= 2 * Math.PI;
  return theta;
}

/**
 * Signed offset along ccw(tangent) from `anchor` to the centre of the circle
 * tangent to `tangent` at `anchor` and passing through `other`.
 * Null when `other` lies on the tangent line.
 */
function centerOffset(anchor: Vec2, tangent: Vec2, other: Vec2): number | null {
  const chord = sub(other, anchor);
  const along = dot(ccw(tangent), chord);
  if (Math.abs(along) < TANGENT_EPSILON) return null;
  return dot(chord, chord) / (2 * along);
}

/**
 * Fit a biarc to one segment. Returns null when the tangents are degenerate
 * or parallel, when an arc turns against the segment's net turning, or when
 * the pair strays from the curve by more than `tolerance`.
 */
export function fitBiarc(segment: BezierSegment, tolerance = 0.1): [ArcPrimitive, ArcPrimitive] | null {
  const [p0, p1, p2, p3] = segment;
  const rawT0 = sub(p1, p0);
  const rawT3 = sub(p3, p2);
  if (length(rawT0) < TANGENT_EPSILON || length(rawT3) < TANGENT_EPSILON) return null;

  const t0 = normalize(rawT0);
  const t3 = normalize(rawT3);
  const turning = cross(t0, t3);
  if (Math.abs(turning) < TANGENT_EPSILON) return null;

  const v = sub(p3, p0);
  const vt = dot(v, add(t0, t3));
  const denom = 2 * (1 - dot(t0, t3));
  const d = (-vt + Math.sqrt(vt * vt + denom * dot(v, v))) / denom;
  const join = midpoint(add(p0, scale(t0, d)), sub(p3, scale(t3, d)));

  const r1 = centerOffset(p0, t0, join);
  const r2 = centerOffset(p3, t3, join);
  if (r1 === null || r2 === null) return null;

  // Both arcs turn with the segment; an inflected segment is split instead.
  const ccwTurn = turning > 0;
  if ((r1 > 0) !== ccwTurn || (r2 > 0) !== ccwTurn) return null;

  const c1 = add(p0, scale(ccw(t0), r1));
  const c2 = add(p3, scale(ccw(t3), r2));
  const radius1 = Math.abs(r1);
  const radius2 = Math.abs(r2);

  for (let k = 1; k < FIT_SAMPLES; k++) {
    const p = evaluate(segment, k / FIT_SAMPLES);
    const deviation = Math.min(
      Math.abs(distance(p, c1) - radius1),
      Math.abs(distance(p, c2) - radius2),
    );
    if (deviation > tolerance) return null;
  }

  return [
    arc(p0, join, c1, sweep(sub(p0, c1), sub(join, c1), ccwTurn)),
    arc(join, p3, c2, sweep(sub(join, c2), sub(p3, c2), ccwTurn)),
  ];
}

// ─── Recursive approximation ────────────────────────────────────

/** Distance of `p` from the infinite line through `a` along `chord`. */
function offChord(p: Vec2, a: Vec2, chord: Vec2, chordLength: number): number {
  return Math.abs(cross(chord, sub(p, a))) / chordLength;
}

function approximate(segment: BezierSegment, depth: number, cfg: ResolvedOptions): Primitive[] {
  const [p0, p1, p2, p3] = segment;
  if (depth >= cfg.maxDepth) return [line(p0, p3)];

  const chord = sub(p3, p0);
  const chordLength = length(chord);
  if (chordLength < cfg.minChord) return [line(p0, p3)];

  const d1 = offChord(p1, p0, chord, chordLength);
  const d2 = offChord(p2, p0, chord, chordLength);
  if (Math.max(d1, d2) < cfg.straightness) return [line(p0, p3)];

  const fit = fitBiarc(segment, cfg.tolerance);
  if (fit) return fit;

  const [left, right] = split(segment, 0.5);
  return [
    ...approximate(left, depth + 1, cfg),
    ...approximate(right, depth + 1, cfg),
  ];
}

/**
 * Approximate a segment with lines and arcs in traversal order. Never
 * throws on geometry: exhausted depth falls back to a chord line, which can
 * visibly cut corners on sharp curves at small `maxDepth`.
 */
export function approximateBiarc(segment: BezierSegment, options?: BiarcOptions): Primitive[] {
  return approximate(segment, 0, resolveOptions(options));
}
