/**
 * Toolpath Emitter — machine-space subpaths → motion primitives.
 *
 * Per subpath (≥ 2 anchors):
 *   rapid to first anchor, tool on,
 *   per segment: flattener (polyline) or biarc approximator (biarc),
 *   tool off.
 *
 * Pure: no position is tracked here. Axis deduplication is a fold done by
 * the G-code serializer, so every primitive carries full coordinates.
 */

import type { Subpath } from './bezier.js';
import { subpathSegments } from './bezier.js';
import { approximateBiarc } from './biarc.js';
import { flattenSegment } from './flatten.js';
import type { Primitive } from './primitive.js';

// ─── Types ──────────────────────────────────────────────────────

export interface RapidMove { type: 'rapid'; x: number; y: number; }
export interface LinearMove { type: 'linear'; x: number; y: number; feed: number; }
export interface ArcMove {
  type: 'arc';
  x: number;
  y: number;
  /** Centre offset from the arc's start point. */
  i: number;
  j: number;
  clockwise: boolean;
  feed: number;
}
export interface ToolOn { type: 'tool_on'; }
export interface ToolOff { type: 'tool_off'; }

export type MotionPrimitive = RapidMove | LinearMove | ArcMove | ToolOn | ToolOff;

export type CurveMode =
  | { mode: 'polyline'; segments: number }
  | { mode: 'biarc'; maxDepth: number };

export type EmitOptions = CurveMode & { feed: number };

// ─── Emission ───────────────────────────────────────────────────

export function primitiveToMotion(p: Primitive, feed: number): LinearMove | ArcMove {
  if (p.type === 'line') {
    return { type: 'linear', x: p.end[0], y: p.end[1], feed };
  }
  return {
    type: 'arc',
    x: p.end[0],
    y: p.end[1],
    i: p.center[0] - p.start[0],
    j: p.center[1] - p.start[1],
    clockwise: p.angle < 0,
    feed,
  };
}

/** Geometric primitives for one subpath, in traversal order. */
export function subpathPrimitives(subpath: Subpath, curve: CurveMode): Primitive[] {
  const out: Primitive[] = [];
  for (const segment of subpathSegments(subpath)) {
    if (curve.mode === 'biarc') {
      out.push(...approximateBiarc(segment, { maxDepth: curve.maxDepth }));
    } else {
      out.push(...flattenSegment(segment, curve.segments));
    }
  }
  return out;
}

export function emitToolpath(subpaths: readonly Subpath[], options: EmitOptions): MotionPrimitive[] {
  if (!(options.feed > 0)) {
    throw new Error(`feed must be positive, got ${options.feed}`);
  }
  const motions: MotionPrimitive[] = [];

  for (const subpath of subpaths) {
    // Degenerate subpaths are skipped silently.
    if (subpath.anchors.length < 2) continue;

    const [x, y] = subpath.anchors[0].point;
    motions.push({ type: 'rapid', x, y });
    motions.push({ type: 'tool_on' });
    for (const p of subpathPrimitives(subpath, options)) {
      motions.push(primitiveToMotion(p, options.feed));
    }
    motions.push({ type: 'tool_off' });
  }

  return motions;
}
