/**
 * Geometric primitives produced by flattening and biarc fitting.
 *
 * Arc `angle` is the signed sweep in radians measured in the frame the
 * geometry lives in: negative = clockwise, positive = counter-clockwise.
 */

import type { Vec2 } from './vec2.js';

export interface LinePrimitive {
  type: 'line';
  start: Vec2;
  end: Vec2;
}

export interface ArcPrimitive {
  type: 'arc';
  start: Vec2;
  end: Vec2;
  center: Vec2;
  angle: number;
}

export type Primitive = LinePrimitive | ArcPrimitive;

export function line(start: Vec2, end: Vec2): LinePrimitive {
  return { type: 'line', start, end };
}

export function arc(start: Vec2, end: Vec2, center: Vec2, angle: number): ArcPrimitive {
  return { type: 'arc', start, end, center, angle };
}
