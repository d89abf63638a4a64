/**
 * Curve Flattener — polyline mode.
 *
 * Uniform parameter sampling: quality is a function of the sample count
 * alone, there is no tolerance feedback.
 */

import type { BezierSegment } from './bezier.js';
import { evaluate } from './bezier.js';
import type { LinePrimitive } from './primitive.js';
import { line } from './primitive.js';

/**
 * Sample a segment at t = 1/n, 2/n, …, 1 and join the samples with lines.
 * The first line starts at P0, where the previous primitive ended.
 */
export function flattenSegment(segment: BezierSegment, n: number): LinePrimitive[] {
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Sample count must be a positive integer, got ${n}`);
  }
  const lines: LinePrimitive[] = [];
  let prev = segment[0];
  for (let k = 1; k <= n; k++) {
    const p = evaluate(segment, k / n);
    lines.push(line(prev, p));
    prev = p;
  }
  return lines;
}
