import { describe, it, expect } from 'vitest';
import { approximateBiarc, fitBiarc } from '../src/biarc.js';
import type { BezierSegment } from '../src/bezier.js';
import type { Primitive } from '../src/primitive.js';
import type { Vec2 } from '../src/vec2.js';

function near(actual: number, expected: number, tol = 1e-6) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

function nearPoint(actual: Vec2, expected: Vec2, tol = 1e-6) {
  near(actual[0], expected[0], tol);
  near(actual[1], expected[1], tol);
}

const K = 0.5522847498;

// Quarter circle r=10 around the origin, ccw from (10,0) to (0,10)
const quarterCcw: BezierSegment = [[10, 0], [10, 10 * K], [10 * K, 10], [0, 10]];

// Same circle, cw from (0,10) to (10,0)
const quarterCw: BezierSegment = [[0, 10], [10 * K, 10], [10, 10 * K], [10, 0]];

const arch: BezierSegment = [[0, 0], [10, 20], [30, 20], [40, 0]];

function assertContinuous(primitives: Primitive[]) {
  for (let k = 1; k < primitives.length; k++) {
    expect(primitives[k].start).toEqual(primitives[k - 1].end);
  }
}

describe('fitBiarc', () => {

  it('fits a quarter circle with two arcs about its centre', () => {
    const fit = fitBiarc(quarterCcw);
    expect(fit).not.toBeNull();
    if (!fit) return;
    const [a1, a2] = fit;

    nearPoint(a1.center, [0, 0], 1e-3);
    nearPoint(a2.center, [0, 0], 1e-3);
    const join = 10 / Math.SQRT2;
    nearPoint(a1.end, [join, join], 1e-3);
    expect(a2.start).toBe(a1.end);
    near(a1.angle, Math.PI / 4, 1e-3);
    near(a2.angle, Math.PI / 4, 1e-3);
  });

  it('sweeps negative for a clockwise segment', () => {
    const fit = fitBiarc(quarterCw);
    expect(fit).not.toBeNull();
    if (!fit) return;
    expect(fit[0].angle).toBeLessThan(0);
    expect(fit[1].angle).toBeLessThan(0);
    nearPoint(fit[0].center, [0, 0], 1e-3);
  });

  it('keeps the segment end points', () => {
    const fit = fitBiarc(quarterCcw);
    if (!fit) throw new Error('expected a fit');
    expect(fit[0].start).toEqual([10, 0]);
    expect(fit[1].end).toEqual([0, 10]);
  });

  it('rejects parallel end tangents', () => {
    expect(fitBiarc([[0, 0], [10, 10], [20, -10], [30, 0]])).toBeNull();
  });

  it('rejects a coincident handle', () => {
    expect(fitBiarc([[0, 0], [0, 0], [10, 10], [10, 0]])).toBeNull();
  });

  it('rejects a fit outside the tolerance', () => {
    // The cubic bulges ~0.0027 off the true circle at t = 0.5.
    expect(fitBiarc(quarterCcw, 1e-6)).toBeNull();
  });
});

describe('approximateBiarc', () => {

  it('emits one line for a straight segment', () => {
    expect(approximateBiarc([[0, 0], [0, 0], [10, 0], [10, 0]])).toEqual([
      { type: 'line', start: [0, 0], end: [10, 0] },
    ]);
  });

  it('emits one line when the chord is shorter than minChord', () => {
    const tiny: BezierSegment = [[0, 0], [1, 1], [0.005, 1], [0.005, 0]];
    expect(approximateBiarc(tiny)).toEqual([
      { type: 'line', start: [0, 0], end: [0.005, 0] },
    ]);
  });

  it('emits the chord at depth 0', () => {
    expect(approximateBiarc(arch, { maxDepth: 0 })).toEqual([
      { type: 'line', start: [0, 0], end: [40, 0] },
    ]);
  });

  it('returns two arcs for a circular segment', () => {
    const result = approximateBiarc(quarterCcw);
    expect(result.map((p) => p.type)).toEqual(['arc', 'arc']);
  });

  it('splits an inflected segment and falls back to chords at the depth cap', () => {
    const sCurve: BezierSegment = [[0, 0], [10, 10], [20, -10], [30, 0]];
    expect(approximateBiarc(sCurve, { maxDepth: 1 })).toEqual([
      { type: 'line', start: [0, 0], end: [15, 0] },
      { type: 'line', start: [15, 0], end: [30, 0] },
    ]);
  });

  it('never subdivides past maxDepth', () => {
    for (const maxDepth of [1, 2, 3]) {
      // Each leaf yields at most two arcs.
      expect(approximateBiarc(arch, { maxDepth }).length).toBeLessThanOrEqual(2 ** (maxDepth + 1));
    }
  });

  it('produces a continuous chain from P0 to P3', () => {
    const result = approximateBiarc(arch, { maxDepth: 6 });
    expect(result[0].start).toEqual([0, 0]);
    expect(result[result.length - 1].end).toEqual([40, 0]);
    assertContinuous(result);
  });

  it('validates options', () => {
    expect(() => approximateBiarc(arch, { maxDepth: -1 })).toThrow('maxDepth');
    expect(() => approximateBiarc(arch, { tolerance: 0 })).toThrow('tolerance');
  });
});
