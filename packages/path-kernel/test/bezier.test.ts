import { describe, it, expect } from 'vitest';
import {
  parameterize, evaluate, derivative, secondDerivative, thirdDerivative, tangent, normal, curvature,
  split, arcLength, subpathSegments, transformSubpath, transformSegment, INFINITE_CURVATURE,
} from '../src/bezier.js';
import type { Anchor, BezierSegment, Subpath } from '../src/bezier.js';
import type { Vec2 } from '../src/vec2.js';

const EPSILON = 1e-9;

function near(actual: number, expected: number, tol = EPSILON) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

function nearPoint(actual: Vec2, expected: Vec2, tol = EPSILON) {
  near(actual[0], expected[0], tol);
  near(actual[1], expected[1], tol);
}

// Arch: x(t) = -20t³ + 30t² + 30t, y(t) = -60t² + 60t
const arch: BezierSegment = [[0, 0], [10, 20], [30, 20], [40, 0]];

// Quarter circle r=10, ccw from (10,0) to (0,10)
const K = 0.5522847498;
const quarter: BezierSegment = [[10, 0], [10, 10 * K], [10 * K, 10], [0, 10]];

describe('parameterize', () => {
  it('derives power-basis coefficients', () => {
    expect(parameterize(arch)).toEqual({
      ax: -20, ay: 0,
      bx: 30, by: -60,
      cx: 30, cy: 60,
      dx: 0, dy: 0,
    });
  });
});

describe('evaluate', () => {
  it('interpolates the end points exactly', () => {
    expect(evaluate(arch, 0)).toEqual([0, 0]);
    expect(evaluate(arch, 1)).toEqual([40, 0]);
    expect(evaluate(quarter, 0)).toEqual([10, 0]);
    expect(evaluate(quarter, 1)).toEqual([0, 10]);
  });

  it('evaluates the midpoint', () => {
    expect(evaluate(arch, 0.5)).toEqual([20, 15]);
  });

  it('extrapolates outside [0, 1]', () => {
    // x(2) = -160 + 120 + 60 = 20, y(2) = -240 + 120 = -120
    nearPoint(evaluate(arch, 2), [20, -120]);
  });
});

describe('tangent / normal', () => {
  it('is the normalized first derivative', () => {
    expect(derivative(arch, 0.5)).toEqual([45, 0]);
    nearPoint(tangent(arch, 0.5), [1, 0]);
    nearPoint(tangent(arch, 0), [1 / Math.sqrt(5), 2 / Math.sqrt(5)]);
  });

  it('has constant third derivative', () => {
    expect(secondDerivative(arch, 0.5)).toEqual([0, -120]);
    expect(thirdDerivative(arch)).toEqual([-120, 0]);
  });

  it('falls back to the second derivative at a coincident handle', () => {
    const cusp: BezierSegment = [[0, 0], [0, 0], [0, 10], [10, 10]];
    // first derivative at 0 is (0,0); second is (2bx, 2by) = (0, 60)
    nearPoint(tangent(cusp, 0), [0, 1]);
  });

  it('falls back to the third derivative when both handles sit on the start', () => {
    const flat: BezierSegment = [[0, 0], [0, 0], [0, 0], [0, 10]];
    expect(derivative(flat, 0)).toEqual([0, 0]);
    expect(secondDerivative(flat, 0)).toEqual([0, 0]);
    expect(thirdDerivative(flat)).toEqual([0, 60]);
    expect(tangent(flat, 0)).toEqual([0, 1]);
  });

  it('returns +X for a point-like segment', () => {
    const point: BezierSegment = [[5, 5], [5, 5], [5, 5], [5, 5]];
    expect(tangent(point, 0.3)).toEqual([1, 0]);
  });

  it('normal is perpendicular to the tangent', () => {
    const t = tangent(quarter, 0.4);
    const n = normal(quarter, 0.4);
    near(t[0] * n[0] + t[1] * n[1], 0);
    near(Math.hypot(n[0], n[1]), 1);
    nearPoint(normal(arch, 0), [-2 / Math.sqrt(5), 1 / Math.sqrt(5)]);
  });
});

describe('curvature', () => {
  it('matches (x\'y\'\' - y\'x\'\') / |d|³', () => {
    // x' = 45, y' = 0, x'' = 0, y'' = -120 at t = 0.5
    near(curvature(arch, 0.5), -5400 / Math.pow(45, 3));
  });

  it('is about 1/r on a circular arc', () => {
    near(curvature(quarter, 0.5), 0.1, 2e-3);
  });

  it('returns the sentinel where the derivative vanishes', () => {
    const point: BezierSegment = [[1, 1], [1, 1], [1, 1], [1, 1]];
    expect(curvature(point, 0.5)).toBe(INFINITE_CURVATURE);
  });
});

describe('split', () => {
  it('halves share the split point', () => {
    const [left, right] = split(arch, 0.3);
    expect(left[3]).toBe(right[0]);
    expect(left[0]).toBe(arch[0]);
    expect(right[3]).toBe(arch[3]);
  });

  it('reproduces the input curve on both halves', () => {
    const t = 0.3;
    const [left, right] = split(arch, t);
    for (const u of [0, 0.25, 0.5, 0.75, 1]) {
      nearPoint(evaluate(left, u), evaluate(arch, t * u));
      nearPoint(evaluate(right, u), evaluate(arch, t + (1 - t) * u));
    }
  });

  it('splits at 0.5 by default', () => {
    const [left] = split(arch);
    expect(left[3]).toEqual([20, 15]);
  });
});

describe('arcLength', () => {
  it('is exact on a straight segment', () => {
    expect(arcLength([[0, 0], [1, 0], [2, 0], [3, 0]])).toBe(3);
  });

  it('approximates a quarter circle', () => {
    near(arcLength(quarter), (Math.PI * 10) / 2, 0.01);
  });

  it('falls back to chords past the depth cap', () => {
    // A negative tolerance never accepts, so every leaf is a chord.
    near(arcLength([[0, 0], [1, 0], [2, 0], [3, 0]], -1), 3);
  });
});

describe('subpathSegments', () => {
  const a = (x: number, y: number): Anchor => ({ handleIn: [x, y], point: [x, y], handleOut: [x, y] });

  it('builds one segment per anchor pair', () => {
    const sp: Subpath = { anchors: [a(0, 0), a(10, 0), a(10, 10)], closed: false };
    const segs = subpathSegments(sp);
    expect(segs).toHaveLength(2);
    expect(segs[1]).toEqual([[10, 0], [10, 0], [10, 10], [10, 10]]);
  });

  it('yields nothing for a single anchor', () => {
    expect(subpathSegments({ anchors: [a(1, 1)], closed: false })).toEqual([]);
  });

  it('transforms every control point', () => {
    const sp: Subpath = { anchors: [a(1, 2), a(3, 4)], closed: true };
    const moved = transformSubpath(sp, ([x, y]) => [x + 1, y * 2]);
    expect(moved.closed).toBe(true);
    expect(moved.anchors[1]).toEqual({ handleIn: [4, 8], point: [4, 8], handleOut: [4, 8] });
  });

  it('transforms a single segment', () => {
    expect(transformSegment(arch, ([x, y]) => [x * 2, y + 1])).toEqual([[0, 1], [20, 21], [60, 21], [80, 1]]);
  });
});
