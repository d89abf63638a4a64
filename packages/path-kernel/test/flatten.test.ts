import { describe, it, expect } from 'vitest';
import { flattenSegment } from '../src/flatten.js';
import { evaluate } from '../src/bezier.js';
import type { BezierSegment } from '../src/bezier.js';

const arch: BezierSegment = [[0, 0], [10, 20], [30, 20], [40, 0]];

describe('flattenSegment', () => {

  it('returns n lines for n samples', () => {
    expect(flattenSegment(arch, 1)).toHaveLength(1);
    expect(flattenSegment(arch, 24)).toHaveLength(24);
  });

  it('starts at P0 and ends exactly at P3', () => {
    const lines = flattenSegment(arch, 4);
    expect(lines[0].start).toBe(arch[0]);
    expect(lines[3].end).toEqual([40, 0]);
  });

  it('chains each line from the previous end', () => {
    const lines = flattenSegment(arch, 6);
    for (let k = 1; k < lines.length; k++) {
      expect(lines[k].start).toBe(lines[k - 1].end);
    }
  });

  it('samples at uniform parameter steps', () => {
    const lines = flattenSegment(arch, 4);
    expect(lines.map((l) => l.end)).toEqual([1, 2, 3, 4].map((k) => evaluate(arch, k / 4)));
    expect(lines[1].end).toEqual([20, 15]);
  });

  it('splits a straight segment evenly', () => {
    const straight: BezierSegment = [[0, 0], [0, 0], [10, 0], [10, 0]];
    expect(flattenSegment(straight, 2)).toEqual([
      { type: 'line', start: [0, 0], end: [5, 0] },
      { type: 'line', start: [5, 0], end: [10, 0] },
    ]);
  });

  it('rejects a non-positive or fractional sample count', () => {
    expect(() => flattenSegment(arch, 0)).toThrow('positive integer');
    expect(() => flattenSegment(arch, 2.5)).toThrow('positive integer');
  });
});
