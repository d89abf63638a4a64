/**
 * SVG path data → cubic subpaths.
 *
 * Every command is normalized to cubic segments:
 *   L/H/V     — handles on the anchors (P1 = P0, P2 = P3)
 *   Q/T       — degree elevation, exact
 *   A         — split into ≤ 90° pieces, each a cubic (k = 4/3·tan(Δθ/4))
 *   Z         — closing line back to the subpath start when not already there
 *
 * Lines keep zero-length handles so the biarc fitter sees them as straight
 * and the flattener reproduces their end points exactly.
 */

import type { Anchor, Subpath } from './bezier.js';
import type { Vec2 } from './vec2.js';
import { add, distance, lerp, sub } from './vec2.js';

// ─── Scanner ────────────────────────────────────────────────────

const NUMBER = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/y;
const COMMANDS = 'MmLlHhVvCcSsQqTtAaZz';

class PathScanner {
  private pos = 0;

  constructor(private readonly d: string) {}

  private skipSeparators(): void {
    while (this.pos < this.d.length && /[\s,]/.test(this.d[this.pos])) this.pos++;
  }

  done(): boolean {
    this.skipSeparators();
    return this.pos >= this.d.length;
  }

  command(): string {
    this.skipSeparators();
    const ch = this.d[this.pos];
    if (!COMMANDS.includes(ch)) {
      throw new Error(`Invalid path data at position ${this.pos}: expected a command, got "${ch}"`);
    }
    this.pos++;
    return ch;
  }

  hasNumber(): boolean {
    this.skipSeparators();
    NUMBER.lastIndex = this.pos;
    return NUMBER.test(this.d);
  }

  number(): number {
    this.skipSeparators();
    NUMBER.lastIndex = this.pos;
    const m = NUMBER.exec(this.d);
    if (!m) {
      throw new Error(`Invalid path data at position ${this.pos}: expected a number`);
    }
    this.pos = NUMBER.lastIndex;
    return Number(m[0]);
  }

  /** Arc flags may be written without separators ("a1 1 0 011 1"). */
  flag(): boolean {
    this.skipSeparators();
    const ch = this.d[this.pos];
    if (ch !== '0' && ch !== '1') {
      throw new Error(`Invalid path data at position ${this.pos}: expected an arc flag (0 or 1)`);
    }
    this.pos++;
    return ch === '1';
  }

  point(relativeTo: Vec2 | null): Vec2 {
    const x = this.number();
    const y = this.number();
    return relativeTo ? [relativeTo[0] + x, relativeTo[1] + y] : [x, y];
  }
}

// ─── Builder ────────────────────────────────────────────────────

class SubpathBuilder {
  readonly subpaths: Subpath[] = [];
  private anchors: Anchor[] = [];
  private closed = false;
  start: Vec2 = [0, 0];
  current: Vec2 = [0, 0];

  moveTo(p: Vec2): void {
    this.flush();
    this.start = p;
    this.current = p;
    this.anchors = [{ handleIn: p, point: p, handleOut: p }];
  }

  cubicTo(c1: Vec2, c2: Vec2, end: Vec2): void {
    if (this.anchors.length === 0) this.moveTo(this.current);
    const last = this.anchors[this.anchors.length - 1];
    last.handleOut = c1;
    this.anchors.push({ handleIn: c2, point: end, handleOut: end });
    this.current = end;
  }

  lineTo(end: Vec2): void {
    this.cubicTo(this.current, end, end);
  }

  close(): void {
    if (this.anchors.length === 0) return;
    if (distance(this.current, this.start) > 1e-9) this.lineTo(this.start);
    this.closed = true;
    this.flush();
    this.current = this.start;
  }

  flush(): void {
    if (this.anchors.length > 0) {
      this.subpaths.push({ anchors: this.anchors, closed: this.closed });
    }
    this.anchors = [];
    this.closed = false;
  }
}

// ─── Elliptical arcs ────────────────────────────────────────────

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  return Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy);
}

/** Endpoint-parameterized elliptical arc as cubic pieces appended to `b`. */
function arcTo(
  b: SubpathBuilder,
  rxIn: number,
  ryIn: number,
  rotationDeg: number,
  largeArc: boolean,
  sweepFlag: boolean,
  end: Vec2,
): void {
  const [x1, y1] = b.current;
  const [x2, y2] = end;
  if (distance(b.current, end) < 1e-12) return;
  let rx = Math.abs(rxIn);
  let ry = Math.abs(ryIn);
  if (rx === 0 || ry === 0) {
    b.lineTo(end);
    return;
  }

  const phi = (rotationDeg * Math.PI) / 180;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);

  const dx2 = (x1 - x2) / 2;
  const dy2 = (y1 - y2) / 2;
  const x1p = cosPhi * dx2 + sinPhi * dy2;
  const y1p = -sinPhi * dx2 + cosPhi * dy2;

  // Scale up radii that cannot span the endpoints.
  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry);
  if (lambda > 1) {
    rx *= Math.sqrt(lambda);
    ry *= Math.sqrt(lambda);
  }

  const num = rx * rx * ry * ry - rx * rx * y1p * y1p - ry * ry * x1p * x1p;
  const den = rx * rx * y1p * y1p + ry * ry * x1p * x1p;
  const sign = largeArc === sweepFlag ? -1 : 1;
  const coef = sign * Math.sqrt(Math.max(0, num / den));
  const cxp = (coef * rx * y1p) / ry;
  const cyp = (-coef * ry * x1p) / rx;

  const cx = cosPhi * cxp - sinPhi * cyp + (x1 + x2) / 2;
  const cy = sinPhi * cxp + cosPhi * cyp + (y1 + y2) / 2;

  const ux = (x1p - cxp) / rx;
  const uy = (y1p - cyp) / ry;
  const theta1 = Math.atan2(uy, ux);
  let delta = vectorAngle(ux, uy, (-x1p - cxp) / rx, (-y1p - cyp) / ry);
  if (!sweepFlag && delta > 0) delta -= 2 * Math.PI;
  if (sweepFlag && delta < 0) delta += 2 * Math.PI;

  const map = (ex: number, ey: number): Vec2 => [
    cx + rx * cosPhi * ex - ry * sinPhi * ey,
    cy + rx * sinPhi * ex + ry * cosPhi * ey,
  ];

  const pieces = Math.max(1, Math.ceil(Math.abs(delta) / (Math.PI / 2) - 1e-9));
  const step = delta / pieces;
  const k = (4 / 3) * Math.tan(step / 4);

  for (let i = 0; i < pieces; i++) {
    const a = theta1 + i * step;
    const bAngle = a + step;
    const cosA = Math.cos(a), sinA = Math.sin(a);
    const cosB = Math.cos(bAngle), sinB = Math.sin(bAngle);
    const c1 = map(cosA - k * sinA, sinA + k * cosA);
    const c2 = map(cosB + k * sinB, sinB - k * cosB);
    const p = i === pieces - 1 ? end : map(cosB, sinB);
    b.cubicTo(c1, c2, p);
  }
}

// ─── Parser ─────────────────────────────────────────────────────

/** Parse SVG path data into subpaths. Throws on malformed data. */
export function parsePathData(d: string): Subpath[] {
  const s = new PathScanner(d);
  const b = new SubpathBuilder();
  let lastControl: Vec2 | null = null;
  let lastType: 'cubic' | 'quad' | null = null;
  let first = true;

  while (!s.done()) {
    const cmd = s.command();
    const rel = cmd === cmd.toLowerCase();
    const upper = cmd.toUpperCase();
    if (first && upper !== 'M') {
      throw new Error(`Path data must start with a moveto, got "${cmd}"`);
    }
    first = false;

    if (upper === 'Z') {
      b.close();
      lastType = null;
      continue;
    }

    let repeat = false;
    do {
      const base = rel ? b.current : null;
      let nextControl: Vec2 | null = null;
      let nextType: 'cubic' | 'quad' | null = null;

      switch (upper) {
        case 'M': {
          const p = s.point(base);
          // Coordinate pairs after the first are implicit linetos.
          if (repeat) b.lineTo(p);
          else b.moveTo(p);
          break;
        }
        case 'L':
          b.lineTo(s.point(base));
          break;
        case 'H': {
          const x = s.number();
          b.lineTo([rel ? b.current[0] + x : x, b.current[1]]);
          break;
        }
        case 'V': {
          const y = s.number();
          b.lineTo([b.current[0], rel ? b.current[1] + y : y]);
          break;
        }
        case 'C': {
          const c1 = s.point(base);
          const c2 = s.point(base);
          const end = s.point(base);
          b.cubicTo(c1, c2, end);
          nextControl = c2;
          nextType = 'cubic';
          break;
        }
        case 'S': {
          const c1 = lastType === 'cubic' && lastControl ? add(b.current, sub(b.current, lastControl)) : b.current;
          const c2 = s.point(base);
          const end = s.point(base);
          b.cubicTo(c1, c2, end);
          nextControl = c2;
          nextType = 'cubic';
          break;
        }
        case 'Q':
        case 'T': {
          const q: Vec2 = upper === 'Q'
            ? s.point(base)
            : lastType === 'quad' && lastControl ? add(b.current, sub(b.current, lastControl)) : b.current;
          const end = s.point(base);
          const start = b.current;
          b.cubicTo(lerp(start, q, 2 / 3), lerp(end, q, 2 / 3), end);
          nextControl = q;
          nextType = 'quad';
          break;
        }
        case 'A': {
          const rx = s.number();
          const ry = s.number();
          const rotation = s.number();
          const largeArc = s.flag();
          const sweep = s.flag();
          arcTo(b, rx, ry, rotation, largeArc, sweep, s.point(base));
          break;
        }
      }

      lastControl = nextControl;
      lastType = nextType;
      repeat = true;
    } while (s.hasNumber());
  }

  b.flush();
  return b.subpaths;
}
