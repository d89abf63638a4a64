/**
 * G-code Emitter — motion primitives → NC program text.
 *
 * Program layout:
 *   G90                      absolute positioning
 *   G21 / G20                units
 *   (optional title comment)
 *   motion body              G0 / G1 / G02 / G03 / M03 / M05
 *   G0 X0 Y0, M05, M02       return to origin, tool off, end
 *
 * Modal optimization: an axis word is omitted when it is within 1e-6 of the
 * last value written for that axis. I, J and F are always written on cuts.
 * Rapid moves with nothing to write are dropped.
 */

import type { MotionPrimitive } from './emitter.js';

export type Units = 'mm' | 'inch';

// ─── Config ─────────────────────────────────────────────────────

export interface GCodeConfig {
  units?: Units;
  decimal_places?: number;
  line_numbers?: boolean;
  comment_style?: 'semicolon' | 'paren';
  title?: string;
}

const AXIS_EPSILON = 1e-6;
const FEED_DECIMALS = 1;

function resolveConfig(config?: GCodeConfig) {
  const cfg = {
    units: config?.units ?? 'mm',
    decimal_places: config?.decimal_places ?? 4,
    line_numbers: config?.line_numbers ?? false,
    comment_style: config?.comment_style ?? 'semicolon',
    title: config?.title,
  };

  if (!Number.isInteger(cfg.decimal_places) || cfg.decimal_places < 0 || cfg.decimal_places > 8) {
    throw new Error(`decimal_places must be an integer 0–8, got ${cfg.decimal_places}`);
  }
  if (cfg.title !== undefined && /[()\n;]/.test(cfg.title)) {
    throw new Error(`Invalid title "${cfg.title}". Parentheses, semicolons and newlines are not allowed.`);
  }

  return cfg;
}

type ResolvedConfig = ReturnType<typeof resolveConfig>;

/** Fixed decimals with trailing zeros and point stripped: 10 → "10", 1.5 → "1.5". */
export function formatNumber(val: number, decimals = 4): string {
  let s = val.toFixed(decimals);
  if (s.includes('.')) s = s.replace(/0+$/, '').replace(/\.$/, '');
  return s === '-0' ? '0' : s;
}

function createEmitter(cfg: ResolvedConfig) {
  const lines: string[] = [];
  let lineNum = 10;

  function emit(line: string) {
    if (cfg.line_numbers) {
      lines.push(`N${lineNum} ${line}`);
      lineNum += 10;
    } else {
      lines.push(line);
    }
  }

  function comment(text: string): string {
    return cfg.comment_style === 'paren' ? `(${text})` : `; ${text}`;
  }

  function fmt(val: number): string {
    return formatNumber(val, cfg.decimal_places);
  }

  function feed(val: number): string {
    return formatNumber(val, FEED_DECIMALS);
  }

  return { lines, emit, comment, fmt, feed };
}

type Emitter = ReturnType<typeof createEmitter>;

function emitHeader(e: Emitter, cfg: ResolvedConfig) {
  e.emit('G90');
  if (cfg.units === 'mm') {
    e.emit(`G21 ${e.comment('Units in mm')}`);
  } else {
    e.emit(`G20 ${e.comment('Units in inches')}`);
  }
  if (cfg.title !== undefined) {
    e.emit(e.comment(cfg.title));
  }
}

function emitFooter(e: Emitter) {
  e.emit(`G0 X${e.fmt(0)} Y${e.fmt(0)}`);
  e.emit('M05');
  e.emit('M02');
}

// ─── Body ───────────────────────────────────────────────────────

interface AxisState {
  x: number | null;
  y: number | null;
}

function changed(last: number | null, next: number): boolean {
  return last === null || Math.abs(next - last) > AXIS_EPSILON;
}

/** Axis words that differ from the last written values; returns the updated state. */
function axisWords(e: Emitter, state: AxisState, x: number, y: number): [string[], AxisState] {
  const words: string[] = [];
  let next = state;
  if (changed(state.x, x)) {
    words.push(`X${e.fmt(x)}`);
    next = { ...next, x };
  }
  if (changed(state.y, y)) {
    words.push(`Y${e.fmt(y)}`);
    next = { ...next, y };
  }
  return [words, next];
}

function emitBody(e: Emitter, motions: readonly MotionPrimitive[]) {
  motions.reduce<AxisState>((state, m) => {
    switch (m.type) {
      case 'rapid': {
        const [words, next] = axisWords(e, state, m.x, m.y);
        if (words.length > 0) e.emit(['G0', ...words].join(' '));
        return next;
      }
      case 'linear': {
        const [words, next] = axisWords(e, state, m.x, m.y);
        e.emit(['G1', ...words, `F${e.feed(m.feed)}`].join(' '));
        return next;
      }
      case 'arc': {
        const [words, next] = axisWords(e, state, m.x, m.y);
        const code = m.clockwise ? 'G02' : 'G03';
        e.emit([code, ...words, `I${e.fmt(m.i)}`, `J${e.fmt(m.j)}`, `F${e.feed(m.feed)}`].join(' '));
        return next;
      }
      case 'tool_on':
        e.emit('M03');
        return state;
      case 'tool_off':
        e.emit('M05');
        return state;
    }
  }, { x: null, y: null });
}

// ─── Public API ─────────────────────────────────────────────────

/** Motion body only, one command per array entry. */
export function serializeMotions(motions: readonly MotionPrimitive[], config?: GCodeConfig): string[] {
  const e = createEmitter(resolveConfig(config));
  emitBody(e, motions);
  return e.lines;
}

/** Complete program with header and shutdown sequence, newline-terminated. */
export function emitGCode(motions: readonly MotionPrimitive[], config?: GCodeConfig): string {
  const cfg = resolveConfig(config);
  const e = createEmitter(cfg);
  emitHeader(e, cfg);
  emitBody(e, motions);
  emitFooter(e);
  return e.lines.join('\n') + '\n';
}
