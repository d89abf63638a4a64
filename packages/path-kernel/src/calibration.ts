/**
 * Coordinate Calibrator — drawing space → machine space.
 *
 * Two reference points, each known in both frames, fix a similarity
 * transform (uniform scale, rotation, translation):
 *
 *   scale    = |m2 − m1| / |d2 − d1|
 *   rotation = atan2(m2 − m1) − atan2(d2 − d1)
 *   p'       = rotate(scale · (p − d1), rotation) + m1
 *
 * A third reference point is accepted and ignored by the solve, so a
 * 3-point calibration behaves exactly like its first two points.
 * Anisotropic reference placement yields the ratio of the two spans as the
 * uniform scale; there is no shear or non-uniform fit.
 */

import type { Units } from './gcode.js';
import type { Vec2, Vec3 } from './vec2.js';
import { add, angle, length, rotate, scale, sub } from './vec2.js';

// ─── Types ──────────────────────────────────────────────────────

export interface Correspondence {
  drawing: Vec2;
  /** Machine position; Z is carried for labels and never used by the solve. */
  machine: Vec3;
}

export interface SimilarityTransform {
  scale: number;
  /** Radians, counter-clockwise positive. */
  rotation: number;
  /** Drawing point mapped to `translation` (drawing1). */
  origin: Vec2;
  /** Machine XY of the first reference point (machine1). */
  translation: Vec2;
}

const BASIS_EPSILON = 1e-6;

// ─── Solve / apply ──────────────────────────────────────────────

/**
 * Solve the similarity transform from the first two correspondences.
 * Null when fewer than two are given or the drawing points coincide.
 */
export function solveSimilarity(points: readonly Correspondence[]): SimilarityTransform | null {
  if (points.length < 2) return null;
  const [first, second] = points;

  const drawingSpan = sub(second.drawing, first.drawing);
  const machine1: Vec2 = [first.machine[0], first.machine[1]];
  const machineSpan = sub([second.machine[0], second.machine[1]], machine1);

  const drawingLength = length(drawingSpan);
  if (drawingLength < BASIS_EPSILON) return null;

  return {
    scale: length(machineSpan) / drawingLength,
    rotation: angle(machineSpan) - angle(drawingSpan),
    origin: first.drawing,
    translation: machine1,
  };
}

export function applyTransform(transform: SimilarityTransform, p: Vec2): Vec2 {
  const local = scale(sub(p, transform.origin), transform.scale);
  return add(rotate(local, transform.rotation), transform.translation);
}

// ─── Labels ─────────────────────────────────────────────────────

/** Parse an orientation label "(x; y; z)". Null when malformed. */
export function parseMachineLabel(text: string): Vec3 | null {
  const body = text.trim().replace(/^\(/, '').replace(/\)$/, '');
  const parts = body.split(';').map((s) => s.trim());
  if (parts.length !== 3 || parts.some((s) => s.length === 0)) return null;
  const [x, y, z] = parts.map(Number);
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) return null;
  return [x, y, z];
}

export function formatMachineLabel(p: Vec3): string {
  return `(${p[0]}; ${p[1]}; ${p[2]})`;
}

/**
 * Default orientation points: the page origin and a point along +X,
 * 100 mm or 5 in away. Drawing positions are in the flipped page frame,
 * so the resulting transform is the identity.
 */
export function defaultCorrespondences(units: Units): Correspondence[] {
  const span = units === 'mm' ? 100 : 5;
  return [
    { drawing: [0, 0], machine: [0, 0, 0] },
    { drawing: [span, 0], machine: [span, 0, 0] },
  ];
}

// ─── Per-layer registry ─────────────────────────────────────────

interface LayerEntry {
  parentId: string | null;
  points: Correspondence[] | null;
}

/**
 * Layers keyed by stable id, each with an optional calibration.
 * A layer without one inherits the nearest calibrated ancestor's.
 * Solved transforms are cached until a calibration in the chain changes.
 */
export class CalibrationRegistry {
  private readonly layers = new Map<string, LayerEntry>();
  private readonly cache = new Map<string, SimilarityTransform | null>();

  addLayer(id: string, parentId?: string): void {
    if (this.layers.has(id)) {
      throw new Error(`Layer "${id}" already exists.`);
    }
    if (parentId !== undefined && !this.layers.has(parentId)) {
      throw new Error(`Parent layer "${parentId}" not found. Add it before "${id}".`);
    }
    this.layers.set(id, { parentId: parentId ?? null, points: null });
  }

  has(id: string): boolean {
    return this.layers.has(id);
  }

  ids(): string[] {
    return [...this.layers.keys()];
  }

  parentOf(id: string): string | null {
    return this.entry(id).parentId;
  }

  setCalibration(id: string, points: readonly Correspondence[]): void {
    if (points.length < 2 || points.length > 3) {
      throw new Error(`Calibration needs 2 or 3 reference points, got ${points.length}.`);
    }
    this.entry(id).points = [...points];
    for (const cached of [...this.cache.keys()]) {
      if (this.ancestry(cached).includes(id)) this.cache.delete(cached);
    }
  }

  /** Directly attached calibration, not inherited. */
  hasCalibration(id: string): boolean {
    return this.entry(id).points !== null;
  }

  /** Calibration of the layer or its nearest calibrated ancestor. */
  calibrationFor(id: string): Correspondence[] | null {
    for (const layerId of this.ancestry(id)) {
      const points = this.entry(layerId).points;
      if (points) return points;
    }
    return null;
  }

  /** Memoized transform for a layer; null when nothing in the chain is calibrated. */
  transformFor(id: string): SimilarityTransform | null {
    const cached = this.cache.get(id);
    if (cached !== undefined) return cached;
    const points = this.calibrationFor(id);
    const transform = points ? solveSimilarity(points) : null;
    this.cache.set(id, transform);
    return transform;
  }

  /** The layer followed by its ancestors, nearest first. */
  private ancestry(id: string): string[] {
    const chain: string[] = [];
    let current: string | null = id;
    while (current !== null) {
      chain.push(current);
      current = this.entry(current).parentId;
    }
    return chain;
  }

  private entry(id: string): LayerEntry {
    const entry = this.layers.get(id);
    if (!entry) {
      const available = [...this.layers.keys()];
      throw new Error(`Layer "${id}" not found. Available layers: [${available.join(', ')}]`);
    }
    return entry;
  }
}
