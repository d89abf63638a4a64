/**
 * Conversion job — document → G-code.
 *
 * Pipeline per layer:
 *   path data → subpaths                       (svg-path)
 *   drawing units, y-down → page frame, y-up   (origin at page bottom-left)
 *   page frame → machine frame                 (layer calibration)
 *   subpaths → motion primitives → G-code      (emitter, gcode)
 *
 * Calibration drawing positions go through the same page-frame mapping as
 * the geometry. Layers with no calibration in their ancestry use the
 * default orientation points, which make the page frame the machine frame.
 */

import type { Subpath } from './bezier.js';
import { transformSubpath } from './bezier.js';
import type { Correspondence, SimilarityTransform } from './calibration.js';
import { CalibrationRegistry, applyTransform, defaultCorrespondences, solveSimilarity } from './calibration.js';
import type { MotionPrimitive } from './emitter.js';
import { emitToolpath } from './emitter.js';
import type { GCodeConfig, Units } from './gcode.js';
import { emitGCode } from './gcode.js';
import { parsePathData } from './svg-path.js';
import type { Vec2 } from './vec2.js';

// ─── Types ──────────────────────────────────────────────────────

export interface PageFrame {
  /** Page height in drawing units. */
  height: number;
  /** Drawing units per output unit (e.g. px per mm). */
  unitsPerOutputUnit: number;
}

export interface DocumentPath {
  id: string;
  d: string;
}

export interface DocumentLayer {
  id: string;
  parentId?: string;
  /** Drawing positions are in drawing units, as placed on the page. */
  calibration?: Correspondence[];
  paths: DocumentPath[];
}

export interface EngraveDocument {
  page: PageFrame;
  layers: DocumentLayer[];
}

export interface ConvertOptions {
  units?: Units;
  curveMode?: 'polyline' | 'biarc';
  polylineSegments?: number;
  biarcMaxDepth?: number;
  feed?: number;
  /** Path ids to convert. Empty or absent → every path. */
  selection?: string[];
  gcode?: Omit<GCodeConfig, 'units'>;
}

export interface ConversionStats {
  layer_count: number;
  path_count: number;
  subpath_count: number;
  line_count: number;
  arc_count: number;
  cut_distance: number;
  rapid_distance: number;
}

export interface ConversionResult {
  gcode: string;
  motions: MotionPrimitive[];
  stats: ConversionStats;
}

// ─── Config ─────────────────────────────────────────────────────

function resolveConvertOptions(options?: ConvertOptions) {
  const cfg = {
    units: options?.units ?? 'mm',
    curveMode: options?.curveMode ?? 'polyline',
    polylineSegments: Math.max(2, Math.floor(options?.polylineSegments ?? 24)),
    biarcMaxDepth: options?.biarcMaxDepth ?? 4,
    feed: options?.feed ?? 30,
    selection: options?.selection ?? [],
    gcode: options?.gcode ?? {},
  };

  if (!(cfg.feed > 0) || cfg.feed > 99999) {
    throw new Error(`feed must be between 0 and 99999, got ${cfg.feed}`);
  }
  if (!Number.isInteger(cfg.biarcMaxDepth) || cfg.biarcMaxDepth < 0 || cfg.biarcMaxDepth > 12) {
    throw new Error(`biarcMaxDepth must be an integer 0–12, got ${cfg.biarcMaxDepth}`);
  }
  if (!Number.isFinite(cfg.polylineSegments)) {
    throw new Error(`polylineSegments must be a number, got ${cfg.polylineSegments}`);
  }

  return cfg;
}

function validatePage(page: PageFrame) {
  if (!(page.unitsPerOutputUnit > 0)) {
    throw new Error(`unitsPerOutputUnit must be positive, got ${page.unitsPerOutputUnit}`);
  }
  if (!Number.isFinite(page.height)) {
    throw new Error(`Page height must be a finite number, got ${page.height}`);
  }
}

// ─── Frames ─────────────────────────────────────────────────────

/** Drawing units, y-down → output units, y-up with the origin at the page's bottom-left. */
export function toPageFrame(page: PageFrame, p: Vec2): Vec2 {
  return [p[0] / page.unitsPerOutputUnit, (page.height - p[1]) / page.unitsPerOutputUnit];
}

export function fromPageFrame(page: PageFrame, p: Vec2): Vec2 {
  return [p[0] * page.unitsPerOutputUnit, page.height - p[1] * page.unitsPerOutputUnit];
}

/** Register layers parents-first; the document may list them in any order. */
export function buildRegistry(doc: EngraveDocument): CalibrationRegistry {
  const registry = new CalibrationRegistry();
  let pending = [...doc.layers];
  while (pending.length > 0) {
    const ready = pending.filter((l) => l.parentId === undefined || registry.has(l.parentId));
    if (ready.length === 0) {
      const ids = pending.map((l) => `${l.id} → ${l.parentId}`);
      throw new Error(`Unknown or cyclic parent layers: [${ids.join(', ')}]`);
    }
    for (const layer of ready) {
      registry.addLayer(layer.id, layer.parentId);
      if (layer.calibration) {
        registry.setCalibration(
          layer.id,
          layer.calibration.map((c) => ({ ...c, drawing: toPageFrame(doc.page, c.drawing) })),
        );
      }
    }
    pending = pending.filter((l) => !ready.includes(l));
  }
  return registry;
}

/**
 * Transform for a layer. Missing calibration falls back to the default
 * orientation points; a degenerate one (coincident drawing points) is an error.
 */
export function layerTransform(
  registry: CalibrationRegistry,
  layerId: string,
  units: Units,
): SimilarityTransform {
  const transform = registry.transformFor(layerId);
  if (transform) return transform;
  if (registry.calibrationFor(layerId) !== null) {
    throw new Error(`Calibration for layer "${layerId}" is degenerate: its reference points coincide.`);
  }
  const fallback = solveSimilarity(defaultCorrespondences(units));
  if (!fallback) throw new Error('Default calibration is degenerate.');
  return fallback;
}

// ─── Selection ──────────────────────────────────────────────────

/**
 * Paths to convert, grouped by layer. A selection entry names a path or a
 * layer; a layer selects its own paths and those of every descendant layer.
 */
function selectPaths(doc: EngraveDocument, selection: string[]): Map<DocumentLayer, DocumentPath[]> {
  const byLayer = new Map<DocumentLayer, DocumentPath[]>();
  const wanted = new Set(selection);
  const found = new Set<string>();
  const parents = new Map(doc.layers.map((l) => [l.id, l.parentId]));

  const selectedGroup = (layerId: string): boolean => {
    const seen = new Set<string>();
    let id: string | undefined = layerId;
    while (id !== undefined && !seen.has(id)) {
      if (wanted.has(id)) {
        found.add(id);
        return true;
      }
      seen.add(id);
      id = parents.get(id);
    }
    return false;
  };

  for (const layer of doc.layers) {
    const whole = wanted.size === 0 || selectedGroup(layer.id);
    const paths = whole ? layer.paths : layer.paths.filter((p) => wanted.has(p.id));
    for (const p of paths) found.add(p.id);
    if (paths.length > 0) byLayer.set(layer, paths);
  }

  const missing = [...wanted].filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw new Error(`Selected paths or layers not found: [${missing.join(', ')}]`);
  }
  if (byLayer.size === 0) {
    throw new Error('No paths to process!');
  }
  return byLayer;
}

// ─── Stats ──────────────────────────────────────────────────────

const round3 = (v: number) => Math.round(v * 1000) / 1000;

export function toolpathStats(motions: readonly MotionPrimitive[]): Omit<ConversionStats, 'layer_count' | 'path_count'> {
  let pos: Vec2 = [0, 0];
  let subpaths = 0, lines = 0, arcs = 0, cut = 0, rapid = 0;

  for (const m of motions) {
    switch (m.type) {
      case 'rapid':
        rapid += Math.hypot(m.x - pos[0], m.y - pos[1]);
        pos = [m.x, m.y];
        break;
      case 'linear':
        lines++;
        cut += Math.hypot(m.x - pos[0], m.y - pos[1]);
        pos = [m.x, m.y];
        break;
      case 'arc': {
        arcs++;
        const center: Vec2 = [pos[0] + m.i, pos[1] + m.j];
        const a: Vec2 = [pos[0] - center[0], pos[1] - center[1]];
        const b: Vec2 = [m.x - center[0], m.y - center[1]];
        let theta = Math.atan2(a[0] * b[1] - a[1] * b[0], a[0] * b[0] + a[1] * b[1]);
        if (m.clockwise && theta > 0) theta -= 2 * Math.PI;
        if (!m.clockwise && theta < 0) theta += 2 * Math.PI;
        cut += Math.abs(theta) * Math.hypot(m.i, m.j);
        pos = [m.x, m.y];
        break;
      }
      case 'tool_on':
        subpaths++;
        break;
      case 'tool_off':
        break;
    }
  }

  return {
    subpath_count: subpaths,
    line_count: lines,
    arc_count: arcs,
    cut_distance: round3(cut),
    rapid_distance: round3(rapid),
  };
}

// ─── Conversion ─────────────────────────────────────────────────

export function convertDocument(doc: EngraveDocument, options?: ConvertOptions): ConversionResult {
  const cfg = resolveConvertOptions(options);
  validatePage(doc.page);
  const registry = buildRegistry(doc);
  const selected = selectPaths(doc, cfg.selection);

  const machineSubpaths: Subpath[] = [];
  let pathCount = 0;
  for (const [layer, paths] of selected) {
    const transform = layerTransform(registry, layer.id, cfg.units);
    const toMachine = (p: Vec2) => applyTransform(transform, toPageFrame(doc.page, p));
    for (const path of paths) {
      let subpaths: Subpath[];
      try {
        subpaths = parsePathData(path.d);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Path "${path.id}" in layer "${layer.id}": ${message}`);
      }
      machineSubpaths.push(...subpaths.map((s) => transformSubpath(s, toMachine)));
      pathCount++;
    }
  }

  const curve = cfg.curveMode === 'biarc'
    ? { mode: 'biarc' as const, maxDepth: cfg.biarcMaxDepth }
    : { mode: 'polyline' as const, segments: cfg.polylineSegments };
  const motions = emitToolpath(machineSubpaths, { ...curve, feed: cfg.feed });
  const gcode = emitGCode(motions, { ...cfg.gcode, units: cfg.units });

  return {
    gcode,
    motions,
    stats: {
      layer_count: selected.size,
      path_count: pathCount,
      ...toolpathStats(motions),
    },
  };
}
