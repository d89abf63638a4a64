/**
 * Document Registry — in-memory engraving document.
 *
 * Layers, their paths and calibrations, the page frame, and generated
 * programs. Every mutating MCP tool goes through here and returns a
 * structured readback so the LLM always knows the current state.
 */

import {
  parsePathData, parseMachineLabel, formatMachineLabel,
  defaultCorrespondences, fromPageFrame, buildRegistry, layerTransform,
  type Correspondence, type ConversionResult, type ConversionStats,
  type DocumentLayer, type EngraveDocument, type PageFrame, type Units,
  type Vec2, type Vec3,
} from '@laserpath/path-kernel';

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function checkName(kind: string, name: string | undefined): void {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid ${kind} name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
}

// ─── Page ───────────────────────────────────────────────────────

const DEFAULT_PAGE: PageFrame = { height: 297, unitsPerOutputUnit: 1 };

let page: PageFrame = DEFAULT_PAGE;

export function getPage(): PageFrame {
  return page;
}

export function setPage(next: PageFrame): PageFrame {
  if (!(next.unitsPerOutputUnit > 0)) {
    throw new Error(`units_per_output_unit must be positive, got ${next.unitsPerOutputUnit}`);
  }
  page = next;
  return page;
}

// ─── Layers ─────────────────────────────────────────────────────

export interface LayerSummary {
  layer_id: string;
  parent_id: string | null;
  calibrated: boolean;
  paths: string[];
}

let nextLayerId = 1;
let nextPathId = 1;

const layers = new Map<string, DocumentLayer>();

function summarize(layer: DocumentLayer): LayerSummary {
  return {
    layer_id: layer.id,
    parent_id: layer.parentId ?? null,
    calibrated: layer.calibration !== undefined,
    paths: layer.paths.map((p) => p.id),
  };
}

export function addLayer(name?: string, parentId?: string): LayerSummary {
  checkName('layer', name);
  if (name !== undefined && layers.has(name)) {
    throw new Error(`Layer "${name}" already exists.`);
  }
  if (parentId !== undefined) getLayer(parentId);

  let id = name ?? `layer_${nextLayerId++}`;
  while (layers.has(id)) id = `layer_${nextLayerId++}`;

  const layer: DocumentLayer = { id, parentId, paths: [] };
  layers.set(id, layer);
  return summarize(layer);
}

/** Retrieve a layer or throw a clear error. */
export function getLayer(id: string): DocumentLayer {
  const layer = layers.get(id);
  if (!layer) {
    const available = [...layers.keys()];
    throw new Error(
      `Layer "${id}" not found. Available layers: [${available.join(', ')}]`
    );
  }
  return layer;
}

export function listLayers(): LayerSummary[] {
  return [...layers.values()].map(summarize);
}

// ─── Paths ──────────────────────────────────────────────────────

export interface PathResult {
  path_id: string;
  layer_id: string;
  subpath_count: number;
  anchor_count: number;
}

function findPath(id: string): DocumentLayer | undefined {
  return [...layers.values()].find((l) => l.paths.some((p) => p.id === id));
}

/** Store path data on a layer. The data is parsed up front so errors surface here. */
export function addPath(layerId: string, d: string, name?: string): PathResult {
  checkName('path', name);
  const layer = getLayer(layerId);
  if (name !== undefined && findPath(name)) {
    throw new Error(`Path "${name}" already exists.`);
  }
  const subpaths = parsePathData(d);

  let id = name ?? `path_${nextPathId++}`;
  while (findPath(id)) id = `path_${nextPathId++}`;

  layer.paths.push({ id, d });
  return {
    path_id: id,
    layer_id: layer.id,
    subpath_count: subpaths.length,
    anchor_count: subpaths.reduce((n, s) => n + s.anchors.length, 0),
  };
}

export function removePath(id: string): void {
  const layer = findPath(id);
  if (!layer) {
    throw new Error(`Path "${id}" not found — cannot delete.`);
  }
  layer.paths = layer.paths.filter((p) => p.id !== id);
}

// ─── Calibration ────────────────────────────────────────────────

export interface ReferencePoint {
  /** Drawing position in drawing units, y down. */
  drawing: Vec2;
  /** Machine position as [x, y, z] or an "(x; y; z)" label. */
  machine: Vec3 | string;
}

export interface CalibrationResult {
  layer_id: string;
  points: { drawing: Vec2; machine: string }[];
}

function toCorrespondence(point: ReferencePoint, index: number): Correspondence {
  if (typeof point.machine !== 'string') {
    return { drawing: point.drawing, machine: point.machine };
  }
  const machine = parseMachineLabel(point.machine);
  if (!machine) {
    throw new Error(
      `Reference point ${index + 1}: cannot parse machine label "${point.machine}". Expected "(x; y; z)".`
    );
  }
  return { drawing: point.drawing, machine };
}

function calibrationResult(layer: DocumentLayer): CalibrationResult {
  return {
    layer_id: layer.id,
    points: (layer.calibration ?? []).map((c) => ({
      drawing: c.drawing,
      machine: formatMachineLabel(c.machine),
    })),
  };
}

export function setCalibration(layerId: string, points: ReferencePoint[]): CalibrationResult {
  const layer = getLayer(layerId);
  if (points.length < 2 || points.length > 3) {
    throw new Error(`Calibration needs 2 or 3 reference points, got ${points.length}.`);
  }
  layer.calibration = points.map(toCorrespondence);
  return calibrationResult(layer);
}

/**
 * Attach the default orientation points to a layer: the page's bottom-left
 * corner and a point 100 mm (or 5 in) to its right, each labelled with the
 * machine position it maps to. A layer that already has reference points
 * keeps them unless `replace` is set.
 */
export function createOrientationPoints(layerId: string, units: Units, replace = false): CalibrationResult {
  const layer = getLayer(layerId);
  if (layer.calibration !== undefined && !replace) {
    throw new Error(
      `Layer "${layerId}" already has orientation points. Pass replace: true to overwrite them.`
    );
  }
  layer.calibration = defaultCorrespondences(units).map((c) => ({
    drawing: fromPageFrame(page, c.drawing),
    machine: c.machine,
  }));
  return calibrationResult(layer);
}

export interface TransformReadback {
  layer_id: string;
  /** Layer whose calibration applies, or null when the default is used. */
  calibrated_by: string | null;
  scale: number;
  rotation_deg: number;
  origin: Vec2;
  translation: Vec2;
}

export function getLayerTransform(layerId: string, units: Units): TransformReadback {
  getLayer(layerId);
  const registry = buildRegistry(toDocument());
  const transform = layerTransform(registry, layerId, units);

  let calibratedBy: string | null = layerId;
  while (calibratedBy !== null && !registry.hasCalibration(calibratedBy)) {
    calibratedBy = registry.parentOf(calibratedBy);
  }

  const round = (v: number) => Math.round(v * 1e6) / 1e6;
  return {
    layer_id: layerId,
    calibrated_by: calibratedBy,
    scale: round(transform.scale),
    rotation_deg: round((transform.rotation * 180) / Math.PI),
    origin: [round(transform.origin[0]), round(transform.origin[1])],
    translation: [round(transform.translation[0]), round(transform.translation[1])],
  };
}

export function toDocument(): EngraveDocument {
  return { page, layers: [...layers.values()] };
}

// ─── Programs ───────────────────────────────────────────────────

export interface ProgramEntry {
  id: string;
  gcode: string;
  units: Units;
  stats: ConversionStats;
}

export interface ProgramSummary {
  program_id: string;
  units: Units;
  line_count: number;
  stats: ConversionStats;
}

let nextProgramId = 1;
const programs = new Map<string, ProgramEntry>();

export function createProgram(result: ConversionResult, units: Units, name?: string): ProgramSummary {
  checkName('program', name);
  let id = name ?? `prog_${nextProgramId++}`;
  // Skip auto ids a named program already holds
  while (name === undefined && programs.has(id)) id = `prog_${nextProgramId++}`;
  const entry: ProgramEntry = { id, gcode: result.gcode, units, stats: result.stats };
  programs.set(id, entry);
  return {
    program_id: id,
    units,
    line_count: result.gcode.split('\n').length - 1,
    stats: result.stats,
  };
}

export function getProgram(id: string): ProgramEntry {
  const entry = programs.get(id);
  if (!entry) {
    const available = [...programs.keys()];
    throw new Error(`Program "${id}" not found. Available programs: [${available.join(', ')}]`);
  }
  return entry;
}

/** Clear the document and all programs (also used by tests). */
export function clear(): void {
  layers.clear();
  programs.clear();
  page = DEFAULT_PAGE;
  nextLayerId = 1;
  nextPathId = 1;
  nextProgramId = 1;
}
