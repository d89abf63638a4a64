// Public API
export type { Vec2, Vec3 } from './vec2.js';

// Bezier segment model
export type { BezierSegment, BezierCoefficients, Anchor, Subpath } from './bezier.js';
export {
  parameterize, evaluate, derivative, secondDerivative, thirdDerivative,
  tangent, normal, curvature, split, arcLength,
  subpathSegments, transformSubpath, transformSegment,
  INFINITE_CURVATURE,
} from './bezier.js';

// Flattening / biarc fitting
export type { Primitive, LinePrimitive, ArcPrimitive } from './primitive.js';
export { flattenSegment } from './flatten.js';
export type { BiarcOptions } from './biarc.js';
export { approximateBiarc, fitBiarc } from './biarc.js';

// Calibration
export type { Correspondence, SimilarityTransform } from './calibration.js';
export {
  solveSimilarity, applyTransform,
  parseMachineLabel, formatMachineLabel, defaultCorrespondences,
  CalibrationRegistry,
} from './calibration.js';

// Motion emission
export type {
  MotionPrimitive, RapidMove, LinearMove, ArcMove, ToolOn, ToolOff,
  CurveMode, EmitOptions,
} from './emitter.js';
export { emitToolpath, subpathPrimitives } from './emitter.js';

// G-code
export type { GCodeConfig, Units } from './gcode.js';
export { emitGCode, serializeMotions, formatNumber } from './gcode.js';

// Path data
export { parsePathData } from './svg-path.js';

// Conversion job
export type {
  PageFrame, DocumentPath, DocumentLayer, EngraveDocument,
  ConvertOptions, ConversionStats, ConversionResult,
} from './job.js';
export { convertDocument, toPageFrame, fromPageFrame, buildRegistry, layerTransform, toolpathStats } from './job.js';
