/**
 * MCP Tool Registrations — 11 tools wrapping the toolpath kernel.
 *
 * Every document tool returns JSON describing the affected layer, path or
 * program so the LLM always knows the current state after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { convertDocument } from '@laserpath/path-kernel';
import type { ServerConfig } from './config.js';
import type { Logger } from './log.js';
import { writeProgram } from './output.js';
import * as registry from './registry.js';

export interface ToolContext {
  config: ServerConfig;
  logger: Logger;
}

function reply(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

const point2 = z.tuple([z.number(), z.number()]);
const unitsSchema = z.enum(['mm', 'inch']);

export function registerTools(server: McpServer, { config, logger }: ToolContext): void {

  // ─── Document (5) ───────────────────────────────────────────

  server.tool(
    'set_page',
    'Set the page frame. Drawing coordinates are y-down from the page top; output coordinates are y-up from the bottom-left corner.',
    {
      height: z.number().describe('Page height in drawing units'),
      units_per_output_unit: z.number().positive().default(1)
        .describe('Drawing units per output unit (e.g. 3.7795 px per mm)'),
    },
    async ({ height, units_per_output_unit }) => {
      const page = registry.setPage({ height, unitsPerOutputUnit: units_per_output_unit });
      return reply({ page });
    }
  );

  server.tool(
    'add_layer',
    'Add a layer. A layer without its own calibration inherits the nearest calibrated parent\'s.',
    {
      name: z.string().optional().describe('Layer ID (letters, digits, hyphens, underscores only)'),
      parent: z.string().optional().describe('ID of the parent layer'),
    },
    async ({ name, parent }) => {
      return reply(registry.addLayer(name, parent));
    }
  );

  server.tool(
    'add_path',
    'Add SVG path data (M, L, H, V, C, S, Q, T, A, Z) to a layer. Coordinates in drawing units.',
    {
      layer: z.string().describe('ID of the layer'),
      d: z.string().min(1).describe('SVG path data'),
      name: z.string().optional().describe('Path ID (letters, digits, hyphens, underscores only)'),
    },
    async ({ layer, d, name }) => {
      return reply(registry.addPath(layer, d, name));
    }
  );

  server.tool(
    'delete_path',
    'Remove a path from its layer.',
    {
      path: z.string().describe('ID of path to delete'),
    },
    async ({ path }) => {
      registry.removePath(path);
      return reply({ deleted: path });
    }
  );

  server.tool(
    'clear_document',
    'Remove all layers, paths and generated programs, and reset the page.',
    {},
    async () => {
      registry.clear();
      logger.info('document cleared');
      return reply({ cleared: true });
    }
  );

  // ─── Calibration (3) ────────────────────────────────────────

  server.tool(
    'set_calibration',
    'Calibrate a layer from 2 or 3 reference points known in drawing and machine coordinates. Only the first two determine the transform.',
    {
      layer: z.string().describe('ID of the layer'),
      points: z.array(z.object({
        drawing: point2.describe('Drawing position [x, y] in drawing units'),
        machine: z.union([z.string(), z.tuple([z.number(), z.number(), z.number()])])
          .describe('Machine position [x, y, z] or label "(x; y; z)"'),
      })).min(2).max(3),
    },
    async ({ layer, points }) => {
      return reply(registry.setCalibration(layer, points));
    }
  );

  server.tool(
    'create_orientation_points',
    'Attach the default orientation points to a layer: page bottom-left and 100 mm (or 5 in) to its right, mapping the page frame 1:1 onto the machine.',
    {
      layer: z.string().describe('ID of the layer'),
      units: unitsSchema.default('mm').describe('Output units'),
      replace: z.boolean().default(false)
        .describe('Overwrite reference points the layer already has'),
    },
    async ({ layer, units, replace }) => {
      return reply(registry.createOrientationPoints(layer, units, replace));
    }
  );

  server.tool(
    'get_layer_transform',
    'Read back the similarity transform (scale, rotation, translation) a layer\'s geometry goes through.',
    {
      layer: z.string().describe('ID of the layer'),
      units: unitsSchema.default('mm').describe('Output units (selects the default calibration span)'),
    },
    async ({ layer, units }) => {
      return reply(registry.getLayerTransform(layer, units));
    }
  );

  // ─── Toolpath (2) ───────────────────────────────────────────

  server.tool(
    'generate_toolpath',
    'Convert the document (or selected paths) into a G-code program. Curves become line segments (polyline) or circular arcs (biarc).',
    {
      units: unitsSchema.default('mm').describe('Output units'),
      curve_mode: z.enum(['polyline', 'biarc']).default('polyline').describe('Curve handling'),
      polyline_segments: z.number().int().default(24)
        .describe('Lines per curve segment in polyline mode (at least 2)'),
      biarc_max_depth: z.number().int().min(0).max(12).default(4)
        .describe('Subdivision depth limit in biarc mode'),
      feed: z.number().positive().max(99999).default(30).describe('Cutting feed rate'),
      selection: z.array(z.string()).optional()
        .describe('Path or layer IDs to convert; a layer includes its sublayers (default: every path)'),
      decimal_places: z.number().int().min(0).max(8).default(4).describe('Coordinate precision'),
      line_numbers: z.boolean().default(false).describe('Prefix lines with N10, N20, …'),
      comment_style: z.enum(['semicolon', 'paren']).default('semicolon').describe('Comment syntax'),
      title: z.string().optional().describe('Program title written as a comment'),
      name: z.string().optional().describe('Program ID (letters, digits, hyphens, underscores only)'),
    },
    async (params) => {
      const start = Date.now();
      const result = convertDocument(registry.toDocument(), {
        units: params.units,
        curveMode: params.curve_mode,
        polylineSegments: params.polyline_segments,
        biarcMaxDepth: params.biarc_max_depth,
        feed: params.feed,
        selection: params.selection,
        gcode: {
          decimal_places: params.decimal_places,
          line_numbers: params.line_numbers,
          comment_style: params.comment_style,
          title: params.title,
        },
      });
      const elapsed = Date.now() - start;
      const summary = registry.createProgram(result, params.units, params.name);
      logger.info('toolpath generated', {
        program: summary.program_id,
        mode: params.curve_mode,
        paths: result.stats.path_count,
        lines: summary.line_count,
        ms: elapsed,
      });
      return reply({ ...summary, computed_in_ms: elapsed });
    }
  );

  server.tool(
    'export_gcode',
    'Write a generated program to a .nc file. Must call generate_toolpath first.',
    {
      program: z.string().describe('ID of program to export'),
      filename: z.string().optional().describe('Output filename (default: <program>.nc)'),
      numeric_suffix: z.boolean().default(true)
        .describe('Append _0001, _0002, … one higher than existing files (false: overwrite <filename>)'),
    },
    async ({ program, filename, numeric_suffix }) => {
      const entry = registry.getProgram(program);
      const filePath = writeProgram(
        config.outputDir,
        filename ?? `${entry.id}.nc`,
        entry.gcode,
        { numericSuffix: numeric_suffix },
      );
      logger.info('program exported', { program: entry.id, file: filePath });

      return reply({
        program_id: entry.id,
        type: 'gcode_export',
        file_path: filePath,
        file_size_bytes: Buffer.byteLength(entry.gcode),
        line_count: entry.gcode.split('\n').length - 1,
        units: entry.units,
      });
    }
  );

  // ─── Session (1) ────────────────────────────────────────────

  server.tool(
    'list_layers',
    'List all layers with their parent, calibration state and paths.',
    {},
    async () => {
      const layers = registry.listLayers();
      return reply({ page: registry.getPage(), count: layers.length, layers });
    }
  );
}
