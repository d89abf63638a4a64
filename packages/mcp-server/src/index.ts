#!/usr/bin/env node
/**
 * laserpath MCP Server
 *
 * Exposes the toolpath kernel as callable tools for LLM agents:
 * build a layered document of SVG paths, calibrate layers against machine
 * coordinates, and generate and export laser G-code.
 * Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { resolveServerConfig } from './config.js';
import { createLogger } from './log.js';
import { registerTools } from './tools.js';

const config = resolveServerConfig();
const logger = createLogger({ level: config.logLevel, file: config.logFile });

const server = new McpServer({
  name: 'laserpath',
  version: '0.1.0',
});

registerTools(server, { config, logger });

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('server ready', { output_dir: config.outputDir });
