/**
 * Server configuration from the environment.
 *
 *   LASERPATH_OUTPUT_DIR   where export_gcode writes (default $TMPDIR/laserpath)
 *   LASERPATH_LOG_LEVEL    debug | info | warn | error | silent (default info)
 *   LASERPATH_LOG_FILE     also append log lines to this file
 */

import * as path from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveServerConfig(env: NodeJS.ProcessEnv = process.env) {
  const level = env.LASERPATH_LOG_LEVEL ?? 'info';
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid LASERPATH_LOG_LEVEL "${level}". Use one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return {
    outputDir: env.LASERPATH_OUTPUT_DIR ?? path.join(env.TMPDIR ?? '/tmp', 'laserpath'),
    logLevel: level,
    logFile: env.LASERPATH_LOG_FILE,
  };
}

export type ServerConfig = ReturnType<typeof resolveServerConfig>;
