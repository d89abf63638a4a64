/**
 * Leveled logger. Writes to stderr (stdout carries the MCP protocol) and,
 * when configured, appends the same lines to a log file. A file that cannot
 * be written is reported once on stderr; logging never throws.
 */

import * as fs from 'node:fs';
import { LOG_LEVELS, type LogLevel } from './config.js';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level: LogLevel;
  file?: string;
  /** Clock for timestamps; tests pin it. */
  now?: () => Date;
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  return Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => ` ${k}=${typeof v === 'string' && /\s/.test(v) ? JSON.stringify(v) : String(v)}`)
    .join('');
}

export function formatLogLine(time: Date, level: LogLevel, message: string, fields?: LogFields): string {
  return `${time.toISOString()} ${level.toUpperCase()} ${message}${formatFields(fields)}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level);
  const now = options.now ?? (() => new Date());
  let fileFailed = false;

  function append(file: string, line: string) {
    try {
      fs.appendFileSync(file, line + '\n', 'utf-8');
    } catch (err) {
      if (fileFailed) return;
      fileFailed = true;
      const reason = err instanceof Error ? err.message : String(err);
      console.error(formatLogLine(now(), 'error', 'cannot write log file', { file, reason }));
    }
  }

  function write(level: LogLevel, message: string, fields?: LogFields) {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const line = formatLogLine(now(), level, message, fields);
    console.error(line);
    if (options.file) append(options.file, line);
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
