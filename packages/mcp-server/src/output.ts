/**
 * Program output — file naming and writing.
 *
 * With numeric suffixing, "job.nc" becomes "job_0001.nc", or one higher
 * than the largest "job_NNNN.nc" already in the directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

const SUFFIX_DIGITS = 4;

export function sanitizeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9_.-]/g, '_');
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Next free "stem_NNNN.ext" in `dir`. A missing directory counts as empty. */
export function nextSuffixedName(dir: string, filename: string): string {
  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  const pattern = new RegExp(`^${escapeRegExp(stem)}_(\\d+)${escapeRegExp(ext)}$`);

  const existing = fs.existsSync(dir) ? fs.readdirSync(dir) : [];
  const highest = existing.reduce((max, name) => {
    const m = pattern.exec(name);
    return m ? Math.max(max, Number(m[1])) : max;
  }, 0);

  return `${stem}_${String(highest + 1).padStart(SUFFIX_DIGITS, '0')}${ext}`;
}

export interface WriteOptions {
  /** Default true. */
  numericSuffix?: boolean;
}

/** Write `content` into `dir` (created if needed); returns the full path. */
export function writeProgram(dir: string, filename: string, content: string, options?: WriteOptions): string {
  fs.mkdirSync(dir, { recursive: true });
  const safeName = sanitizeFilename(filename);
  const finalName = (options?.numericSuffix ?? true) ? nextSuffixedName(dir, safeName) : safeName;
  const filePath = path.join(dir, finalName);
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
