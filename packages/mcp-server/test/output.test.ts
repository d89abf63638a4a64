import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { nextSuffixedName, sanitizeFilename, writeProgram } from '../src/output.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'laserpath-test-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('nextSuffixedName', () => {

  it('starts at 0001', () => {
    expect(nextSuffixedName(dir, 'job.nc')).toBe('job_0001.nc');
  });

  it('treats a missing directory as empty', () => {
    expect(nextSuffixedName(path.join(dir, 'missing'), 'job.nc')).toBe('job_0001.nc');
  });

  it('goes one past the highest existing suffix', () => {
    for (const name of ['job_0001.nc', 'job_0007.nc', 'job.nc', 'other_0010.nc', 'job_0009.txt']) {
      fs.writeFileSync(path.join(dir, name), '');
    }
    expect(nextSuffixedName(dir, 'job.nc')).toBe('job_0008.nc');
  });

  it('matches the stem literally', () => {
    fs.writeFileSync(path.join(dir, 'a+b_0003.nc'), '');
    fs.writeFileSync(path.join(dir, 'aab_0005.nc'), '');
    expect(nextSuffixedName(dir, 'a+b.nc')).toBe('a+b_0004.nc');
  });
});

describe('writeProgram', () => {

  it('writes the file and returns its path', () => {
    const file = writeProgram(dir, 'job.nc', 'G90\n', { numericSuffix: false });
    expect(file).toBe(path.join(dir, 'job.nc'));
    expect(fs.readFileSync(file, 'utf-8')).toBe('G90\n');
  });

  it('creates the output directory', () => {
    const nested = path.join(dir, 'a', 'b');
    const file = writeProgram(nested, 'job.nc', 'M02\n');
    expect(fs.existsSync(file)).toBe(true);
  });

  it('numbers successive exports by default', () => {
    const first = writeProgram(dir, 'job.nc', 'A');
    const second = writeProgram(dir, 'job.nc', 'B');
    expect(path.basename(first)).toBe('job_0001.nc');
    expect(path.basename(second)).toBe('job_0002.nc');
  });

  it('overwrites the plain name when numbering is off', () => {
    writeProgram(dir, 'job.nc', 'A', { numericSuffix: false });
    const file = writeProgram(dir, 'job.nc', 'B', { numericSuffix: false });
    expect(fs.readFileSync(file, 'utf-8')).toBe('B');
    expect(fs.readdirSync(dir)).toEqual(['job.nc']);
  });

  it('replaces unsafe filename characters', () => {
    expect(sanitizeFilename('../my job?.nc')).toBe('.._my_job_.nc');
    const file = writeProgram(dir, '../escape.nc', 'X');
    expect(path.dirname(file)).toBe(dir);
  });
});
