import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { candidateOutputPath, resolveOutputPath } from './outputPath.js';

describe('candidateOutputPath', () => {
  it('tags the stem with the preset', () => {
    expect(candidateOutputPath(join('/videos', 'a.mov'), 'balanced')).toBe(join('/videos', 'a.tinythis.balanced.mp4'));
  });

  it('numbers later attempts before the extension', () => {
    expect(candidateOutputPath(join('/videos', 'a.mp4'), 'speed', 2)).toBe(join('/videos', 'a.tinythis.speed.2.mp4'));
    expect(candidateOutputPath(join('/videos', 'a.mp4'), 'speed', 3)).toBe(join('/videos', 'a.tinythis.speed.3.mp4'));
  });

  it('keeps dots inside the stem', () => {
    expect(candidateOutputPath(join('/v', 'trip.day1.webm'), 'quality')).toBe(join('/v', 'trip.day1.tinythis.quality.mp4'));
  });
});

describe('resolveOutputPath', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tinythis-out-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reserves the plain name when it is free', async () => {
    const resolved = await resolveOutputPath(join(dir, 'a.mp4'), 'balanced');

    expect(resolved).toEqual({ path: join(dir, 'a.tinythis.balanced.mp4'), reserved: true });
    expect(existsSync(resolved.path)).toBe(true);
  });

  it('skips a name that already exists on disk', async () => {
    writeFileSync(join(dir, 'a.tinythis.speed.mp4'), 'earlier output');

    const resolved = await resolveOutputPath(join(dir, 'a.mp4'), 'speed');

    expect(resolved.path).toBe(join(dir, 'a.tinythis.speed.2.mp4'));
    expect(readFileSync(join(dir, 'a.tinythis.speed.mp4'), 'utf8')).toBe('earlier output');
  });

  it('increments when resolving twice in a row', async () => {
    const first = await resolveOutputPath(join(dir, 'a.mp4'), 'quality');
    const second = await resolveOutputPath(join(dir, 'a.mp4'), 'quality');
    const third = await resolveOutputPath(join(dir, 'a.mp4'), 'quality');

    expect(first.path).toBe(join(dir, 'a.tinythis.quality.mp4'));
    expect(second.path).toBe(join(dir, 'a.tinythis.quality.2.mp4'));
    expect(third.path).toBe(join(dir, 'a.tinythis.quality.3.mp4'));
  });

  it('still returns a path when the directory is missing', async () => {
    const missing = join(dir, 'gone', 'a.mp4');

    const resolved = await resolveOutputPath(missing, 'balanced');

    expect(resolved).toEqual({
      path: join(dir, 'gone', 'a.tinythis.balanced.mp4'),
      reserved: false,
      reason: 'ENOENT',
    });
  });
});
