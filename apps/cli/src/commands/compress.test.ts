import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EncoderLocation } from '@tinythis/core';
import {
  FakeEncoder,
  failWithCode,
  runUntilKilled,
  succeedInstantly,
} from '@tinythis/processing/testing';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { EXIT_CODES, compressCommand, type CompressOptions } from './compress.js';

const encoder: EncoderLocation = { path: '/opt/fake/ffmpeg', source: 'env' };

describe('compressCommand', () => {
  let dir: string;
  let fake: FakeEncoder;
  let logs: MockInstance<typeof console.log>;
  let errors: MockInstance<typeof console.error>;

  function video(name: string): string {
    const path = join(dir, name);
    writeFileSync(path, 'source video');
    return path;
  }

  function options(overrides: Partial<CompressOptions> = {}): CompressOptions {
    return {
      settings: { preset: 'balanced', acceleratorMode: 'cpu' },
      cancelGraceMs: 200,
      locateEncoder: () => encoder,
      launcher: fake.launcher,
      spinner: false,
      ...overrides,
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tinythis-cli-'));
    fake = new FakeEncoder(succeedInstantly);
    logs = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('exits 0 when every file compresses', async () => {
    const code = await compressCommand([video('a.mp4'), video('b.mov')], options());

    expect(code).toBe(EXIT_CODES.OK);
    expect(existsSync(join(dir, 'a.tinythis.balanced.mp4'))).toBe(true);
    expect(existsSync(join(dir, 'b.tinythis.balanced.mp4'))).toBe(true);
    expect(errors).not.toHaveBeenCalled();
  });

  it('uses the requested preset and accelerator', async () => {
    const code = await compressCommand([video('a.mp4')], options({ settings: { preset: 'speed', acceleratorMode: 'gpu' } }));

    expect(code).toBe(EXIT_CODES.OK);
    expect(fake.last?.args).toContain('h264_nvenc');
    expect(existsSync(join(dir, 'a.tinythis.speed.mp4'))).toBe(true);
  });

  it('reports rejected inputs and exits 1 while still compressing the rest', async () => {
    const notes = join(dir, 'a.txt');
    writeFileSync(notes, 'not a video');

    const code = await compressCommand([notes, video('b.mp4')], options());

    expect(code).toBe(EXIT_CODES.FAILED);
    expect(errors).toHaveBeenCalledWith(expect.any(String), `Unsupported input extension: ${notes}`);
    expect(existsSync(join(dir, 'b.tinythis.balanced.mp4'))).toBe(true);
  });

  it('announces local mode once when ffmpeg sits next to the program', async () => {
    const local: EncoderLocation = { path: '/opt/tinythis/ffmpeg', source: 'near-exe' };

    const code = await compressCommand([video('a.mp4'), video('b.mp4')], options({ locateEncoder: () => local }));

    expect(code).toBe(EXIT_CODES.OK);
    const notices = logs.mock.calls.filter(call => call[1] === 'Local mode: using ffmpeg next to tinythis (/opt/tinythis/ffmpeg)');
    expect(notices).toHaveLength(1);
  });

  it('stays quiet about local mode for other encoder sources', async () => {
    await compressCommand([video('a.mp4')], options());

    expect(logs.mock.calls.some(call => String(call[1]).startsWith('Local mode'))).toBe(false);
  });

  it('exits 2 when no input is usable', async () => {
    const code = await compressCommand([join(dir, 'missing.mp4')], options());

    expect(code).toBe(EXIT_CODES.USAGE);
    expect(errors).toHaveBeenCalledWith(expect.any(String), 'No valid input files');
    expect(fake.launches).toHaveLength(0);
  });

  it('exits 3 when no encoder is available', async () => {
    const code = await compressCommand([video('a.mp4')], options({ locateEncoder: () => null }));

    expect(code).toBe(EXIT_CODES.NO_ENCODER);
    expect(fake.launches).toHaveLength(0);
  });

  it('exits 1 when a job fails', async () => {
    fake.setBehaviour(failWithCode(1));

    const code = await compressCommand([video('a.mp4')], options());

    expect(code).toBe(EXIT_CODES.FAILED);
    expect(existsSync(join(dir, 'a.tinythis.balanced.mp4'))).toBe(false);
  });

  it('exits 130 on interrupt, cancelling the running job', async () => {
    const abort = new AbortController();
    fake.setBehaviour(proc => {
      runUntilKilled(proc);
      abort.abort();
    });

    const code = await compressCommand([video('a.mp4'), video('b.mp4')], options({ signal: abort.signal }));

    expect(code).toBe(EXIT_CODES.INTERRUPTED);
    expect(fake.launches).toHaveLength(1);
    expect(fake.last?.killSignals).toEqual(['SIGTERM']);
    expect(existsSync(join(dir, 'a.tinythis.balanced.mp4'))).toBe(false);
    expect(errors).toHaveBeenCalledWith(expect.any(String), 'Interrupted: 0 succeeded, 0 failed, 1 cancelled, 1 not started');
  });
});
