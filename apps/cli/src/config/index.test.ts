import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError, locateEncoder } from '@tinythis/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { encoderLocateOptions, loadConfig, loadConfigFile, parseEnv, saveConfig } from './index.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      TINYTHIS_CANCEL_GRACE_MS: 5000,
      LOG_LEVEL: 'warn',
      NODE_ENV: 'production',
    });
  });

  it('coerces the grace period', () => {
    expect(parseEnv({ TINYTHIS_CANCEL_GRACE_MS: '250' }).TINYTHIS_CANCEL_GRACE_MS).toBe(250);
  });

  it('rejects a bad grace period', () => {
    expect(() => parseEnv({ TINYTHIS_CANCEL_GRACE_MS: 'soon' })).toThrow(ValidationError);
  });
});

describe('config file', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tinythis-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('defaults when the file is missing', () => {
    expect(loadConfigFile(dir)).toEqual({ gpu: false, defaultPreset: 'balanced' });
  });

  it('defaults when the file is not JSON', () => {
    writeFileSync(join(dir, 'config.json'), '{ gpu: yes');
    expect(loadConfigFile(dir)).toEqual({ gpu: false, defaultPreset: 'balanced' });
  });

  it('defaults when the file has the wrong shape', () => {
    writeFileSync(join(dir, 'config.json'), JSON.stringify({ gpu: 'on' }));
    expect(loadConfigFile(dir)).toEqual({ gpu: false, defaultPreset: 'balanced' });
  });

  it('persists updates on top of what is there', () => {
    saveConfig(dir, { defaultPreset: 'speed' });
    const saved = saveConfig(dir, { gpu: true });

    expect(saved).toEqual({ gpu: true, defaultPreset: 'speed' });
    expect(JSON.parse(readFileSync(join(dir, 'config.json'), 'utf-8'))).toEqual({ gpu: true, defaultPreset: 'speed' });
  });

  it('finds the config directory through TINYTHIS_HOME', () => {
    saveConfig(dir, { gpu: true });

    const config = loadConfig({ TINYTHIS_HOME: dir });

    expect(config.gpu).toBe(true);
    expect(config.configDir).toBe(dir);
    expect(config.configFile).toBe(join(dir, 'config.json'));
  });
});

describe('encoderLocateOptions', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tinythis-locate-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('searches the validated ffmpeg path first', () => {
    const ffmpeg = join(dir, 'ffmpeg');
    writeFileSync(ffmpeg, 'binary');
    const config = loadConfig({ TINYTHIS_HOME: dir, TINYTHIS_FFMPEG_PATH: ffmpeg });

    const options = encoderLocateOptions(config, { PATH: '', TINYTHIS_FFMPEG_PATH: join(dir, 'elsewhere') });

    expect(options.env?.['TINYTHIS_FFMPEG_PATH']).toBe(ffmpeg);
    expect(locateEncoder(options)).toEqual({ path: ffmpeg, source: 'env' });
  });

  it('keeps the rest of the environment', () => {
    const config = loadConfig({ TINYTHIS_HOME: dir });

    const options = encoderLocateOptions(config, { PATH: '/usr/bin', TINYTHIS_FFMPEG_PATH: join(dir, 'unvalidated') });

    expect(options.env).toEqual({ PATH: '/usr/bin', TINYTHIS_FFMPEG_PATH: undefined });
  });
});
