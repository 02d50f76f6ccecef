import { ACCELERATOR_MODES, PRESETS } from '@tinythis/core';
import { describe, expect, it } from 'vitest';
import {
  CRF_LEVELS,
  argumentsFor,
  nextPreset,
  parsePreset,
  prevPreset,
  toggleAccelerator,
} from './presets.js';

describe('argumentsFor', () => {
  it('has a profile for every preset and accelerator pair', () => {
    for (const preset of PRESETS) {
      for (const mode of ACCELERATOR_MODES) {
        const profile = argumentsFor(preset, mode);
        expect(profile.preset).toBe(preset);
        expect(profile.acceleratorMode).toBe(mode);
        expect(profile.container).toBe('mp4');
        expect(profile.extension).toBe('.mp4');
        expect(profile.video.pixFmt).toBe('yuv420p');
        expect(profile.video.extraArgs).toContain('+faststart');
        expect(profile.audio.codec).toBe('aac');
      }
    }
  });

  it('returns equal but independent profiles on each call', () => {
    const first = argumentsFor('balanced', 'gpu');
    const second = argumentsFor('balanced', 'gpu');

    expect(second).toEqual(first);
    first.video.extraArgs?.push('-an');
    expect(argumentsFor('balanced', 'gpu')).toEqual(second);
  });

  it('uses libx264 on the CPU and NVENC on the GPU', () => {
    expect(argumentsFor('speed', 'cpu').video).toEqual({
      codec: 'libx264',
      preset: 'veryfast',
      crf: 28,
      pixFmt: 'yuv420p',
      extraArgs: ['-movflags', '+faststart'],
    });
    expect(argumentsFor('quality', 'gpu').video).toEqual({
      codec: 'h264_nvenc',
      preset: 'p7',
      tune: 'hq',
      pixFmt: 'yuv420p',
      extraArgs: ['-rc', 'vbr', '-cq', '19', '-b:v', '0', '-movflags', '+faststart'],
    });
  });

  it('orders fidelity quality > balanced > speed in both modes', () => {
    expect(CRF_LEVELS.quality.x264).toBeLessThan(CRF_LEVELS.balanced.x264);
    expect(CRF_LEVELS.balanced.x264).toBeLessThan(CRF_LEVELS.speed.x264);
    expect(CRF_LEVELS.quality.nvenc).toBeLessThan(CRF_LEVELS.balanced.nvenc);
    expect(CRF_LEVELS.balanced.nvenc).toBeLessThan(CRF_LEVELS.speed.nvenc);

    expect(argumentsFor('quality', 'cpu').audio.bitrate).toBe('160k');
    expect(argumentsFor('balanced', 'cpu').audio.bitrate).toBe('128k');
    expect(argumentsFor('speed', 'gpu').audio.bitrate).toBe('96k');
  });
});

describe('preset cycling', () => {
  it('cycles forwards and wraps', () => {
    expect(nextPreset('quality')).toBe('balanced');
    expect(nextPreset('balanced')).toBe('speed');
    expect(nextPreset('speed')).toBe('quality');
  });

  it('cycles backwards and wraps', () => {
    expect(prevPreset('quality')).toBe('speed');
    expect(prevPreset('speed')).toBe('balanced');
    expect(prevPreset('balanced')).toBe('quality');
  });

  it('parses names case-insensitively', () => {
    expect(parsePreset(' Speed ')).toBe('speed');
    expect(parsePreset('ultra')).toBeNull();
  });

  it('toggles the accelerator', () => {
    expect(toggleAccelerator('cpu')).toBe('gpu');
    expect(toggleAccelerator('gpu')).toBe('cpu');
  });
});
