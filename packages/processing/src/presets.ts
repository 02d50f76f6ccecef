/**
 * Encoding Presets
 * 
 * The three fixed presets, each with a CPU (libx264) and a GPU (NVENC)
 * variant. Fidelity order is quality > balanced > speed in both modes.
 */

import {
  PRESETS,
  type AcceleratorMode,
  type Preset,
} from '@tinythis/core';
import type { AudioCodecOptions, VideoCodecOptions } from './commandBuilder.js';

export interface EncodingPreset {
  name: Preset;
  video: VideoCodecOptions;
  audio: AudioCodecOptions;
  
  // Hardware acceleration variant
  hwAccelVariants: {
    nvidia: VideoCodecOptions;
  };
}

/**
 * Concrete encoder parameters for one (preset, accelerator) pair
 */
export interface ArgumentProfile {
  preset: Preset;
  acceleratorMode: AcceleratorMode;
  video: VideoCodecOptions;
  audio: AudioCodecOptions;
  container: 'mp4';
  extension: '.mp4';
}

// Constant rate factor per preset
export const CRF_LEVELS: Record<Preset, { x264: number; nvenc: number }> = {
  quality: { x264: 18, nvenc: 19 },
  balanced: { x264: 23, nvenc: 24 },
  speed: { x264: 28, nvenc: 30 },
};

const SHARED_VIDEO_ARGS = ['-movflags', '+faststart'];

export const ENCODING_PRESETS: Record<Preset, EncodingPreset> = {
  quality: {
    name: 'quality',
    video: {
      codec: 'libx264',
      preset: 'slow',
      crf: CRF_LEVELS.quality.x264,
      pixFmt: 'yuv420p',
      extraArgs: SHARED_VIDEO_ARGS,
    },
    audio: {
      codec: 'aac',
      bitrate: '160k',
    },
    hwAccelVariants: {
      nvidia: {
        codec: 'h264_nvenc',
        preset: 'p7',
        tune: 'hq',
        pixFmt: 'yuv420p',
        extraArgs: ['-rc', 'vbr', '-cq', String(CRF_LEVELS.quality.nvenc), '-b:v', '0', ...SHARED_VIDEO_ARGS],
      },
    },
  },

  balanced: {
    name: 'balanced',
    video: {
      codec: 'libx264',
      preset: 'medium',
      crf: CRF_LEVELS.balanced.x264,
      pixFmt: 'yuv420p',
      extraArgs: SHARED_VIDEO_ARGS,
    },
    audio: {
      codec: 'aac',
      bitrate: '128k',
    },
    hwAccelVariants: {
      nvidia: {
        codec: 'h264_nvenc',
        preset: 'p5',
        tune: 'hq',
        pixFmt: 'yuv420p',
        extraArgs: ['-rc', 'vbr', '-cq', String(CRF_LEVELS.balanced.nvenc), '-b:v', '0', ...SHARED_VIDEO_ARGS],
      },
    },
  },

  speed: {
    name: 'speed',
    video: {
      codec: 'libx264',
      preset: 'veryfast',
      crf: CRF_LEVELS.speed.x264,
      pixFmt: 'yuv420p',
      extraArgs: SHARED_VIDEO_ARGS,
    },
    audio: {
      codec: 'aac',
      bitrate: '96k',
    },
    hwAccelVariants: {
      nvidia: {
        codec: 'h264_nvenc',
        preset: 'p2',
        pixFmt: 'yuv420p',
        extraArgs: ['-rc', 'vbr', '-cq', String(CRF_LEVELS.speed.nvenc), '-b:v', '0', ...SHARED_VIDEO_ARGS],
      },
    },
  },
};

/**
 * Look up the argument profile for a preset and accelerator mode.
 * Total over all pairs; every call returns a fresh copy.
 */
export function argumentsFor(preset: Preset, acceleratorMode: AcceleratorMode): ArgumentProfile {
  const entry = ENCODING_PRESETS[preset];
  const video = acceleratorMode === 'gpu' ? entry.hwAccelVariants.nvidia : entry.video;

  return {
    preset,
    acceleratorMode,
    video: { ...video, extraArgs: [...(video.extraArgs ?? [])] },
    audio: { ...entry.audio },
    container: 'mp4',
    extension: '.mp4',
  };
}

/**
 * Parse a user-supplied preset name (case-insensitive)
 */
export function parsePreset(name: string): Preset | null {
  const lower = name.trim().toLowerCase();
  return PRESETS.find(p => p === lower) ?? null;
}

export function nextPreset(preset: Preset): Preset {
  const index = PRESETS.indexOf(preset);
  return PRESETS[(index + 1) % PRESETS.length] ?? preset;
}

export function prevPreset(preset: Preset): Preset {
  const index = PRESETS.indexOf(preset);
  return PRESETS[(index + PRESETS.length - 1) % PRESETS.length] ?? preset;
}

export function toggleAccelerator(mode: AcceleratorMode): AcceleratorMode {
  return mode === 'gpu' ? 'cpu' : 'gpu';
}
