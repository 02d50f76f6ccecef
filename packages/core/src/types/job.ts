/**
 * Job Types
 */

export const PRESETS = ['quality', 'balanced', 'speed'] as const;
export type Preset = typeof PRESETS[number];
export const DEFAULT_PRESET: Preset = 'balanced';

export const ACCELERATOR_MODES = ['cpu', 'gpu'] as const;
export type AcceleratorMode = typeof ACCELERATOR_MODES[number];

export const JOB_STATES = ['pending', 'running', 'succeeded', 'failed', 'cancelled'] as const;
export type JobState = typeof JOB_STATES[number];

/**
 * Preset and accelerator bound to a job when it is created
 */
export interface EncodeSettings {
  preset: Preset;
  acceleratorMode: AcceleratorMode;
}

export interface InputFile {
  /** Absolute path */
  path: string;
  /** Lowercase extension without the dot */
  extension: string;
  sizeBytes: number;
}
