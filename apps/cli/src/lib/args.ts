import type { Preset } from '@tinythis/core';
import { parsePreset } from '@tinythis/processing';

/**
 * Split a leading preset name off the file list: `tinythis speed a.mp4`
 */
export function splitPresetArgument(args: string[]): { preset: Preset | null; files: string[] } {
  const [first, ...rest] = args;
  const preset = first === undefined ? null : parsePreset(first);
  return preset ? { preset, files: rest } : { preset: null, files: args };
}
