/**
 * Output Path Resolution
 * 
 * <dir>/<stem>.tinythis.<preset>.mp4, then .2.mp4, .3.mp4, ... on collision.
 * The chosen name is reserved by creating it exclusively, so two jobs can
 * never be handed the same destination and nothing existing is overwritten.
 */

import { open } from 'node:fs/promises';
import { dirname, join, parse } from 'node:path';
import { FilesystemError, type Preset } from '@tinythis/core';
import { isErrnoException, logger } from '@tinythis/utils';

export const OUTPUT_TAG = 'tinythis';
export const OUTPUT_EXTENSION = '.mp4';
export const MAX_COLLISION_SUFFIX = 9999;

export interface ResolvedOutput {
  path: string;
  /** False when the placeholder could not be created (e.g. unwritable directory) */
  reserved: boolean;
  /** errno code that prevented the reservation */
  reason?: string;
}

/**
 * Name for attempt `n` (1 = no suffix)
 */
export function candidateOutputPath(inputPath: string, preset: Preset, n: number = 1): string {
  const { dir, name } = parse(inputPath);
  const suffix = n > 1 ? `.${n}` : '';
  return join(dir || dirname(inputPath), `${name}.${OUTPUT_TAG}.${preset}${suffix}${OUTPUT_EXTENSION}`);
}

/**
 * Resolve and reserve a destination that does not exist yet.
 * Called when a job starts, against the filesystem as it is at that moment.
 */
export async function resolveOutputPath(inputPath: string, preset: Preset): Promise<ResolvedOutput> {
  for (let n = 1; n <= MAX_COLLISION_SUFFIX; n++) {
    const candidate = candidateOutputPath(inputPath, preset, n);

    try {
      const handle = await open(candidate, 'wx');
      await handle.close();
      return { path: candidate, reserved: true };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        continue;
      }

      // Still hand back a path; the job fails when it tries to use it
      const reason = isErrnoException(error) ? error.code : undefined;
      logger.warn({ candidate, reason }, 'Could not reserve output path');
      return { path: candidate, reserved: false, reason };
    }
  }

  throw new FilesystemError(
    candidateOutputPath(inputPath, preset),
    'No free output name',
    `tried ${MAX_COLLISION_SUFFIX} suffixes`
  );
}
