/**
 * Encoder Location
 * 
 * Finds the ffmpeg executable. Installing it is somebody else's job;
 * this module only answers "is there an encoder, and where".
 * 
 * Priority order:
 * 1. Environment variable (TINYTHIS_FFMPEG_PATH)
 * 2. tinythis app data folder (<data dir>/tinythis/ffmpeg/)
 * 3. Folder of the running program ("local mode")
 * 4. System PATH
 */

import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { delimiter, dirname, join } from 'node:path';
import { executeCommand, logger } from '@tinythis/utils';

export type EncoderSource = 'env' | 'bundled' | 'near-exe' | 'system';

export interface EncoderLocation {
  path: string;
  source: EncoderSource;
}

/**
 * Anything that can answer where the encoder lives
 */
export type EncoderLocator = () => EncoderLocation | null | Promise<EncoderLocation | null>;

export interface LocateOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  /** Directory of the running program */
  programDir?: string;
}

/**
 * Get executable extension for an OS
 */
function getExeExt(platform: NodeJS.Platform): string {
  return platform === 'win32' ? '.exe' : '';
}

function isFile(path: string): boolean {
  try {
    return existsSync(path) && statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Per-user data folder: %LOCALAPPDATA% on Windows, XDG data home elsewhere
 */
export function getAppDataDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  const base = platform === 'win32'
    ? env['LOCALAPPDATA'] ?? join(homedir(), 'AppData', 'Local')
    : env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share');
  return join(base, 'tinythis');
}

/**
 * Candidate encoder paths in priority order
 */
export function getEncoderCandidates(options: LocateOptions = {}): EncoderLocation[] {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const programDir = options.programDir ?? dirname(process.execPath);
  const exeName = 'ffmpeg' + getExeExt(platform);

  const candidates: EncoderLocation[] = [];

  const envPath = env['TINYTHIS_FFMPEG_PATH'];
  if (envPath) {
    candidates.push({ path: envPath, source: 'env' });
  }

  candidates.push({ path: join(getAppDataDir(env, platform), 'ffmpeg', exeName), source: 'bundled' });
  candidates.push({ path: join(programDir, exeName), source: 'near-exe' });

  const searchPath = env['PATH'] ?? env['Path'] ?? '';
  for (const dir of searchPath.split(delimiter)) {
    if (dir) {
      candidates.push({ path: join(dir, exeName), source: 'system' });
    }
  }

  return candidates;
}

/**
 * Locate the encoder, or null when none of the candidates exists
 */
export function locateEncoder(options: LocateOptions = {}): EncoderLocation | null {
  for (const candidate of getEncoderCandidates(options)) {
    if (isFile(candidate.path)) {
      logger.debug({ path: candidate.path, source: candidate.source }, 'Encoder located');
      return candidate;
    }
    if (candidate.source === 'env') {
      logger.warn({ path: candidate.path }, 'TINYTHIS_FFMPEG_PATH does not point at a file');
    }
  }
  return null;
}

/**
 * Check that the located encoder actually runs
 */
export async function isEncoderRunnable(location: EncoderLocation): Promise<boolean> {
  try {
    const result = await executeCommand(location.path, ['-version'], { timeout: 5000 });
    return result.exitCode === 0;
  } catch (error) {
    logger.debug({ path: location.path, error }, 'Encoder failed to start');
    return false;
  }
}
