/**
 * CLI Configuration
 *
 * Environment variables, validated with zod, and a small JSON file with
 * the choices that persist between sessions.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { DEFAULT_PRESET, PRESETS, ValidationError, type LocateOptions } from '@tinythis/core';
import { DEFAULT_CANCEL_GRACE_MS } from '@tinythis/processing';
import { createLogger } from '@tinythis/utils';

const log = createLogger({ module: 'config' });

export const CONFIG_FILE_NAME = 'config.json';

// Environment schema
const envSchema = z.object({
  TINYTHIS_FFMPEG_PATH: z.string().min(1).optional(),
  TINYTHIS_HOME: z.string().min(1).optional(),
  TINYTHIS_CANCEL_GRACE_MS: z.coerce.number().int().min(0).default(DEFAULT_CANCEL_GRACE_MS),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

// Config file schema
const configFileSchema = z.object({
  gpu: z.boolean().default(false),
  defaultPreset: z.enum(PRESETS).default(DEFAULT_PRESET),
});

export type CliEnv = z.infer<typeof envSchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig extends ConfigFile {
  env: CliEnv;
  configDir: string;
  configFile: string;
}

export function parseEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue ? issue.path.join('.') : 'environment',
      issue ? `Invalid environment variable (${issue.message})` : 'Invalid environment',
      { issues: parsed.error.issues }
    );
  }
  return parsed.data;
}

export function getConfigDir(env: Pick<CliEnv, 'TINYTHIS_HOME'>): string {
  return env.TINYTHIS_HOME ?? join(homedir(), '.tinythis');
}

/**
 * Read the config file. Missing, unreadable or invalid files give the defaults.
 */
export function loadConfigFile(configDir: string): ConfigFile {
  const file = join(configDir, CONFIG_FILE_NAME);
  const defaults = configFileSchema.parse({});

  if (!existsSync(file)) return defaults;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    log.warn({ file, error }, 'Could not read config file, using defaults');
    return defaults;
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ file, issues: parsed.error.issues }, 'Invalid config file, using defaults');
    return defaults;
  }
  return parsed.data;
}

// Save config to file
export function saveConfig(configDir: string, updates: Partial<ConfigFile>): ConfigFile {
  mkdirSync(configDir, { recursive: true });
  const merged = { ...loadConfigFile(configDir), ...updates };
  writeFileSync(join(configDir, CONFIG_FILE_NAME), JSON.stringify(merged, null, 2));
  return merged;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsedEnv = parseEnv(env);
  const configDir = getConfigDir(parsedEnv);
  return {
    ...loadConfigFile(configDir),
    env: parsedEnv,
    configDir,
    configFile: join(configDir, CONFIG_FILE_NAME),
  };
}

/**
 * Encoder search options built from the validated environment, so the
 * locator sees the same TINYTHIS_FFMPEG_PATH that passed the schema
 */
export function encoderLocateOptions(config: Pick<CliConfig, 'env'>, env: NodeJS.ProcessEnv = process.env): LocateOptions {
  return { env: { ...env, TINYTHIS_FFMPEG_PATH: config.env.TINYTHIS_FFMPEG_PATH } };
}
