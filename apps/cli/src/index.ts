#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 *   tinythis [preset] <file...>   compress files and exit
 *   tinythis                      interactive session (on a terminal)
 *   tinythis encoder              show which ffmpeg is used
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { TinythisError, type AcceleratorMode, type Preset } from '@tinythis/core';
import { parsePreset } from '@tinythis/processing';
import { setLogLevel } from '@tinythis/utils';
import { encoderLocateOptions, loadConfig, type CliConfig } from './config/index.js';
import { EXIT_CODES, compressCommand, type ExitCode } from './commands/compress.js';
import { encoderCommand } from './commands/encoder.js';
import { interactiveCommand } from './commands/interactive.js';
import { splitPresetArgument } from './lib/args.js';
import { printError } from './lib/output.js';

interface ProgramOptions {
  mode?: string;
  gpu?: boolean;
  cpu?: boolean;
  debug?: boolean;
}

const VERSION = '0.4.0';

function loadConfigOrExit(): CliConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof TinythisError) {
      printError(error.message);
      process.exit(EXIT_CODES.USAGE);
    }
    throw error;
  }
}

async function runDefault(args: string[], options: ProgramOptions): Promise<ExitCode> {
  if (options.debug) setLogLevel('debug');
  const config = loadConfigOrExit();

  let acceleratorMode: AcceleratorMode = config.gpu ? 'gpu' : 'cpu';
  if (options.gpu) acceleratorMode = 'gpu';
  if (options.cpu) acceleratorMode = 'cpu';

  const { preset: positional, files } = splitPresetArgument(args);
  let preset: Preset = positional ?? config.defaultPreset;
  if (options.mode !== undefined) {
    const parsed = parsePreset(options.mode);
    if (!parsed) {
      printError(`Unknown preset: ${options.mode} (use quality, balanced or speed)`);
      return EXIT_CODES.USAGE;
    }
    preset = parsed;
  }

  if (files.length === 0) {
    if (args.length === 0 && process.stdin.isTTY && process.stdout.isTTY) {
      return interactiveCommand({ ...config, defaultPreset: preset }, acceleratorMode);
    }
    printError('No input files');
    console.log('Run', chalk.cyan('tinythis --help'), 'for usage');
    return EXIT_CODES.USAGE;
  }

  const abort = new AbortController();
  process.once('SIGINT', () => abort.abort());

  return compressCommand(files, {
    settings: { preset, acceleratorMode },
    cancelGraceMs: config.env.TINYTHIS_CANCEL_GRACE_MS,
    locate: encoderLocateOptions(config),
    signal: abort.signal,
  });
}

const program = new Command();

program
  .name('tinythis')
  .description('Compress videos with ffmpeg using one of three presets')
  .version(VERSION)
  .argument('[inputs...]', 'optional preset (quality, balanced, speed) followed by video files')
  .option('-m, --mode <preset>', 'preset to use (quality, balanced, speed)')
  .option('--gpu', 'encode on an NVIDIA GPU (NVENC)')
  .option('--cpu', 'encode on the CPU (x264)')
  .option('--debug', 'Enable debug output')
  .action(async (inputs: string[], options: ProgramOptions) => {
    process.exit(await runDefault(inputs, options));
  });

program
  .command('encoder')
  .description('Show which ffmpeg is used and whether it runs')
  .option('-v, --verbose', 'Show every location searched')
  .action(async (options: { verbose?: boolean }) => {
    const config = loadConfigOrExit();
    process.exit(await encoderCommand({ verbose: options.verbose, locate: encoderLocateOptions(config) }));
  });

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(EXIT_CODES.OK);
  }
  process.exit(EXIT_CODES.USAGE);
});

await program.parseAsync();
