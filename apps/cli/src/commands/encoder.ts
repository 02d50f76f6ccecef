/**
 * Encoder Command
 *
 * Shows which ffmpeg tinythis would use, where it was found and whether it runs.
 */

import chalk from 'chalk';
import {
  getEncoderCandidates,
  isEncoderRunnable,
  locateEncoder,
  type EncoderLocation,
  type EncoderLocator,
  type LocateOptions,
} from '@tinythis/core';
import { ENCODER_HINT } from '@tinythis/processing';
import { printError, printKeyValue, printSuccess, printWarning } from '../lib/output.js';
import { EXIT_CODES, type ExitCode } from './compress.js';

export interface EncoderCommandOptions {
  verbose?: boolean;
  locate?: LocateOptions;
  locateEncoder?: EncoderLocator;
  isRunnable?: (location: EncoderLocation) => Promise<boolean>;
}

export async function encoderCommand(options: EncoderCommandOptions = {}): Promise<ExitCode> {
  if (options.verbose) {
    console.log(chalk.bold('Search order:'));
    for (const candidate of getEncoderCandidates(options.locate)) {
      printKeyValue(candidate.source, candidate.path);
    }
    console.log();
  }

  const locate: EncoderLocator = options.locateEncoder ?? (() => locateEncoder(options.locate));
  const location = await locate();
  if (!location) {
    printError(`ffmpeg not found; ${ENCODER_HINT}`);
    return EXIT_CODES.NO_ENCODER;
  }

  printKeyValue('path', location.path);
  printKeyValue('source', location.source);

  const runnable = await (options.isRunnable ?? isEncoderRunnable)(location);
  if (!runnable) {
    printWarning('Found, but `ffmpeg -version` did not run');
    return EXIT_CODES.NO_ENCODER;
  }

  printSuccess('ffmpeg is ready');
  return EXIT_CODES.OK;
}
