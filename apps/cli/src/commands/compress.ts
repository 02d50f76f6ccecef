/**
 * Compress Command
 *
 * One-shot run: queue the given files, encode them one after another
 * with a spinner, print a summary and map the outcome to an exit code.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ResourceUnavailableError,
  TinythisError,
  locateEncoder,
  type EncodeSettings,
  type EncoderLocation,
  type EncoderLocator,
  type LocateOptions,
} from '@tinythis/core';
import {
  JobQueue,
  formatBytes,
  formatPercent,
  type EncodeJob,
  type JobProgress,
  type JobResult,
  type ProcessLauncher,
} from '@tinythis/processing';
import { createLogger, formatDuration } from '@tinythis/utils';
import { formatSummary, printError, printInfo } from '../lib/output.js';

const log = createLogger({ module: 'compress' });

export const EXIT_CODES = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
  NO_ENCODER: 3,
  INTERRUPTED: 130,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export interface CompressOptions {
  settings: EncodeSettings;
  cancelGraceMs?: number;
  /** Where to search for ffmpeg when no locator is given */
  locate?: LocateOptions;
  locateEncoder?: EncoderLocator;
  launcher?: ProcessLauncher;
  /** Aborted on Ctrl+C: the running job is cancelled and nothing else starts */
  signal?: AbortSignal;
  /** Animate the spinner; defaults to whether stderr is a terminal */
  spinner?: boolean;
}

export async function compressCommand(inputs: string[], options: CompressOptions): Promise<ExitCode> {
  const queue = new JobQueue({
    locateEncoder: options.locateEncoder ?? (() => locateEncoder(options.locate)),
    launcher: options.launcher,
    cancelGraceMs: options.cancelGraceMs,
    defaults: options.settings,
  });

  let rejected = 0;
  for (const input of inputs) {
    try {
      await queue.enqueue(input, options.settings);
    } catch (error) {
      if (!(error instanceof TinythisError)) throw error;
      rejected++;
      printError(error.message);
    }
  }

  if (queue.length === 0) {
    printError('No valid input files');
    return EXIT_CODES.USAGE;
  }

  const total = queue.length;
  const { preset, acceleratorMode } = options.settings;
  printInfo(`Compressing ${total} file${total === 1 ? '' : 's'} with ${chalk.cyan(preset)} on the ${acceleratorMode.toUpperCase()}`);

  const spinner = ora({ isEnabled: options.spinner ?? process.stderr.isTTY });
  let position = 0;
  let label = '';
  let localNoticeShown = false;

  queue.on('started', (job: EncodeJob, encoder: EncoderLocation) => {
    if (encoder.source === 'near-exe' && !localNoticeShown) {
      localNoticeShown = true;
      printInfo(`Local mode: using ffmpeg next to tinythis (${encoder.path})`);
    }
    position++;
    label = `[${position}/${total}] ${job.snapshot().fileName}`;
    spinner.start(label);
  });

  queue.on('progress', (_job: EncodeJob, progress: JobProgress) => {
    spinner.text = `${label} ${formatPercent(progress.fraction)}${progress.stats.speed > 0 ? chalk.gray(` ${progress.stats.speed.toFixed(1)}x`) : ''}`;
  });

  queue.on('finished', (_job: EncodeJob, result: JobResult) => {
    const took = chalk.gray(`(${formatDuration(result.duration)})`);
    switch (result.state) {
      case 'succeeded':
        spinner.succeed(`${label} → ${result.outputFile ?? ''} ${chalk.gray(formatBytes(result.outputSize ?? 0))} ${took}`);
        break;
      case 'failed':
        spinner.fail(`${label} ${chalk.red(result.error?.message ?? 'failed')} ${took}`);
        break;
      case 'cancelled':
        spinner.warn(`${label} cancelled`);
        break;
    }
  });

  const onAbort = (): void => {
    log.info('Interrupted, cancelling the running job');
    queue.cancelRunning().catch((error: unknown) => {
      log.error({ error }, 'Cancel failed');
    });
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const summary = await queue.runToCompletion(options.signal);
    const line = formatSummary(summary);

    if (options.signal?.aborted) {
      printError(`Interrupted: ${line}`);
      return EXIT_CODES.INTERRUPTED;
    }

    if (summary.failed > 0 || summary.cancelled > 0 || rejected > 0) {
      printError(rejected > 0 ? `${line}, ${rejected} rejected` : line);
      return EXIT_CODES.FAILED;
    }

    printInfo(chalk.green(line));
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof ResourceUnavailableError) {
      spinner.stop();
      printError(error.message);
      return EXIT_CODES.NO_ENCODER;
    }
    throw error;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}
