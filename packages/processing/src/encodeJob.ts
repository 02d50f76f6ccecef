/**
 * Encode Job
 *
 * One input file's transcode. Owns the encoder subprocess from spawn to
 * exit, turns its progress stream into events, and decides the outcome:
 * a job only succeeds when the encoder exits cleanly AND the output file
 * is non-empty. Failed and cancelled jobs never leave their output behind.
 */

import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import { basename } from 'node:path';
import type { Readable } from 'node:stream';
import {
  CancellationError,
  ExecutionError,
  FilesystemError,
  JobStateMachine,
  StateTransitionError,
  toTinythisError,
  type EncodeSettings,
  type EncoderLocation,
  type InputFile,
  type JobState,
  type TinythisError,
} from '@tinythis/core';
import {
  createLogger,
  getFileSizeBytes,
  removeFileIfExists,
  removeFileIfExistsSync,
  settlesWithin,
} from '@tinythis/utils';
import { buildEncodeArgs } from './commandBuilder.js';
import { resolveOutputPath } from './outputPath.js';
import { argumentsFor } from './presets.js';
import {
  FFmpegProgressParser,
  readProgressEvents,
  type ProgressStats,
} from './progressParser.js';

const log = createLogger({ module: 'encode-job' });

export const DEFAULT_CANCEL_GRACE_MS = 5000;
const STDERR_TAIL_LINES = 30;
const STREAM_DRAIN_MS = 2000;

/**
 * The parts of a child process a job relies on
 */
export interface EncoderProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

export type ProcessLauncher = (command: string, args: readonly string[]) => EncoderProcess;

export const spawnEncoder: ProcessLauncher = (command, args) =>
  spawn(command, [...args], {
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
  });

export type FinishedState = Extract<JobState, 'succeeded' | 'failed' | 'cancelled'>;

export interface JobResult {
  jobId: string;
  state: FinishedState;
  inputFile: string;
  /** Final output on success; the attempted destination otherwise (already removed) */
  outputFile: string | null;
  outputSize?: number;

  // Timing
  startTime: Date;
  endTime: Date;
  duration: number;

  // Command info
  command: string;
  exitCode: number | null;

  error?: TinythisError;
}

export interface JobProgress {
  jobId: string;
  fraction: number;
  stats: ProgressStats;
}

/**
 * Read-only view for rendering
 */
export interface JobSnapshot {
  id: string;
  fileName: string;
  inputPath: string;
  sizeBytes: number;
  preset: EncodeSettings['preset'];
  acceleratorMode: EncodeSettings['acceleratorMode'];
  state: JobState;
  progress: number;
  outputFile: string | null;
  error: string | null;
}

export interface StartOptions {
  launcher?: ProcessLauncher;
}

interface ExitOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export class EncodeJob extends EventEmitter {
  readonly id: string;
  readonly input: InputFile;

  private settings: EncodeSettings;
  private readonly machine: JobStateMachine;
  private fraction = 0;
  private outputPath: string | null = null;
  private child: EncoderProcess | null = null;
  private cancelRequested = false;
  private completion: Promise<JobResult> | null = null;
  private result: JobResult | null = null;

  constructor(input: InputFile, settings: EncodeSettings) {
    super();
    this.id = randomUUID();
    this.input = input;
    this.settings = { ...settings };
    this.machine = new JobStateMachine(this.id);
  }

  get state(): JobState {
    return this.machine.getState();
  }

  get preset(): EncodeSettings['preset'] {
    return this.settings.preset;
  }

  get acceleratorMode(): EncodeSettings['acceleratorMode'] {
    return this.settings.acceleratorMode;
  }

  /** Fraction complete in [0, 1] */
  get progress(): number {
    return this.fraction;
  }

  get outputFile(): string | null {
    return this.outputPath;
  }

  getResult(): JobResult | null {
    return this.result;
  }

  isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  /**
   * Change preset/accelerator. Only a job that hasn't started may change.
   */
  rebind(settings: EncodeSettings): void {
    if (this.state !== 'pending') {
      throw new StateTransitionError(this.id, this.state, 'pending', 'Settings can only change while a job is pending');
    }
    this.settings = { ...settings };
  }

  /**
   * pending → running. Resolves when the job reaches a terminal state;
   * never rejects (every outcome is a JobResult).
   */
  start(encoder: EncoderLocation, options: StartOptions = {}): Promise<JobResult> {
    this.machine.transitionTo('running');
    this.emit('state', this.snapshot());

    this.completion = this.run(encoder, options.launcher ?? spawnEncoder);
    return this.completion;
  }

  /**
   * Wait for the job to finish. Null for a job that never started.
   */
  wait(): Promise<JobResult | null> {
    return this.completion ?? Promise.resolve(this.result);
  }

  /**
   * Cancel the job. A running encoder gets SIGTERM, then SIGKILL after
   * the grace period. Resolves with the final result.
   */
  async cancel(graceMs: number = DEFAULT_CANCEL_GRACE_MS): Promise<JobResult | null> {
    if (this.state === 'pending') {
      const now = new Date();
      return this.finish('cancelled', {
        startTime: now,
        command: '',
        exitCode: null,
        error: new CancellationError(this.id),
      });
    }

    if (this.state !== 'running' || !this.completion) {
      return this.result;
    }

    this.cancelRequested = true;
    const child = this.child;

    if (child) {
      log.info({ jobId: this.id }, 'Cancelling job');
      child.kill('SIGTERM');

      if (!(await settlesWithin(this.completion, graceMs))) {
        log.warn({ jobId: this.id, graceMs }, 'Encoder ignored SIGTERM, killing');
        child.kill('SIGKILL');
      }
    }

    return this.completion;
  }

  snapshot(): JobSnapshot {
    return {
      id: this.id,
      fileName: basename(this.input.path),
      inputPath: this.input.path,
      sizeBytes: this.input.sizeBytes,
      preset: this.settings.preset,
      acceleratorMode: this.settings.acceleratorMode,
      state: this.state,
      progress: this.fraction,
      outputFile: this.outputPath,
      error: this.result?.error?.message ?? null,
    };
  }

  private async run(encoder: EncoderLocation, launcher: ProcessLauncher): Promise<JobResult> {
    const startTime = new Date();
    let command = '';

    try {
      const resolved = await resolveOutputPath(this.input.path, this.settings.preset);
      const outputPath = resolved.path;
      this.outputPath = outputPath;

      if (this.cancelRequested) {
        await removeFileIfExists(outputPath);
        return this.finish('cancelled', { startTime, command, exitCode: null, error: new CancellationError(this.id) });
      }

      if (!resolved.reserved) {
        return this.finish('failed', {
          startTime,
          command,
          exitCode: null,
          error: new FilesystemError(outputPath, 'Output directory is not writable', resolved.reason),
        });
      }

      const profile = argumentsFor(this.settings.preset, this.settings.acceleratorMode);
      const args = buildEncodeArgs(profile, this.input.path, outputPath);
      command = [encoder.path, ...args].join(' ');

      log.info({ jobId: this.id, input: this.input.path, output: outputPath, preset: profile.preset, accelerator: profile.acceleratorMode }, 'Starting encode');
      log.debug({ jobId: this.id, command }, 'Encoder command');

      const outcome = await this.execute(encoder.path, args, launcher, outputPath);

      if (this.cancelRequested) {
        await removeFileIfExists(outputPath);
        return this.finish('cancelled', { startTime, command, exitCode: outcome.code, error: new CancellationError(this.id) });
      }

      if (outcome.error) {
        await removeFileIfExists(outputPath);
        return this.finish('failed', {
          startTime,
          command,
          exitCode: null,
          error: new ExecutionError(`Failed to start encoder: ${outcome.error.message}`, command, null, ''),
        });
      }

      const outputSize = await getFileSizeBytes(outputPath);

      if (outcome.code === 0 && outputSize !== null && outputSize > 0) {
        this.fraction = 1;
        return this.finish('succeeded', { startTime, command, exitCode: 0, outputSize });
      }

      await removeFileIfExists(outputPath);
      const stderr = outcome.stderrTail.join('\n');
      const message = outcome.code === 0
        ? 'Encoder exited successfully but produced no output'
        : `Encoder exited with ${outcome.code === null ? `signal ${outcome.signal ?? 'unknown'}` : `code ${outcome.code}`}`;

      return this.finish('failed', {
        startTime,
        command,
        exitCode: outcome.code,
        error: new ExecutionError(message, command, outcome.code, stderr),
      });
    } catch (error) {
      if (this.outputPath) {
        await removeFileIfExists(this.outputPath).catch((cleanupError: unknown) => {
          log.error({ jobId: this.id, error: cleanupError }, 'Could not remove partial output');
        });
      }
      return this.finish(this.cancelRequested ? 'cancelled' : 'failed', {
        startTime,
        command,
        exitCode: null,
        error: this.cancelRequested ? new CancellationError(this.id) : toTinythisError(error),
      });
    }
  }

  /**
   * Spawn the encoder and wait for it, reading progress and stderr as it goes
   */
  private async execute(
    executable: string,
    args: string[],
    launcher: ProcessLauncher,
    outputPath: string
  ): Promise<ExitOutcome & { stderrTail: string[] }> {
    const child = launcher(executable, args);
    this.child = child;

    // If tinythis itself goes away mid-encode, take the encoder and its partial output with it
    const exitGuard = (): void => {
      child.kill('SIGKILL');
      removeFileIfExistsSync(outputPath);
    };
    process.once('exit', exitGuard);

    const exited = new Promise<ExitOutcome>(resolve => {
      child.once('close', (code, signal) => resolve({ code, signal }));
      child.once('error', error => resolve({ code: null, signal: null, error }));
    });

    const parser = new FFmpegProgressParser();
    const stderrTail: string[] = [];

    const readers = Promise.all([
      child.stderr ? this.readStderr(child.stderr, parser, stderrTail) : Promise.resolve(),
      child.stdout ? this.readProgress(child.stdout, parser) : Promise.resolve(),
    ]);

    try {
      const outcome = await exited;

      if (!(await settlesWithin(readers, STREAM_DRAIN_MS))) {
        child.stdout?.destroy();
        child.stderr?.destroy();
      }

      return { ...outcome, stderrTail };
    } finally {
      process.removeListener('exit', exitGuard);
      this.child = null;
    }
  }

  private async readProgress(stdout: Readable, parser: FFmpegProgressParser): Promise<void> {
    try {
      for await (const event of readProgressEvents(stdout, parser)) {
        if (event.fraction < this.fraction) continue;
        this.fraction = event.fraction;
        const progress: JobProgress = { jobId: this.id, fraction: event.fraction, stats: event.stats };
        this.emit('progress', progress);
      }
    } catch (error) {
      log.debug({ jobId: this.id, error }, 'Progress stream closed with error');
    }
  }

  private async readStderr(stderr: Readable, parser: FFmpegProgressParser, tail: string[]): Promise<void> {
    try {
      const lines = createInterface({ input: stderr, crlfDelay: Infinity });
      for await (const line of lines) {
        parser.parseStderrLine(line);
        tail.push(line);
        if (tail.length > STDERR_TAIL_LINES) tail.shift();
      }
    } catch (error) {
      log.debug({ jobId: this.id, error }, 'Stderr stream closed with error');
    }
  }

  private finish(
    state: FinishedState,
    details: Pick<JobResult, 'startTime' | 'command' | 'exitCode' | 'outputSize' | 'error'>
  ): JobResult {
    this.machine.transitionTo(state, details.error?.message);

    const endTime = new Date();
    const result: JobResult = {
      jobId: this.id,
      state,
      inputFile: this.input.path,
      outputFile: this.outputPath,
      startTime: details.startTime,
      endTime,
      duration: endTime.getTime() - details.startTime.getTime(),
      command: details.command,
      exitCode: details.exitCode,
      outputSize: details.outputSize,
      error: details.error,
    };
    this.result = result;

    const level = state === 'failed' ? 'warn' : 'info';
    log[level]({
      jobId: this.id,
      state,
      exitCode: result.exitCode,
      duration: result.duration,
      outputSize: result.outputSize,
      error: result.error?.message,
    }, 'Job finished');

    this.emit('state', this.snapshot());
    this.emit('finished', result);
    return result;
  }
}
