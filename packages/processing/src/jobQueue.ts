/**
 * Job Queue
 *
 * Ordered jobs, processed strictly first-in first-out, one encoder at a
 * time. A failed job never stops the queue; it is history, and a retry is
 * a new job at the end.
 */

import { EventEmitter } from 'node:events';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  DEFAULT_PRESET,
  QueueError,
  ResourceUnavailableError,
  ValidationError,
  toTinythisError,
  type EncodeSettings,
  type EncoderLocator,
  type InputFile,
  type JobState,
} from '@tinythis/core';
import { createLogger, getExtension, isErrnoException, normalizePathKey } from '@tinythis/utils';
import {
  DEFAULT_CANCEL_GRACE_MS,
  EncodeJob,
  type JobProgress,
  type JobResult,
  type JobSnapshot,
  type ProcessLauncher,
} from './encodeJob.js';

const log = createLogger({ module: 'job-queue' });

export const SUPPORTED_EXTENSIONS = ['mp4', 'mov', 'avi', 'webm', 'ogv', 'asx', 'mpeg', 'm4v', 'wmv', 'mpg'] as const;

export const ENCODER_HINT = 'install ffmpeg on PATH, set TINYTHIS_FFMPEG_PATH, or put ffmpeg next to tinythis';

export function isSupportedVideo(filePath: string): boolean {
  const ext = getExtension(filePath);
  return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

export interface JobQueueOptions {
  locateEncoder: EncoderLocator;
  launcher?: ProcessLauncher;
  cancelGraceMs?: number;
  defaults?: EncodeSettings;
}

export type QueueSummary = Record<JobState, number> & { total: number };

export class JobQueue extends EventEmitter {
  private jobs: EncodeJob[] = [];
  private running: EncodeJob | null = null;
  private starting = false;
  private readonly options: JobQueueOptions;
  private readonly defaults: EncodeSettings;

  constructor(options: JobQueueOptions) {
    super();
    this.options = options;
    this.defaults = options.defaults ?? { preset: DEFAULT_PRESET, acceleratorMode: 'cpu' };
  }

  get length(): number {
    return this.jobs.length;
  }

  getJobs(): readonly EncodeJob[] {
    return [...this.jobs];
  }

  getJob(index: number): EncodeJob | undefined {
    return this.jobs[index];
  }

  getRunning(): EncodeJob | null {
    return this.running;
  }

  isRunning(): boolean {
    return this.running !== null || this.starting;
  }

  hasPending(): boolean {
    return this.jobs.some(job => job.state === 'pending');
  }

  snapshot(): JobSnapshot[] {
    return this.jobs.map(job => job.snapshot());
  }

  /**
   * Validate a file and append a pending job for it
   */
  async enqueue(filePath: string, settings: EncodeSettings = this.defaults): Promise<EncodeJob> {
    const absolute = resolve(filePath);

    if (!isSupportedVideo(absolute)) {
      throw new ValidationError(filePath, 'Unsupported input extension', {
        extension: getExtension(absolute),
        supported: SUPPORTED_EXTENSIONS,
      });
    }

    let sizeBytes: number;
    try {
      const stats = await stat(absolute);
      if (!stats.isFile()) {
        throw new ValidationError(filePath, 'Not a file');
      }
      sizeBytes = stats.size;
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      const code = isErrnoException(error) ? error.code : undefined;
      throw new ValidationError(filePath, code === 'ENOENT' ? 'File not found' : 'File not accessible', { code });
    }

    this.assertNotPending(absolute, filePath);

    const input: InputFile = { path: absolute, extension: getExtension(absolute), sizeBytes };
    return this.add(input, settings);
  }

  /**
   * Remove a pending job. Running and finished jobs cannot be removed.
   */
  remove(index: number): EncodeJob {
    const job = this.jobs[index];
    if (!job) {
      throw new QueueError(`No job at index ${index}`, { index, length: this.jobs.length });
    }
    if (job.state !== 'pending') {
      throw new QueueError(`Cannot remove a ${job.state} job`, { index, jobId: job.id, state: job.state });
    }

    this.jobs.splice(index, 1);
    job.removeAllListeners();
    log.debug({ jobId: job.id, index }, 'Job removed');
    this.emit('removed', job, index);
    return job;
  }

  /**
   * Queue a fresh job for the file of a failed or cancelled one
   */
  retry(index: number, settings?: EncodeSettings): EncodeJob {
    const job = this.jobs[index];
    if (!job) {
      throw new QueueError(`No job at index ${index}`, { index, length: this.jobs.length });
    }
    if (job.state !== 'failed' && job.state !== 'cancelled') {
      throw new QueueError(`Only failed or cancelled jobs can be retried, this one is ${job.state}`, { jobId: job.id });
    }
    this.assertNotPending(job.input.path, job.input.path);

    return this.add(job.input, settings ?? { preset: job.preset, acceleratorMode: job.acceleratorMode });
  }

  /**
   * A file may have at most one pending job
   */
  private assertNotPending(path: string, label: string): void {
    const key = normalizePathKey(path);
    if (this.jobs.some(job => job.state === 'pending' && normalizePathKey(job.input.path) === key)) {
      throw new ValidationError(label, 'Already queued');
    }
  }

  /**
   * Re-bind every pending job to new settings
   */
  applySettings(settings: EncodeSettings): number {
    let changed = 0;
    for (const job of this.jobs) {
      if (job.state === 'pending') {
        job.rebind(settings);
        changed++;
      }
    }
    return changed;
  }

  /**
   * Start the lowest-index pending job.
   *
   * No-op (null) while another job is running or when nothing is pending.
   * Throws ResourceUnavailableError, without touching any job, when there
   * is no encoder. Resolves once the job is running.
   */
  async runNext(): Promise<EncodeJob | null> {
    if (this.isRunning()) return null;

    const next = this.jobs.find(job => job.state === 'pending');
    if (!next) return null;

    this.starting = true;
    try {
      const encoder = await this.options.locateEncoder();
      if (!encoder) {
        throw new ResourceUnavailableError('ffmpeg', ENCODER_HINT);
      }

      // The job may have been removed while the encoder was being located
      const job = this.jobs.find(j => j.state === 'pending');
      if (!job) return null;

      this.running = job;
      const completion = job.start(encoder, { launcher: this.options.launcher });
      this.emit('started', job, encoder);

      void completion.then(
        result => this.onFinished(job, result),
        (error: unknown) => {
          log.error({ jobId: job.id, error: toTinythisError(error) }, 'Job crashed');
          this.running = null;
        }
      );

      return job;
    } finally {
      this.starting = false;
    }
  }

  /**
   * Cancel the running job, if any. Pending jobs stay queued.
   */
  async cancelRunning(): Promise<EncodeJob | null> {
    const job = this.running;
    if (!job) return null;

    await job.cancel(this.options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS);
    return job;
  }

  /**
   * Run pending jobs one after another until none are left.
   * Aborting the signal stops the drain; pending jobs stay pending.
   */
  async runToCompletion(signal?: AbortSignal): Promise<QueueSummary> {
    while (!signal?.aborted) {
      const job = await this.runNext();
      if (!job) break;

      // Aborted while the job was starting
      if (signal?.aborted) {
        await job.cancel(this.options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS);
      }
      await job.wait();
    }
    return this.summary();
  }

  summary(jobs: readonly EncodeJob[] = this.jobs): QueueSummary {
    const summary: QueueSummary = {
      pending: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      cancelled: 0,
      total: jobs.length,
    };
    for (const job of jobs) {
      summary[job.state]++;
    }
    return summary;
  }

  private add(input: InputFile, settings: EncodeSettings): EncodeJob {
    const job = new EncodeJob(input, settings);
    job.on('progress', (progress: JobProgress) => this.emit('progress', job, progress));

    this.jobs.push(job);
    log.debug({ jobId: job.id, input: input.path, ...settings }, 'Job queued');
    this.emit('enqueued', job);
    return job;
  }

  private onFinished(job: EncodeJob, result: JobResult): void {
    if (this.running === job) {
      this.running = null;
    }
    this.emit('finished', job, result);
  }
}
