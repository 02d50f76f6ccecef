/**
 * Session Controller
 *
 * State machine behind the interactive screen. Two modes:
 *
 *   browsing    - edit the queue, pick preset and accelerator, start a run
 *   compressing - the queue drains one job at a time; only cancel and quit act
 *
 * Key handlers call dispatch(). The queue's background work only reaches
 * the controller through its events, and every state change happens in a
 * controller method followed by a 'change' event.
 */

import { EventEmitter } from 'node:events';
import {
  DEFAULT_PRESET,
  TinythisError,
  toTinythisError,
  type AcceleratorMode,
  type EncodeSettings,
  type EncoderLocation,
  type EncoderSource,
  type Preset,
} from '@tinythis/core';
import {
  nextPreset,
  prevPreset,
  toggleAccelerator,
  type EncodeJob,
  type JobQueue,
  type JobSnapshot,
  type QueueSummary,
} from '@tinythis/processing';
import { createLogger } from '@tinythis/utils';

const log = createLogger({ module: 'session' });

export type SessionMode = 'browsing' | 'compressing';

export type SessionEvent =
  | 'add-files'
  | 'remove-selected'
  | 'select-prev'
  | 'select-next'
  | 'preset-prev'
  | 'preset-next'
  | 'toggle-accelerator'
  | 'retry-selected'
  | 'run'
  | 'cancel'
  | 'quit';

export type BannerKind = 'info' | 'success' | 'warning' | 'error';

export interface Banner {
  kind: BannerKind;
  text: string;
}

export interface SessionState {
  mode: SessionMode;
  jobs: JobSnapshot[];
  selected: number | null;
  preset: Preset;
  acceleratorMode: AcceleratorMode;
  banner: Banner | null;
  running: JobSnapshot | null;
  lastSummary: QueueSummary | null;
  /** Where the last started job's ffmpeg came from; null until a job starts */
  encoderSource: EncoderSource | null;
  quitting: boolean;
}

/** Asks the user for files; resolves with whatever paths were chosen */
export type FileSelector = () => Promise<string[]>;

export interface SessionOptions {
  queue: JobQueue;
  selectFiles: FileSelector;
  preset?: Preset;
  acceleratorMode?: AcceleratorMode;
  /** Called after the accelerator is toggled so the choice survives restarts */
  persistAccelerator?: (mode: AcceleratorMode) => void | Promise<void>;
}

function formatCounts(summary: QueueSummary): string {
  return `${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled`;
}

export class SessionController extends EventEmitter {
  private readonly queue: JobQueue;
  private readonly options: SessionOptions;

  private mode: SessionMode = 'browsing';
  private selected: number | null = null;
  private preset: Preset;
  private acceleratorMode: AcceleratorMode;
  private banner: Banner | null = null;
  private lastSummary: QueueSummary | null = null;
  private encoderSource: EncoderSource | null = null;
  private quitting = false;

  // Jobs finished during the current run, and whether the user asked to stop it
  private batch: EncodeJob[] = [];
  private stopRequested = false;

  private readonly onFinished = (job: EncodeJob): void => {
    this.handleJobFinished(job);
  };

  private readonly onStarted = (_job: EncodeJob, encoder: EncoderLocation): void => {
    this.encoderSource = encoder.source;
    this.changed();
  };

  private readonly onProgress = (): void => {
    this.changed();
  };

  constructor(options: SessionOptions) {
    super();
    this.options = options;
    this.queue = options.queue;
    this.preset = options.preset ?? DEFAULT_PRESET;
    this.acceleratorMode = options.acceleratorMode ?? 'cpu';

    this.queue.on('started', this.onStarted);
    this.queue.on('finished', this.onFinished);
    this.queue.on('progress', this.onProgress);
  }

  get settings(): EncodeSettings {
    return { preset: this.preset, acceleratorMode: this.acceleratorMode };
  }

  getState(): SessionState {
    const running = this.queue.getRunning();
    return {
      mode: this.mode,
      jobs: this.queue.snapshot(),
      selected: this.selected,
      preset: this.preset,
      acceleratorMode: this.acceleratorMode,
      banner: this.banner,
      running: running ? running.snapshot() : null,
      lastSummary: this.lastSummary,
      encoderSource: this.encoderSource,
      quitting: this.quitting,
    };
  }

  /**
   * Render tick: the current state, with the running job's latest progress
   */
  tick(): SessionState {
    return this.getState();
  }

  async dispatch(event: SessionEvent): Promise<void> {
    if (this.quitting) return;

    if (this.mode === 'compressing') {
      if (event === 'cancel') await this.cancel();
      else if (event === 'quit') await this.quit();
      return;
    }

    switch (event) {
      case 'add-files':
        await this.addFiles(await this.options.selectFiles());
        break;
      case 'remove-selected':
        this.removeSelected();
        break;
      case 'select-prev':
        this.select(this.selected === null ? 0 : this.selected - 1);
        break;
      case 'select-next':
        this.select(this.selected === null ? 0 : this.selected + 1);
        break;
      case 'preset-prev':
        this.setPreset(prevPreset(this.preset));
        break;
      case 'preset-next':
        this.setPreset(nextPreset(this.preset));
        break;
      case 'toggle-accelerator':
        await this.toggleAccelerator();
        break;
      case 'retry-selected':
        this.retrySelected();
        break;
      case 'run':
        await this.run();
        break;
      case 'cancel':
        // Esc while browsing just dismisses the banner
        this.setBanner(null);
        break;
      case 'quit':
        await this.quit();
        break;
    }
  }

  /**
   * Enqueue paths with the active settings. Rejected paths are counted, not fatal.
   */
  async addFiles(paths: string[]): Promise<void> {
    if (paths.length === 0) return;

    let added = 0;
    let ignored = 0;
    for (const path of paths) {
      try {
        await this.queue.enqueue(path, this.settings);
        added++;
      } catch (error) {
        if (!(error instanceof TinythisError)) throw error;
        ignored++;
        log.debug({ path, error: error.message }, 'Input ignored');
      }
    }

    if (this.selected === null && this.queue.length > 0) {
      this.selected = 0;
    }

    const addedText = `Added ${added} file${added === 1 ? '' : 's'}`;
    this.setBanner(ignored > 0
      ? { kind: 'warning', text: `${addedText}, ignored ${ignored} (unsupported, missing or already queued)` }
      : { kind: 'success', text: addedText });
  }

  private removeSelected(): void {
    const index = this.selected;
    const job = index === null ? undefined : this.queue.getJob(index);
    if (index === null || !job) return;

    if (job.state !== 'pending') {
      this.setBanner({ kind: 'warning', text: 'Only queued files can be removed' });
      return;
    }

    this.queue.remove(index);
    this.clampSelection();
    this.setBanner({ kind: 'info', text: `Removed ${job.snapshot().fileName}` });
  }

  private select(index: number): void {
    this.selected = index;
    this.clampSelection();
    this.changed();
  }

  private clampSelection(): void {
    const length = this.queue.length;
    if (length === 0) {
      this.selected = null;
    } else if (this.selected !== null) {
      this.selected = Math.min(Math.max(this.selected, 0), length - 1);
    }
  }

  private setPreset(preset: Preset): void {
    this.preset = preset;
    this.queue.applySettings(this.settings);
    this.changed();
  }

  private async toggleAccelerator(): Promise<void> {
    this.acceleratorMode = toggleAccelerator(this.acceleratorMode);
    this.queue.applySettings(this.settings);

    try {
      await this.options.persistAccelerator?.(this.acceleratorMode);
      this.setBanner({ kind: 'info', text: this.acceleratorMode === 'gpu' ? 'GPU encoding on (NVENC)' : 'GPU encoding off' });
    } catch (error) {
      log.warn({ error: toTinythisError(error) }, 'Could not save accelerator choice');
      this.setBanner({ kind: 'warning', text: 'Accelerator changed, but could not be saved' });
    }
  }

  private retrySelected(): void {
    const index = this.selected;
    const job = index === null ? undefined : this.queue.getJob(index);
    if (index === null || !job) return;

    if (job.state !== 'failed' && job.state !== 'cancelled') {
      this.setBanner({ kind: 'warning', text: 'Only failed or cancelled files can be retried' });
      return;
    }

    try {
      this.queue.retry(index, this.settings);
    } catch (error) {
      if (!(error instanceof TinythisError)) throw error;
      this.setBanner({ kind: 'warning', text: `${job.snapshot().fileName} is already queued` });
      return;
    }
    this.setBanner({ kind: 'info', text: `Queued ${job.snapshot().fileName} again` });
  }

  private async run(): Promise<void> {
    if (!this.queue.hasPending()) {
      this.setBanner({ kind: 'info', text: 'Nothing to compress. Add files first.' });
      return;
    }

    this.mode = 'compressing';
    this.batch = [];
    this.stopRequested = false;
    this.setBanner(null);
    await this.startNext();
  }

  private async startNext(): Promise<void> {
    try {
      const job = await this.queue.runNext();
      if (job && this.stopRequested) {
        await this.queue.cancelRunning();
      } else if (!job && !this.queue.isRunning()) {
        this.settle();
      }
    } catch (error) {
      const err = toTinythisError(error);
      log.error({ error: err }, 'Could not start the next job');
      this.mode = 'browsing';
      if (this.batch.length === 0) {
        this.setBanner({ kind: 'error', text: err.message });
        return;
      }
      // Jobs that finished before the failure still get reported
      const summary = this.queue.summary(this.batch);
      this.lastSummary = summary;
      this.setBanner({ kind: 'error', text: `${err.message} (${formatCounts(summary)})` });
    }
  }

  private handleJobFinished(job: EncodeJob): void {
    if (this.mode !== 'compressing') return;
    this.batch.push(job);

    if (!this.stopRequested && this.queue.hasPending()) {
      this.changed();
      this.startNext().catch((error: unknown) => {
        log.error({ error: toTinythisError(error) }, 'Queue continuation failed');
      });
      return;
    }

    this.settle();
  }

  private async cancel(): Promise<void> {
    this.stopRequested = true;
    const cancelled = await this.queue.cancelRunning();
    if (!cancelled && !this.queue.isRunning() && this.mode === 'compressing') {
      this.settle();
    }
  }

  private async quit(): Promise<void> {
    if (this.mode === 'compressing') {
      await this.cancel();
    }
    this.quitting = true;
    this.queue.off('started', this.onStarted);
    this.queue.off('finished', this.onFinished);
    this.queue.off('progress', this.onProgress);
    this.changed();
    this.emit('quit');
  }

  /**
   * Back to browsing with a summary of the run
   */
  private settle(): void {
    const summary = this.queue.summary(this.batch);
    this.lastSummary = summary;
    this.mode = 'browsing';
    this.clampSelection();

    const counts = formatCounts(summary);
    const clean = summary.failed === 0 && summary.cancelled === 0;
    this.setBanner({
      kind: clean ? 'success' : 'warning',
      text: `${this.stopRequested ? 'Stopped' : 'Finished'}: ${counts}`,
    });
  }

  private setBanner(banner: Banner | null): void {
    this.banner = banner;
    this.changed();
  }

  private changed(): void {
    this.emit('change');
  }
}
