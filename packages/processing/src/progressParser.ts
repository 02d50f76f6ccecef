/**
 * Progress Parser
 * 
 * Turns the encoder's `-progress pipe:1` key=value blocks into progress
 * events. The total duration comes from the "Duration:" line the encoder
 * prints on stderr while probing the input.
 */

import type { Readable } from 'node:stream';
import { createInterface } from 'node:readline';
import { parseTimecodeUs } from '@tinythis/utils';

/** Upper bound for the fraction until the job reaches a terminal state */
export const MAX_RUNNING_FRACTION = 0.99;

export interface ProgressStats {
  frame: number;
  fps: number;
  speed: number;  // x realtime
  totalSize: number;  // bytes
  outTimeUs: number;
}

export interface ProgressEvent {
  stats: ProgressStats;
  /** Fraction complete in [0, 0.99]; never decreases */
  fraction: number;
  durationUs: number;
  phase: 'running' | 'end';
}

export class FFmpegProgressParser {
  private durationUs = 0;
  private fraction = 0;

  private current: ProgressStats = {
    frame: 0,
    fps: 0,
    speed: 0,
    totalSize: 0,
    outTimeUs: 0,
  };

  getDurationUs(): number {
    return this.durationUs;
  }

  /**
   * Look for "  Duration: 00:00:08.05, start: 0.000000, bitrate: ..."
   * Only the first duration counts (the input's, not a later output's).
   */
  parseStderrLine(line: string): void {
    if (this.durationUs > 0) return;

    const idx = line.indexOf('Duration: ');
    if (idx === -1) return;

    const timecode = line.slice(idx + 'Duration: '.length).split(',')[0] ?? '';
    const us = parseTimecodeUs(timecode);
    if (us !== null && us > 0) {
      this.durationUs = us;
    }
  }

  /**
   * Feed one stdout line. Returns an event at the end of each progress block.
   */
  parseProgressLine(line: string): ProgressEvent | null {
    const match = line.trim().match(/^(\w+)=(.*)$/);
    if (!match) return null;

    const key = match[1] ?? '';
    const value = (match[2] ?? '').trim();

    switch (key) {
      case 'frame':
        this.current.frame = parseIntOr(value, this.current.frame);
        break;
      case 'fps':
        this.current.fps = parseFloatOr(value, this.current.fps);
        break;
      case 'total_size':
        this.current.totalSize = parseIntOr(value, this.current.totalSize);
        break;
      case 'speed':
        this.current.speed = parseFloatOr(value.replace('x', ''), this.current.speed);
        break;
      // out_time_ms is in microseconds as well, despite the name
      case 'out_time_us':
      case 'out_time_ms':
        this.updateOutTime(parseIntOr(value, -1));
        break;
      case 'out_time':
        this.updateOutTime(parseTimecodeUs(value) ?? -1);
        break;
      case 'progress':
        return {
          stats: { ...this.current },
          fraction: this.fraction,
          durationUs: this.durationUs,
          phase: value === 'end' ? 'end' : 'running',
        };
    }

    return null;
  }

  private updateOutTime(us: number): void {
    if (us < 0) return;
    this.current.outTimeUs = us;

    if (this.durationUs <= 0) return;
    const raw = Math.min(us / this.durationUs, MAX_RUNNING_FRACTION);
    this.fraction = Math.max(this.fraction, raw);
  }
}

function parseIntOr(value: string, fallback: number): number {
  const n = parseInt(value, 10);
  return Number.isFinite(n) ? n : fallback;
}

function parseFloatOr(value: string, fallback: number): number {
  const n = parseFloat(value);
  return Number.isFinite(n) ? n : fallback;
}

/**
 * Lazy, finite sequence of progress events read from the encoder's stdout.
 * Ends when the stream closes; a new job needs a new sequence.
 */
export async function* readProgressEvents(
  stdout: Readable,
  parser: FFmpegProgressParser
): AsyncGenerator<ProgressEvent> {
  const lines = createInterface({ input: stdout, crlfDelay: Infinity });
  for await (const line of lines) {
    const event = parser.parseProgressLine(line);
    if (event) yield event;
  }
}

/**
 * Format bytes to human readable
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / Math.pow(1024, i);
  
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}

/**
 * Whole percent for display
 */
export function formatPercent(fraction: number): string {
  return `${Math.floor(Math.max(0, Math.min(1, fraction)) * 100)}%`;
}
