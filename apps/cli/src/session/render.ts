/**
 * Session rendering. Pure: state in, lines out.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { EncoderSource } from '@tinythis/core';
import type { JobSnapshot } from '@tinythis/processing';
import { formatBytes, formatPercent } from '@tinythis/processing';
import type { Banner, SessionState } from './controller.js';

export interface RenderOptions {
  /** Colour instance; pass a level-0 Chalk for plain text */
  chalk?: ChalkInstance;
}

const BAR_WIDTH = 20;

export const BROWSING_KEYS = 'a add  del remove  up/down select  left/right preset  g gpu  r retry  enter compress  q quit';
export const COMPRESSING_KEYS = 'esc cancel  q quit';

export function progressBar(fraction: number, width: number = BAR_WIDTH): string {
  const filled = Math.round(Math.max(0, Math.min(1, fraction)) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

const SOURCE_LABELS: Record<EncoderSource, string> = {
  env: 'TINYTHIS_FFMPEG_PATH',
  bundled: 'bundled',
  'near-exe': 'local mode',
  system: 'PATH',
};

function jobStatus(job: JobSnapshot, c: ChalkInstance): string {
  switch (job.state) {
    case 'pending':
      return c.gray('queued');
    case 'running':
      return c.cyan(`${progressBar(job.progress)} ${formatPercent(job.progress)}`);
    case 'succeeded':
      return c.green('done');
    case 'failed':
      return c.red(job.error ? `failed: ${job.error}` : 'failed');
    case 'cancelled':
      return c.yellow('cancelled');
  }
}

function bannerLine(banner: Banner, c: ChalkInstance): string {
  switch (banner.kind) {
    case 'success':
      return c.green(`✓ ${banner.text}`);
    case 'warning':
      return c.yellow(`! ${banner.text}`);
    case 'error':
      return c.red(`✗ ${banner.text}`);
    case 'info':
      return c.blue(`i ${banner.text}`);
  }
}

export function renderSession(state: SessionState, options: RenderOptions = {}): string[] {
  const c = options.chalk ?? chalk;
  const lines: string[] = [];

  const encoder = state.acceleratorMode === 'gpu' ? 'gpu (nvenc)' : 'cpu (x264)';
  const source = state.encoderSource ? `  ffmpeg: ${c.gray(SOURCE_LABELS[state.encoderSource])}` : '';
  lines.push(`${c.bold('tinythis')}  preset: ${c.cyan(state.preset)}  encoder: ${c.cyan(encoder)}${source}`);
  lines.push('');

  if (state.jobs.length === 0) {
    lines.push(c.gray('  No files queued. Press a to add videos.'));
  } else {
    const nameWidth = Math.max(...state.jobs.map(job => job.fileName.length));
    state.jobs.forEach((job, index) => {
      const marker = index === state.selected ? '>' : ' ';
      const settings = `${job.preset}/${job.acceleratorMode}`;
      lines.push(`${marker} ${job.fileName.padEnd(nameWidth)}  ${formatBytes(job.sizeBytes).padStart(10)}  ${settings.padEnd(12)}  ${jobStatus(job, c)}`);
    });
  }

  lines.push('');
  if (state.banner) {
    lines.push(bannerLine(state.banner, c));
  }
  lines.push(c.gray(state.mode === 'compressing' ? COMPRESSING_KEYS : BROWSING_KEYS));

  return lines;
}
