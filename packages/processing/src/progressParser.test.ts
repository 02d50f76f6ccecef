import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import {
  FFmpegProgressParser,
  formatBytes,
  formatPercent,
  readProgressEvents,
  type ProgressEvent,
} from './progressParser.js';

function block(outTimeUs: number, progress: 'continue' | 'end' = 'continue'): string[] {
  return [
    'frame=120',
    'fps=30.00',
    'total_size=1048576',
    `out_time_us=${outTimeUs}`,
    'speed=2.5x',
    `progress=${progress}`,
  ];
}

function feed(parser: FFmpegProgressParser, lines: string[]): ProgressEvent[] {
  const events: ProgressEvent[] = [];
  for (const line of lines) {
    const event = parser.parseProgressLine(line);
    if (event) events.push(event);
  }
  return events;
}

describe('FFmpegProgressParser', () => {
  it('reads the input duration from the stderr banner', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:08.05, start: 0.000000, bitrate: 123 kb/s');
    expect(parser.getDurationUs()).toBe(8_050_000);
  });

  it('keeps the first duration it sees', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:10.00, start: 0.000000');
    parser.parseStderrLine('  Duration: 00:00:02.00, start: 0.000000');
    expect(parser.getDurationUs()).toBe(10_000_000);
  });

  it('emits one event per progress block', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:10.00, start: 0.000000');

    const events = feed(parser, block(2_500_000));

    expect(events).toHaveLength(1);
    expect(events[0]).toEqual({
      stats: { frame: 120, fps: 30, speed: 2.5, totalSize: 1048576, outTimeUs: 2_500_000 },
      fraction: 0.25,
      durationUs: 10_000_000,
      phase: 'running',
    });
  });

  it('caps the fraction at 0.99 even at the end marker', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:10.00, start: 0.000000');

    const events = feed(parser, block(10_000_000, 'end'));

    expect(events[0]?.fraction).toBe(0.99);
    expect(events[0]?.phase).toBe('end');
  });

  it('never lets the fraction go backwards', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:10.00, start: 0.000000');

    const events = feed(parser, [...block(6_000_000), ...block(4_000_000)]);

    expect(events.map(e => e.fraction)).toEqual([0.6, 0.6]);
  });

  it('ignores unknown or negative times', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:10.00, start: 0.000000');

    const events = feed(parser, ['out_time_us=-9223372036854775807', 'out_time=N/A', 'progress=continue']);

    expect(events[0]?.fraction).toBe(0);
  });

  it('falls back to out_time timecodes', () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:04.00, start: 0.000000');

    const events = feed(parser, ['out_time=00:00:01.000000', 'progress=continue']);

    expect(events[0]?.fraction).toBe(0.25);
  });

  it('reports no progress without a known duration', () => {
    const parser = new FFmpegProgressParser();
    const events = feed(parser, block(5_000_000));
    expect(events[0]?.fraction).toBe(0);
  });
});

describe('readProgressEvents', () => {
  it('yields events until the stream ends', async () => {
    const parser = new FFmpegProgressParser();
    parser.parseStderrLine('  Duration: 00:00:10.00, start: 0.000000');
    const stdout = new PassThrough();

    stdout.end([...block(1_000_000), ...block(5_000_000, 'end')].join('\n') + '\n');

    const fractions: number[] = [];
    for await (const event of readProgressEvents(stdout, parser)) {
      fractions.push(event.fraction);
    }

    expect(fractions).toEqual([0.1, 0.5]);
  });
});

describe('formatting', () => {
  it('formats bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
  });

  it('floors percentages', () => {
    expect(formatPercent(0.999)).toBe('99%');
    expect(formatPercent(1)).toBe('100%');
  });
});
