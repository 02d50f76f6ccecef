import { describe, expect, it } from 'vitest';
import { FFmpegCommandBuilder, buildEncodeArgs } from './commandBuilder.js';
import { argumentsFor } from './presets.js';

describe('buildEncodeArgs', () => {
  it('builds the CPU invocation', () => {
    const args = buildEncodeArgs(argumentsFor('balanced', 'cpu'), '/in/a.mov', '/in/a.tinythis.balanced.mp4');

    expect(args).toEqual([
      '-hide_banner', '-nostdin', '-nostats', '-y',
      '-progress', 'pipe:1',
      '-i', '/in/a.mov',
      '-map', '0:v:0',
      '-map', '0:a?',
      '-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-pix_fmt', 'yuv420p',
      '-movflags', '+faststart',
      '-c:a', 'aac', '-b:a', '128k',
      '/in/a.tinythis.balanced.mp4',
    ]);
  });

  it('builds the GPU invocation without a tune for speed', () => {
    const args = buildEncodeArgs(argumentsFor('speed', 'gpu'), 'in.mp4', 'out.mp4');

    expect(args.slice(args.indexOf('-c:v'), args.indexOf('-c:a'))).toEqual([
      '-c:v', 'h264_nvenc', '-preset', 'p2', '-pix_fmt', 'yuv420p',
      '-rc', 'vbr', '-cq', '30', '-b:v', '0',
      '-movflags', '+faststart',
    ]);
    expect(args[args.length - 1]).toBe('out.mp4');
  });
});

describe('FFmpegCommandBuilder', () => {
  it('requires an input', () => {
    expect(() => new FFmpegCommandBuilder().setOutput('out.mp4').build()).toThrow('At least one input required');
  });

  it('requires an output', () => {
    expect(() => new FFmpegCommandBuilder().addInput('in.mp4').build()).toThrow('Output file required');
  });
});
