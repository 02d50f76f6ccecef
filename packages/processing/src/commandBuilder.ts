/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building the encoder invocation.
 */

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a'
  optional?: boolean;     // Add ? for optional
}

export interface VideoCodecOptions {
  codec: 'libx264' | 'h264_nvenc';
  preset?: string;
  crf?: number;
  tune?: string;
  pixFmt?: string;
  extraArgs?: string[];
}

export interface AudioCodecOptions {
  codec: 'aac';
  bitrate?: string;
  extraArgs?: string[];
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Write machine-readable progress blocks to stdout
   */
  reportProgress(): this {
    return this.addGlobalArg('-progress', 'pipe:1');
  }

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  mapVideo(inputIndex: number, streamIndex: number): this {
    this.mappings.push({ inputIndex, streamSpec: `v:${streamIndex}` });
    return this;
  }

  /**
   * Map every audio stream; optional so silent inputs still encode
   */
  mapAllAudio(inputIndex: number): this {
    this.mappings.push({ inputIndex, streamSpec: 'a', optional: true });
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the argument list (without the executable)
   */
  build(): string[] {
    if (this.inputs.length === 0) throw new Error('At least one input required');
    if (!this.outputFile) throw new Error('Output file required');

    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${mapping.optional ? '?' : ''}`);
    }

    if (this.videoCodec) {
      args.push(...this.buildVideoArgs(this.videoCodec));
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      if (this.audioCodec.extraArgs) args.push(...this.audioCodec.extraArgs);
    }

    args.push(this.outputFile);
    return args;
  }

  private buildVideoArgs(video: VideoCodecOptions): string[] {
    const args = ['-c:v', video.codec];
    if (video.preset) args.push('-preset', video.preset);
    if (video.tune) args.push('-tune', video.tune);
    if (video.crf !== undefined) args.push('-crf', String(video.crf));
    if (video.pixFmt) args.push('-pix_fmt', video.pixFmt);
    if (video.extraArgs) args.push(...video.extraArgs);
    return args;
  }
}

/**
 * Full encoder invocation for one input/output pair
 */
export function buildEncodeArgs(
  profile: { video: VideoCodecOptions; audio: AudioCodecOptions },
  inputFile: string,
  outputFile: string
): string[] {
  return new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner', '-nostdin', '-nostats', '-y')
    .reportProgress()
    .addInput(inputFile)
    .mapVideo(0, 0)
    .mapAllAudio(0)
    .setVideoCodec(profile.video)
    .setAudioCodec(profile.audio)
    .setOutput(outputFile)
    .build();
}
