/**
 * FFmpeg Command Builder
 *
 * Fluent API for assembling ffmpeg argument lists: inputs, a complex
 * filter graph, stream mappings, codecs and container options.
 */

export interface InputOptions {
  duration?: number;      // -t duration, seconds
}

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4
}

/**
 * Either a stream of an input ("0:a?") or a filter graph pad ("[dual_fisheye]")
 */
export type StreamMapping =
  | { kind: 'stream'; inputIndex: number; streamSpec: string; optional: boolean }
  | { kind: 'label'; label: string };

export interface VideoCodecOptions {
  codec: 'libx264';
  preset?: string;
  crf?: number;
  pixFmt?: string;
}

/**
 * Audio is always passed through untouched
 */
export type AudioCodec = 'copy';

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodec | null = null;
  private complexFilter: string | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];
  private binary: string;

  constructor(binary: string = 'ffmpeg') {
    this.binary = binary;
  }

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ kind: 'stream', inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map a labelled filter graph output
   */
  mapLabel(label: string): this {
    this.mappings.push({ kind: 'label', label });
    return this;
  }

  /**
   * Map all audio streams from input, if any
   */
  mapAudio(inputIndex: number = 0, optional: boolean = true): this {
    return this.map(inputIndex, 'a', optional);
  }

  /**
   * Set the video encoder
   */
  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(codec: AudioCodec): this {
    this.audioCodec = codec;
    return this;
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(filterGraph: string): this {
    this.complexFilter = filterGraph;
    return this;
  }

  /**
   * Set output options
   */
  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      if (input.options.duration !== undefined) {
        args.push('-t', input.options.duration.toString());
      }
      args.push('-i', input.file);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', this.complexFilter);
    }

    // Mappings
    for (const mapping of this.mappings) {
      if (mapping.kind === 'label') {
        args.push('-map', `[${mapping.label}]`);
      } else {
        const opt = mapping.optional ? '?' : '';
        args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
      }
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
      if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
      if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec);
    }

    // Output options
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(): string {
    return [this.binary, ...this.build()].map(quoteArg).join(' ');
  }
}

/**
 * Quote an argument for display when it holds shell-significant characters
 */
export function quoteArg(arg: string): string {
  return /[\s;[\]?"']/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}
