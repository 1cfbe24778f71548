/**
 * FFmpeg Command Builder
 *
 * Fluent API for the ffmpeg invocations termplay needs: one input
 * (a file or stdin), a `-vf` chain, output flags and one output
 * (a file or stdout).
 */

import type { MediaLocator } from '@termplay/core';

export const FFMPEG_STDIN = 'pipe:0';
export const FFMPEG_STDOUT = 'pipe:1';

export class FFmpegCommandBuilder {
  private globalArgs: string[] = [];
  private inputTarget: string = FFMPEG_STDIN;
  private videoFilters: string[] = [];
  private outputArgs: string[] = [];
  private outputTarget: string = FFMPEG_STDOUT;
  private overwrite = false;

  /**
   * Add global arguments (before the input)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Quiet ffmpeg down to errors only
   */
  quiet(): this {
    return this.addGlobalArg('-hide_banner', '-loglevel', 'error');
  }

  /**
   * Read from a file, or from stdin for a stream
   */
  setInput(input: MediaLocator): this {
    this.inputTarget = input.kind === 'file' ? input.path : FFMPEG_STDIN;
    return this;
  }

  /**
   * Add a filter to the `-vf` chain. Empty filters are skipped.
   */
  addVideoFilter(filter: string | undefined): this {
    const trimmed = filter?.trim();
    if (trimmed) {
      this.videoFilters.push(trimmed);
    }
    return this;
  }

  /**
   * Prepend an `fps=` rate filter
   */
  setFrameRate(fps: number): this {
    this.videoFilters.unshift(`fps=${fps}`);
    return this;
  }

  /**
   * Add output arguments (after the filters, before the output)
   */
  addOutputArgs(...args: readonly string[]): this {
    this.outputArgs.push(...args);
    return this;
  }

  /**
   * Write to a file, overwriting without asking
   */
  setOutputFile(file: string): this {
    this.outputTarget = file;
    this.overwrite = true;
    return this;
  }

  /**
   * Write to stdout
   */
  setOutputToStdout(): this {
    this.outputTarget = FFMPEG_STDOUT;
    this.overwrite = false;
    return this;
  }

  get readsStdin(): boolean {
    return this.inputTarget === FFMPEG_STDIN;
  }

  get writesStdout(): boolean {
    return this.outputTarget === FFMPEG_STDOUT;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [...this.globalArgs, '-i', this.inputTarget];

    if (this.videoFilters.length > 0) {
      args.push('-vf', this.videoFilters.join(','));
    }

    args.push(...this.outputArgs);

    if (this.overwrite) {
      args.push('-y');
    }
    args.push(this.outputTarget);

    return args;
  }
}
