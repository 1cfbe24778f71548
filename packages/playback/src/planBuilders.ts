/**
 * Plan Builders
 *
 * One builder per group of formats that share a streaming strategy.
 * Each builder produces the video-side stages of a command plan.
 */

import { join } from 'node:path';
import {
  BUILTIN_PROFILES,
  DependencyMissingError,
  isCacaFormat,
  type Format,
  type Linkage,
  type ResolvedConfig,
  type Stage,
  type StageSink,
  type ToolFlagKey,
  type ToolFlags,
  type ToolPaths,
  type ToolProbe,
} from '@termplay/core';
import { splitFlags, type Logger } from '@termplay/utils';
import { FFmpegCommandBuilder } from './commandBuilder.js';

export interface PlanContext {
  tools: ToolPaths;
  /** Scratch directory for intermediate frames. */
  tempDir: string;
  probe: ToolProbe;
  logger: Logger;
}

export interface VideoPlan {
  linkage: Linkage;
  stages: Stage[];
}

export interface PlanBuilder {
  readonly name: string;
  readonly formats: readonly Format[];
  /** Checks run before building; throw to abort. */
  preflight?(context: PlanContext): Promise<void>;
  build(config: ResolvedConfig, context: PlanContext): VideoPlan;
}

/**
 * Tool flags used when neither a profile nor the user supplied them:
 * the built-in profile of the same format
 */
export function defaultToolFlags(format: Format): Readonly<ToolFlags> {
  const builtin = BUILTIN_PROFILES.find((entry) => entry.name === format);
  if (!builtin) return {};
  // icat takes no client flags unless a profile asks for them
  return format === 'kitty' ? { filter: builtin.flags.filter } : builtin.flags;
}

/**
 * Flag string for a tool: the profile's value when it set one, else the default
 */
export function toolFlag(config: ResolvedConfig, key: ToolFlagKey): string | undefined {
  return config.toolFlags[key] ?? defaultToolFlags(config.format)[key];
}

function renderSink(config: ResolvedConfig): StageSink {
  return config.output.kind === 'file' ? { kind: 'file', path: config.output.path } : { kind: 'terminal' };
}

function transcodeStage(builder: FFmpegCommandBuilder, context: PlanContext, stdout: StageSink): Stage {
  return {
    role: 'video',
    tool: 'ffmpeg',
    command: context.tools.ffmpeg,
    args: builder.build(),
    stdin: builder.readsStdin ? 'source' : 'none',
    stdout,
  };
}

/**
 * ffmpeg stage streaming raw rgb24 frames to stdout
 */
function rawFrameStage(config: ResolvedConfig, context: PlanContext): Stage {
  const builder = new FFmpegCommandBuilder()
    .quiet()
    .setInput(config.input)
    .addVideoFilter(toolFlag(config, 'filter'))
    .setFrameRate(config.fps)
    .addOutputArgs('-f', 'rawvideo', '-pix_fmt', 'rgb24', ...config.videoFlags)
    .setOutputToStdout();

  return transcodeStage(builder, context, { kind: 'downstream' });
}

export const rawFramePipelineBuilder: PlanBuilder = {
  name: 'raw frame pipeline',
  formats: ['sixel'],
  build(config, context) {
    const render: Stage = {
      role: 'render',
      tool: 'chafa',
      command: context.tools.chafa,
      args: splitFlags(toolFlag(config, 'chafa')),
      stdin: 'upstream',
      stdout: renderSink(config),
    };
    return { linkage: 'pipeline', stages: [rawFrameStage(config, context), render] };
  },
};

export const graphicsClientBuilder: PlanBuilder = {
  name: 'graphics client',
  formats: ['kitty'],
  async preflight(context) {
    if (!(await context.probe('kitty'))) {
      throw new DependencyMissingError('kitty', 'kitty +kitten icat is required for kitty output');
    }
  },
  build(config, context) {
    const clientFlags = splitFlags(toolFlag(config, 'kitty'));
    const icat = ['+kitten', 'icat', '--clear'];

    if (config.input.kind === 'file') {
      const render: Stage = {
        role: 'render',
        tool: 'kitty',
        command: context.tools.kitty,
        args: [...icat, '--stdin=no', ...clientFlags, config.input.path],
        stdin: 'none',
        stdout: renderSink(config),
      };
      return { linkage: 'single', stages: [render] };
    }

    const render: Stage = {
      role: 'render',
      tool: 'kitty',
      command: context.tools.kitty,
      args: [...icat, '--stdin=yes', ...clientFlags],
      stdin: 'upstream',
      stdout: renderSink(config),
    };
    return { linkage: 'pipeline', stages: [rawFrameStage(config, context), render] };
  },
};

function textRenderStage(config: ResolvedConfig, context: PlanContext, image: string): Stage {
  if (isCacaFormat(config.format)) {
    return {
      role: 'render',
      tool: 'img2txt',
      command: context.tools.img2txt,
      args: ['-f', config.format, ...splitFlags(toolFlag(config, 'img2txt')), image],
      stdin: 'none',
      stdout: renderSink(config),
    };
  }
  return {
    role: 'render',
    tool: 'jp2a',
    command: context.tools.jp2a,
    args: [...splitFlags(toolFlag(config, 'jp2a')), image],
    stdin: 'none',
    stdout: renderSink(config),
  };
}

export const STILL_FRAME_NAME = 'frame.png';

export const stillFrameBuilder: PlanBuilder = {
  name: 'still frame',
  formats: ['ascii', 'ansi', 'utf8', 'caca'],
  build(config, context) {
    if (config.input.kind === 'file') {
      return { linkage: 'single', stages: [textRenderStage(config, context, config.input.path)] };
    }

    const frame = join(context.tempDir, STILL_FRAME_NAME);
    const extract = new FFmpegCommandBuilder()
      .quiet()
      .setInput(config.input)
      .addVideoFilter(toolFlag(config, 'filter'))
      .addOutputArgs('-frames:v', '1', ...config.videoFlags)
      .setOutputFile(frame);

    return {
      linkage: 'sequence',
      stages: [transcodeStage(extract, context, { kind: 'terminal' }), textRenderStage(config, context, frame)],
    };
  },
};

export const transcodeBuilder: PlanBuilder = {
  name: 'transcode',
  formats: ['gif', 'mp4'],
  build(config, context) {
    const builder = new FFmpegCommandBuilder()
      .quiet()
      .setInput(config.input)
      .addVideoFilter(toolFlag(config, 'filter'))
      .setFrameRate(config.fps);

    if (config.format === 'gif') {
      builder.addOutputArgs('-f', 'gif');
    }
    builder.addOutputArgs(...splitFlags(toolFlag(config, 'encoder')), ...config.videoFlags);

    if (config.output.kind === 'file') {
      builder.setOutputFile(config.output.path);
    } else {
      if (config.format === 'mp4') {
        builder.addOutputArgs('-movflags', 'frag_keyframe+empty_moov', '-f', 'mp4');
      }
      builder.setOutputToStdout();
    }

    return { linkage: 'single', stages: [transcodeStage(builder, context, { kind: 'terminal' })] };
  },
};

export const PLAN_BUILDERS: readonly PlanBuilder[] = [
  rawFramePipelineBuilder,
  graphicsClientBuilder,
  stillFrameBuilder,
  transcodeBuilder,
];
