/**
 * Command Composer
 *
 * Turns a resolved config into the command plan for its format.
 */

import {
  UnsupportedFormatError,
  describeLocator,
  type CommandPlan,
  type Format,
  type ResolvedConfig,
  type Stage,
  type ToolPaths,
} from '@termplay/core';
import { formatCommandLine, splitFlags } from '@termplay/utils';
import { PLAN_BUILDERS, toolFlag, type PlanBuilder, type PlanContext } from './planBuilders.js';

const BUILDERS_BY_FORMAT: ReadonlyMap<Format, PlanBuilder> = new Map(
  PLAN_BUILDERS.flatMap((builder) => builder.formats.map((format) => [format, builder] as const))
);

/**
 * ffplay stage playing the input's audio with no window
 */
export function buildAudioStage(config: ResolvedConfig, tools: ToolPaths): Stage {
  const input = config.input.kind === 'file' ? config.input.path : 'pipe:0';
  return {
    role: 'audio',
    tool: 'ffplay',
    command: tools.ffplay,
    args: [
      '-nodisp',
      '-autoexit',
      '-loglevel',
      'error',
      ...splitFlags(toolFlag(config, 'ffplay')),
      ...config.audioFlags,
      input,
    ],
    stdin: config.input.kind === 'stream' ? 'source' : 'none',
    stdout: { kind: 'discard' },
  };
}

export async function composePlan(config: ResolvedConfig, context: PlanContext): Promise<CommandPlan> {
  const builder = BUILDERS_BY_FORMAT.get(config.format);
  if (!builder) {
    throw new UnsupportedFormatError(config.format);
  }

  context.logger.debug({ format: config.format, builder: builder.name }, 'Composing command plan');

  if (builder.preflight) {
    await builder.preflight(context);
  }

  const video = builder.build(config, context);

  if (config.videoFlags.length > 0 && !video.stages.some((stage) => stage.tool === 'ffmpeg')) {
    context.logger.warn(
      { format: config.format, input: describeLocator(config.input), videoFlags: config.videoFlags },
      'Extra video flags ignored: this plan has no ffmpeg stage'
    );
  }

  const plan: CommandPlan = Object.freeze({
    format: config.format,
    input: config.input,
    linkage: video.linkage,
    stages: Object.freeze(video.stages),
    audio: config.audio ? buildAudioStage(config, context.tools) : null,
  });

  for (const stage of [...plan.stages, ...(plan.audio ? [plan.audio] : [])]) {
    context.logger.debug({ role: stage.role, command: formatCommandLine(stage.command, stage.args) }, 'Planned stage');
  }

  return plan;
}
