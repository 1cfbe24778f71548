/**
 * @termplay/playback
 *
 * Command composition and execution layer.
 *
 * Profiles are data: nothing here evaluates profile content, it only
 * splits flag strings into argument vectors.
 */

// FFmpeg command builder
export { FFmpegCommandBuilder, FFMPEG_STDIN, FFMPEG_STDOUT } from './commandBuilder.js';

// Plan builders
export {
  PLAN_BUILDERS,
  defaultToolFlags,
  STILL_FRAME_NAME,
  toolFlag,
  rawFramePipelineBuilder,
  graphicsClientBuilder,
  stillFrameBuilder,
  transcodeBuilder,
  type PlanBuilder,
  type PlanContext,
  type VideoPlan,
} from './planBuilders.js';

// Composer
export { composePlan, buildAudioStage } from './composer.js';

// Dry run
export { renderDryRun } from './dryRun.js';

// Executor
export {
  PlanExecutor,
  BackgroundTask,
  validatePlan,
  type ExecuteOptions,
  type ExecutionResult,
  type PlanExecutorOptions,
  type StageOutcome,
} from './planExecutor.js';
