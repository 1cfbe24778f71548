/**
 * Play Command
 *
 * Composes the plan for a resolved config, then prints it (dry run) or
 * runs it.
 */

import type { Readable, Writable } from 'node:stream';
import {
  StageFailedError,
  createToolProbe,
  describeLocator,
  type ResolvedConfig,
  type ToolPaths,
  type ToolProbe,
} from '@termplay/core';
import { PlanExecutor, composePlan, renderDryRun } from '@termplay/playback';
import { TempWorkspace, type Launcher, type Logger } from '@termplay/utils';
import { printWarning } from '../lib/output.js';

export interface PlayDeps {
  tools: ToolPaths;
  logger: Logger;
  stdout: Writable;
  input?: Readable;
  launcher?: Launcher;
  probe?: ToolProbe;
}

export async function playCommand(config: ResolvedConfig, deps: PlayDeps): Promise<void> {
  const { logger } = deps;
  logger.debug(
    {
      input: describeLocator(config.input),
      output: describeLocator(config.output),
      format: config.format,
      fps: config.fps,
      profile: config.profile,
      videoFlags: config.videoFlags,
      audioFlags: config.audioFlags,
      audio: config.audio,
    },
    'Resolved options'
  );

  const workspace = await TempWorkspace.create();
  try {
    const plan = await composePlan(config, {
      tools: deps.tools,
      tempDir: workspace.path,
      probe: deps.probe ?? createToolProbe(deps.tools, deps.launcher),
      logger,
    });

    if (config.dryRun) {
      deps.stdout.write(renderDryRun(plan));
      return;
    }

    const executor = new PlanExecutor({ launcher: deps.launcher, logger });
    const result = await executor.execute(plan, { input: deps.input });

    if (result.audio && result.audio.exitCode !== 0) {
      printWarning(`Audio playback exited with code ${result.audio.exitCode}`);
    }
    if (result.failedStage) {
      const failed = result.failedStage;
      throw new StageFailedError(failed.role, failed.command, failed.exitCode);
    }
  } finally {
    await workspace.dispose();
  }
}
