/**
 * Dry Run Rendering
 */

import { describeLocator, type CommandPlan, type Stage } from '@termplay/core';
import { formatCommandLine, quoteArg } from '@termplay/utils';

function renderStage(stage: Stage): string {
  const line = `${stage.role}: ${formatCommandLine(stage.command, stage.args)}`;
  return stage.stdout.kind === 'file' ? `${line} > ${quoteArg(stage.stdout.path)}` : line;
}

/**
 * Describe every stage of a plan without running anything.
 *
 * One header comment, then `role: command` lines: video-side stages in
 * order, audio last.
 */
export function renderDryRun(plan: CommandPlan): string {
  const lines = [
    `# termplay dry run: format=${plan.format} input=${describeLocator(plan.input)} linkage=${plan.linkage}`,
    ...plan.stages.map(renderStage),
  ];
  if (plan.audio) {
    lines.push(renderStage(plan.audio));
  }
  return `${lines.join('\n')}\n`;
}
