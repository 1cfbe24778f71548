/**
 * Tool Configuration
 *
 * Paths of the external tools termplay drives.
 *
 * Priority order:
 * 1. Environment variable (e.g. FFMPEG_PATH), when it names an existing file
 * 2. The bare tool name, resolved through PATH at spawn time
 */

import { existsSync } from 'node:fs';
import { probeCommand, type Launcher } from '@termplay/utils';
import type { ToolName } from '../types/plan.js';

export type ToolPaths = Readonly<Record<ToolName, string>>;

export const TOOL_ENV_VARS: Readonly<Record<ToolName, string>> = {
  ffmpeg: 'FFMPEG_PATH',
  ffplay: 'FFPLAY_PATH',
  chafa: 'CHAFA_PATH',
  jp2a: 'JP2A_PATH',
  img2txt: 'IMG2TXT_PATH',
  kitty: 'KITTY_PATH',
};

function resolveToolPath(tool: ToolName, env: NodeJS.ProcessEnv): string {
  const envPath = env[TOOL_ENV_VARS[tool]];
  if (envPath && existsSync(envPath)) {
    return envPath;
  }
  return tool;
}

export function resolveToolPaths(env: NodeJS.ProcessEnv = process.env): ToolPaths {
  return Object.freeze({
    ffmpeg: resolveToolPath('ffmpeg', env),
    ffplay: resolveToolPath('ffplay', env),
    chafa: resolveToolPath('chafa', env),
    jp2a: resolveToolPath('jp2a', env),
    img2txt: resolveToolPath('img2txt', env),
    kitty: resolveToolPath('kitty', env),
  });
}

export type ToolProbe = (tool: ToolName) => Promise<boolean>;

/**
 * Probe that runs `<tool> --version` and reports whether it exited zero
 */
export function createToolProbe(paths: ToolPaths, launcher?: Launcher): ToolProbe {
  return (tool) => probeCommand(paths[tool], ['--version'], launcher);
}
