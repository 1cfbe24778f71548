/**
 * CLI Configuration
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, resolveToolPaths, type ToolPaths } from '@termplay/core';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Environment schema
const envSchema = z.object({
  TERMPLAY_PROFILES: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface CliConfig {
  configDir: string;
  /** JSON file holding user profile overrides. */
  profilesPath: string;
  logLevel: LogLevel;
  tools: ToolPaths;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      issue ? `Invalid environment: ${issue.path.join('.')}: ${issue.message}` : 'Invalid environment',
      { issues: parsed.error.issues.map((entry) => entry.message) }
    );
  }

  const configDir = join(home, '.termplay');

  return {
    configDir,
    profilesPath: parsed.data.TERMPLAY_PROFILES ?? join(configDir, 'profiles.json'),
    logLevel: parsed.data.LOG_LEVEL ?? 'warn',
    tools: resolveToolPaths(env),
  };
}
