/**
 * CLI Runner
 *
 * Resolves the command line and dispatches to a command. Returns the
 * process exit code instead of exiting so it can be driven from tests.
 */

import { homedir } from 'node:os';
import type { Readable, Writable } from 'node:stream';
import { ProfileStore, TermplayError, type ToolProbe } from '@termplay/core';
import { createLogger, isRegularFile, type Launcher, type Logger } from '@termplay/utils';
import { loadConfig } from './config/index.js';
import { printError } from './lib/output.js';
import { resolveOptions, wantsVerbose } from './options.js';
import { helpCommand } from './commands/help.js';
import { listProfilesCommand, restoreDefaultsCommand } from './commands/profiles.js';
import { playCommand } from './commands/play.js';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  home?: string;
  logger?: Logger;
  stdout?: Writable;
  input?: Readable;
  launcher?: Launcher;
  probe?: ToolProbe;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let logger: Logger | undefined;

  try {
    const config = loadConfig(deps.env ?? process.env, deps.home ?? homedir());
    const log = deps.logger ?? createLogger({ level: wantsVerbose(argv) ? 'debug' : config.logLevel });
    logger = log;

    const store = new ProfileStore({ path: config.profilesPath, logger: log });
    const profiles = await store.load();
    const action = await resolveOptions(argv, { profiles, isFile: isRegularFile });

    switch (action.kind) {
      case 'help':
        helpCommand(profiles, config.profilesPath);
        break;
      case 'list-profiles':
        listProfilesCommand(profiles);
        break;
      case 'restore-defaults':
        await restoreDefaultsCommand(store);
        break;
      case 'play':
        await playCommand(action.config, {
          tools: config.tools,
          logger: log,
          stdout: deps.stdout ?? process.stdout,
          input: deps.input,
          launcher: deps.launcher,
          probe: deps.probe,
        });
        break;
    }
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof TermplayError) {
      logger?.debug({ err: error, code: error.code, details: error.details }, 'Command failed');
      printError(error.message);
      return EXIT_FAILURE;
    }
    if (error instanceof Error) {
      logger?.error({ err: error }, 'Unexpected error');
      printError(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
