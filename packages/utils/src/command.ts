/**
 * Process Launching
 *
 * Thin wrapper over child_process.spawn that exposes just what the
 * playback engine wires together: the stdio streams and a promise for
 * the exit status. Everything above this layer talks to the `Launcher`
 * type so tests can substitute an in-process fake.
 */

import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

/** Exit status reported for a command that could not be spawned. */
export const EXIT_COMMAND_NOT_FOUND = 127;

export type StdioMode = 'pipe' | 'inherit' | 'ignore';

export interface LaunchOptions {
  stdin: StdioMode;
  /** A stdio mode, or an open file descriptor to write to. */
  stdout: StdioMode | number;
  stderr?: StdioMode;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessExit {
  code: number;
  signal: NodeJS.Signals | null;
  /** Set when the process failed to spawn. */
  error?: Error;
}

export interface LaunchedProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  /** Resolves once the process has exited. Never rejects. */
  readonly exited: Promise<ProcessExit>;
  kill(signal?: NodeJS.Signals): void;
}

export type Launcher = (
  command: string,
  args: readonly string[],
  options: LaunchOptions
) => LaunchedProcess;

/**
 * Spawn an external command
 */
export const launchProcess: Launcher = (command, args, options) => {
  const child = spawn(command, [...args], {
    stdio: [options.stdin, options.stdout, options.stderr ?? 'inherit'],
    env: options.env ?? process.env,
  });

  const exited = new Promise<ProcessExit>((resolve) => {
    let settled = false;

    child.once('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      resolve({
        code: error.code === 'ENOENT' ? EXIT_COMMAND_NOT_FOUND : 1,
        signal: null,
        error,
      });
    });

    child.once('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ code: code ?? (signal ? 128 : 1), signal });
    });
  });

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    exited,
    kill: (signal) => {
      child.kill(signal);
    },
  };
};

/**
 * Check whether a command can be run by invoking it with probe arguments.
 */
export async function probeCommand(
  command: string,
  args: readonly string[] = ['--version'],
  launcher: Launcher = launchProcess
): Promise<boolean> {
  const probe = launcher(command, args, {
    stdin: 'ignore',
    stdout: 'ignore',
    stderr: 'ignore',
  });
  const { code } = await probe.exited;
  return code === 0;
}
