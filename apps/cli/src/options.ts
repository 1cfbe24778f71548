/**
 * Option Resolver
 *
 * Turns the command line into a CLI action. Flags take effect in the
 * order they appear: `--use-profile` sets the format and tool flags at
 * its position, so a later `-f` wins over it and an earlier one does not.
 */

import { Command, CommanderError } from 'commander';
import {
  DEFAULT_FORMAT,
  DEFAULT_FPS,
  InputNotFoundError,
  STREAM,
  UnknownProfileError,
  UnsupportedFormatError,
  UsageError,
  isFormat,
  type MediaLocator,
  type ProfileSet,
  type ResolvedConfig,
  type ToolFlags,
} from '@termplay/core';
import { splitFlags } from '@termplay/utils';

export type CliAction =
  | { kind: 'help' }
  | { kind: 'list-profiles' }
  | { kind: 'restore-defaults' }
  | { kind: 'play'; config: ResolvedConfig };

export interface ResolveContext {
  profiles: ProfileSet;
  isFile: (path: string) => Promise<boolean>;
}

/** Options whose value is the next token. */
const VALUE_OPTIONS = new Set([
  '-i',
  '--input',
  '-o',
  '--output',
  '-f',
  '--format',
  '--fps',
  '--use-profile',
  '--video-flags',
  '--audio-flags',
]);

const TERMINATOR = '--';

/**
 * Split the arguments at the first `--` that is not an option's value.
 * Everything after it is passed to ffmpeg as extra video flags.
 *
 * A value attached to its option (`--video-flags=--`, `-o--`) is part of
 * that one token, so only a separate value token is skipped.
 */
export function splitAtTerminator(argv: readonly string[]): { args: string[]; extraVideoFlags: string[] } {
  for (let index = 0; index < argv.length; index++) {
    const token = argv[index];
    if (token === TERMINATOR) {
      return { args: argv.slice(0, index), extraVideoFlags: argv.slice(index + 1) };
    }
    if (token !== undefined && VALUE_OPTIONS.has(token)) {
      index++;
    }
  }
  return { args: [...argv], extraVideoFlags: [] };
}

/**
 * Whether `--verbose` was given, looked up before full resolution so
 * logging is configured while profiles load. Only the bare token counts;
 * `--video-flags=--verbose` is a value.
 */
export function wantsVerbose(argv: readonly string[]): boolean {
  const { args } = splitAtTerminator(argv);
  for (let index = 0; index < args.length; index++) {
    const token = args[index];
    if (token === '--verbose') return true;
    if (token !== undefined && VALUE_OPTIONS.has(token)) index++;
  }
  return false;
}

function toLocator(value: string): MediaLocator {
  return value === '-' ? STREAM : { kind: 'file', path: value };
}

function parseFps(value: string): number {
  const fps = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(fps) || fps <= 0) {
    throw new UsageError(`Invalid frame rate '${value}': expected a positive integer`, { fps: value });
  }
  return fps;
}

function flagList(option: string, value: string): string[] {
  const flags = splitFlags(value);
  if (flags.length === 0) {
    throw new UsageError(`${option} requires an argument`, { option });
  }
  return flags;
}

function usageFromCommander(error: CommanderError): UsageError {
  const message = error.message.replace(/^error:\s*/, '');
  return new UsageError(message.charAt(0).toUpperCase() + message.slice(1), { code: error.code });
}

interface Draft {
  input: MediaLocator | null;
  output: MediaLocator;
  format: string;
  fps: number;
  audio: boolean;
  videoFlags: string[];
  audioFlags: string[];
  toolFlags: Readonly<ToolFlags>;
  profile: string | null;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
  listProfiles: boolean;
  restoreDefaults: boolean;
}

function createProgram(draft: Draft, profiles: ProfileSet): Command {
  const program = new Command()
    .name('termplay')
    .helpOption(false)
    .allowExcessArguments(true)
    .argument('[input]')
    .option('-i, --input <path>')
    .option('-o, --output <path>')
    .option('-f, --format <format>')
    .option('--fps <fps>')
    .option('--audio')
    .option('--list-profiles')
    .option('--use-profile <name>')
    .option('--restore-defaults')
    .option('--verbose')
    .option('--dry-run')
    .option('--video-flags <flags>')
    .option('--audio-flags <flags>')
    .option('-h, --help')
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });

  program
    .on('option:input', (value: string) => {
      draft.input = toLocator(value);
    })
    .on('option:output', (value: string) => {
      draft.output = toLocator(value);
    })
    .on('option:format', (value: string) => {
      draft.format = value;
    })
    .on('option:fps', (value: string) => {
      draft.fps = parseFps(value);
    })
    .on('option:audio', () => {
      draft.audio = true;
    })
    .on('option:list-profiles', () => {
      draft.listProfiles = true;
    })
    .on('option:use-profile', (name: string) => {
      const profile = profiles.get(name);
      if (!profile) {
        throw new UnknownProfileError(name);
      }
      draft.profile = profile.name;
      draft.format = profile.format;
      draft.toolFlags = profile.flags;
    })
    .on('option:restore-defaults', () => {
      draft.restoreDefaults = true;
    })
    .on('option:verbose', () => {
      draft.verbose = true;
    })
    .on('option:dry-run', () => {
      draft.dryRun = true;
    })
    .on('option:video-flags', (value: string) => {
      draft.videoFlags.push(...flagList('--video-flags', value));
    })
    .on('option:audio-flags', (value: string) => {
      draft.audioFlags.push(...flagList('--audio-flags', value));
    })
    .on('option:help', () => {
      draft.help = true;
    });

  return program;
}

export async function resolveOptions(argv: readonly string[], context: ResolveContext): Promise<CliAction> {
  const { args, extraVideoFlags } = splitAtTerminator(argv);
  const draft: Draft = {
    input: null,
    output: STREAM,
    format: DEFAULT_FORMAT,
    fps: DEFAULT_FPS,
    audio: false,
    videoFlags: [],
    audioFlags: [],
    toolFlags: {},
    profile: null,
    verbose: false,
    dryRun: false,
    help: false,
    listProfiles: false,
    restoreDefaults: false,
  };

  const program = createProgram(draft, context.profiles);
  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw usageFromCommander(error);
    }
    throw error;
  }

  if (draft.help) return { kind: 'help' };
  if (draft.listProfiles) return { kind: 'list-profiles' };
  if (draft.restoreDefaults) return { kind: 'restore-defaults' };

  const format = draft.format;
  if (!isFormat(format)) {
    throw new UnsupportedFormatError(format);
  }

  const [positional] = program.args;
  const input = draft.input ?? (positional !== undefined ? toLocator(positional) : STREAM);
  if (input.kind === 'file' && !(await context.isFile(input.path))) {
    throw new InputNotFoundError(input.path);
  }

  const config: ResolvedConfig = Object.freeze({
    input,
    output: draft.output,
    format,
    fps: draft.fps,
    audio: draft.audio,
    videoFlags: Object.freeze([...draft.videoFlags, ...extraVideoFlags]),
    audioFlags: Object.freeze([...draft.audioFlags]),
    toolFlags: draft.toolFlags,
    profile: draft.profile,
    verbose: draft.verbose,
    dryRun: draft.dryRun,
  });

  return { kind: 'play', config };
}
