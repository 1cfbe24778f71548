/**
 * Help Command
 *
 * Usage, options and the profiles available in this run.
 */

import chalk from 'chalk';
import { FORMATS, TOOL_ENV_VARS, listProfiles, type ProfileSet } from '@termplay/core';
import { printHeader, printKeyValue } from '../lib/output.js';

const OPTIONS: ReadonlyArray<readonly [string, string]> = [
  ['-i, --input <file>', 'Input file, or - for stdin (default: stdin)'],
  ['-o, --output <file>', 'Output file (default: stdout)'],
  ['-f, --format <fmt>', `Output format: ${FORMATS.join(', ')} (default: sixel)`],
  ['--fps <fps>', 'Playback frame rate (default: 24)'],
  ['--audio', 'Play the audio track through ffplay'],
  ['--list-profiles', 'List available profiles'],
  ['--use-profile <name>', 'Use a profile (sets format and tool flags)'],
  ['--restore-defaults', 'Write the built-in profiles to the profile file'],
  ['--verbose', 'Log debug output to stderr'],
  ['--dry-run', 'Print the commands that would run, then exit'],
  ['--video-flags <flags>', 'Extra ffmpeg flags for video processing'],
  ['--audio-flags <flags>', 'Extra ffplay flags for audio playback'],
  ['-h, --help', 'Show this help message'],
];

export function helpCommand(profiles: ProfileSet, profilesPath: string): void {
  printHeader('termplay - play media in the terminal or convert it to gif/mp4');

  console.log(chalk.bold('USAGE:'));
  console.log('  termplay [options] [input] [-- <ffmpeg flags>]');
  console.log();

  console.log(chalk.bold('OPTIONS:'));
  const width = Math.max(...OPTIONS.map(([flags]) => flags.length));
  for (const [flags, description] of OPTIONS) {
    console.log(`  ${chalk.cyan(flags.padEnd(width))}  ${description}`);
  }
  console.log();

  console.log(chalk.bold('PROFILES:'));
  for (const entry of listProfiles(profiles)) {
    console.log(`  ${chalk.cyan(entry.name)} ${chalk.gray(`(${entry.format})`)} ${entry.description}`);
  }
  console.log();

  console.log(chalk.bold('CONFIGURATION:'));
  printKeyValue('Profile file', profilesPath);
  printKeyValue('Tool paths', Object.values(TOOL_ENV_VARS).join(', '));
  console.log();
}
