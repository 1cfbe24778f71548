import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { BUILTIN_PROFILES, FORMATS, serializeProfiles, type ToolName } from '@termplay/core';
import { silentLogger, type Launcher, type LaunchOptions } from '@termplay/utils';
import { run, type CliDeps } from './cli.js';

interface Launch {
  command: string;
  args: readonly string[];
  options: LaunchOptions;
}

function fakeLauncher(exitCodes: Record<string, number> = {}) {
  const launches: Launch[] = [];
  const launcher: Launcher = (command, args, options) => {
    launches.push({ command, args, options });
    return {
      stdin: null,
      stdout: null,
      exited: Promise.resolve({ code: exitCodes[command] ?? 0, signal: null }),
      kill: () => undefined,
    };
  };
  return { launcher, launches };
}

function collectStdout() {
  let text = '';
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => text };
}

describe('run', () => {
  let dir: string;
  let profilesPath: string;
  let clip: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    chalk.level = 0;
    dir = await mkdtemp(join(tmpdir(), 'termplay-cli-'));
    profilesPath = join(dir, 'profiles.json');
    clip = join(dir, 'clip.mp4');
    await writeFile(clip, 'not really a video');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function deps(overrides: CliDeps = {}): CliDeps {
    return {
      env: { TERMPLAY_PROFILES: profilesPath },
      home: dir,
      logger: silentLogger,
      probe: async () => true,
      ...overrides,
    };
  }

  function printed(): string[] {
    return logSpy.mock.calls.map((call) => call.join(' '));
  }

  describe('dry run', () => {
    it('prints the GIF transcode of stdin', async () => {
      const stdout = collectStdout();
      const { launcher, launches } = fakeLauncher();

      const code = await run(['--dry-run', '-f', 'gif'], deps({ stdout: stdout.stream, launcher }));

      expect(code).toBe(0);
      expect(stdout.text()).toBe(
        '# termplay dry run: format=gif input=stream linkage=single\n' +
          'video: ffmpeg -hide_banner -loglevel error -i pipe:0 -vf fps=24,scale=320:-1:flags=lanczos -f gif pipe:1\n'
      );
      expect(launches).toEqual([]);
    });

    it('uses tool flags from a user profile', async () => {
      await writeFile(
        profilesPath,
        JSON.stringify({ tiny: { format: 'sixel', flags: { filter: 'scale=160:-1' } } })
      );
      const stdout = collectStdout();

      const code = await run(['--use-profile', 'tiny', '--dry-run'], deps({ stdout: stdout.stream }));

      expect(code).toBe(0);
      expect(stdout.text().split('\n')[1]).toBe(
        'video: ffmpeg -hide_banner -loglevel error -i pipe:0 -vf fps=24,scale=160:-1 -f rawvideo -pix_fmt rgb24 pipe:1'
      );
    });
  });

  describe('failures', () => {
    it('exits 1 for an unknown profile', async () => {
      expect(await run(['--use-profile', 'nope'], deps())).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('✗', "Unknown profile 'nope'");
    });

    it.each(['--video-flags', '--audio-flags'])('exits 1 for an empty %s argument', async (option) => {
      expect(await run([option, ''], deps())).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('✗', `${option} requires an argument`);
    });

    it.each(FORMATS)('exits 1 for a missing %s input before starting anything', async (format) => {
      const { launcher, launches } = fakeLauncher();
      const missing = join(dir, 'missing.mp4');

      expect(await run(['-f', format, '-i', missing], deps({ launcher }))).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('✗', `Input file not found: ${missing}`);
      expect(launches).toEqual([]);
    });

    it('exits 1 when the kitty client is missing', async () => {
      const { launcher, launches } = fakeLauncher();

      const code = await run(['-f', 'kitty', clip], deps({ launcher, probe: async (tool: ToolName) => tool !== 'kitty' }));

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        '✗',
        'Required tool not found: kitty (kitty +kitten icat is required for kitty output)'
      );
      expect(launches).toEqual([]);
    });

    it('exits 1 for invalid environment configuration', async () => {
      const code = await run(['--list-profiles'], deps({ env: { LOG_LEVEL: 'loud' } }));

      expect(code).toBe(1);
      expect(errorSpy.mock.calls[0]?.[0]).toBe('✗');
    });
  });

  describe('playback', () => {
    it('runs the plan and exits 0', async () => {
      const { launcher, launches } = fakeLauncher();

      expect(await run(['-f', 'gif', '-o', join(dir, 'clip.gif'), clip], deps({ launcher }))).toBe(0);
      expect(launches.map((launch) => launch.command)).toEqual(['ffmpeg']);
      expect(launches[0]?.args.slice(-2)).toEqual(['-y', join(dir, 'clip.gif')]);
      expect(launches[0]?.options.stdin).toBe('ignore');
    });

    it('reports a failing stage and exits 1', async () => {
      const { launcher } = fakeLauncher({ ffmpeg: 2 });

      expect(await run(['-f', 'mp4', clip], deps({ launcher }))).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('✗', 'video stage (ffmpeg) exited with code 2');
    });

    it('warns about failed audio without failing the run', async () => {
      const { launcher, launches } = fakeLauncher({ ffplay: 1 });

      expect(await run(['--audio', '-f', 'gif', clip], deps({ launcher }))).toBe(0);
      expect(launches.map((launch) => launch.command)).toEqual(['ffplay', 'ffmpeg']);
      expect(errorSpy).toHaveBeenCalledWith('!', 'Audio playback exited with code 1');
    });
  });

  describe('profiles', () => {
    it('lists every profile without description markers', async () => {
      expect(await run(['--list-profiles'], deps())).toBe(0);

      const lines = printed();
      expect(lines[0]).toBe('Available profiles:');
      expect(lines.slice(1).map((line) => line.split(':')[0])).toEqual(
        BUILTIN_PROFILES.map((entry) => `  - ${entry.name}`)
      );
      expect(lines[1]).toBe(
        "  - sixel: filter='scale=320:-1' chafa='-f sixels --colors=256 --dither=diffusion --fill=all --symbols=all --clear'"
      );
      expect(lines.some((line) => line.includes('DESC='))).toBe(false);
    });

    it('restores the defaults idempotently', async () => {
      expect(await run(['--restore-defaults'], deps())).toBe(0);
      const first = await readFile(profilesPath, 'utf8');
      expect(await run(['--restore-defaults'], deps())).toBe(0);

      expect(await readFile(profilesPath, 'utf8')).toBe(first);
      expect(first).toBe(serializeProfiles(BUILTIN_PROFILES));
      expect(errorSpy).toHaveBeenCalledWith('✓', `Default profiles restored to ${profilesPath}`);
    });

    it('defaults the profile file to the home directory', async () => {
      expect(await run(['--restore-defaults'], deps({ env: {} }))).toBe(0);

      expect(await readFile(join(dir, '.termplay', 'profiles.json'), 'utf8')).toBe(serializeProfiles(BUILTIN_PROFILES));
    });
  });

  it('prints help listing the profiles', async () => {
    expect(await run(['--help', '--use-profile', 'gif'], deps())).toBe(0);

    const lines = printed();
    expect(lines).toContain('USAGE:');
    expect(lines).toContain('  termplay [options] [input] [-- <ffmpeg flags>]');
    expect(lines).toContain('  gif (gif) Animated GIF output via ffmpeg');
  });
});
