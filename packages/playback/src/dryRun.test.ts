import { describe, expect, it } from 'vitest';
import { FORMATS, resolveToolPaths, type ResolvedConfig } from '@termplay/core';
import { silentLogger } from '@termplay/utils';
import { composePlan } from './composer.js';
import { renderDryRun } from './dryRun.js';
import type { PlanContext } from './planBuilders.js';

const context: PlanContext = {
  tools: resolveToolPaths({}),
  tempDir: '/tmp/termplay-test',
  probe: async () => true,
  logger: silentLogger,
};

function config(overrides: Partial<ResolvedConfig>): ResolvedConfig {
  return {
    input: { kind: 'stream' },
    output: { kind: 'stream' },
    format: 'sixel',
    fps: 24,
    audio: false,
    videoFlags: [],
    audioFlags: [],
    toolFlags: {},
    profile: null,
    verbose: false,
    dryRun: true,
    ...overrides,
  };
}

describe('renderDryRun', () => {
  it('prints a GIF transcode of stdin as one ffmpeg line', async () => {
    const plan = await composePlan(config({ format: 'gif' }), context);

    expect(renderDryRun(plan)).toBe(
      '# termplay dry run: format=gif input=stream linkage=single\n' +
        'video: ffmpeg -hide_banner -loglevel error -i pipe:0 -vf fps=24,scale=320:-1:flags=lanczos -f gif pipe:1\n'
    );
  });

  it('prints piped stages in order with audio last', async () => {
    const plan = await composePlan(config({ audio: true }), context);

    expect(renderDryRun(plan).split('\n')).toEqual([
      '# termplay dry run: format=sixel input=stream linkage=pipeline',
      'video: ffmpeg -hide_banner -loglevel error -i pipe:0 -vf fps=24,scale=320:-1 -f rawvideo -pix_fmt rgb24 pipe:1',
      'render: chafa -f sixels --colors=256 --dither=diffusion --fill=all --symbols=all --clear',
      'audio: ffplay -nodisp -autoexit -loglevel error pipe:0',
      '',
    ]);
  });

  it('quotes paths that need it and shows file redirection', async () => {
    const plan = await composePlan(
      config({
        format: 'caca',
        input: { kind: 'file', path: '/media/my clip.mp4' },
        output: { kind: 'file', path: '/out/art.txt' },
      }),
      context
    );

    expect(renderDryRun(plan)).toBe(
      "# termplay dry run: format=caca input=/media/my clip.mp4 linkage=single\n" +
        "render: img2txt -f caca --width=80 '/media/my clip.mp4' > /out/art.txt\n"
    );
  });

  it.each(FORMATS)('describes every stage for %s', async (format) => {
    const plan = await composePlan(config({ format }), context);
    const roles = renderDryRun(plan)
      .trimEnd()
      .split('\n')
      .slice(1)
      .map((line) => line.slice(0, line.indexOf(':')));

    expect(roles).toEqual(format === 'gif' || format === 'mp4' ? ['video'] : ['video', 'render']);
  });
});
