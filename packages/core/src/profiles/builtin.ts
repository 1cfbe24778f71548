/**
 * Built-in Profiles
 */

import type { Profile, ProfileSet } from '../types/profile.js';

const CHAFA_SIXEL_FLAGS = '-f sixels --colors=256 --dither=diffusion --fill=all --symbols=all --clear';

export function defineProfile(definition: Profile): Profile {
  return Object.freeze({ ...definition, flags: Object.freeze({ ...definition.flags }) });
}

export const BUILTIN_PROFILES: readonly Profile[] = Object.freeze([
  defineProfile({
    name: 'sixel',
    format: 'sixel',
    description: 'Sixel terminal output (default)',
    flags: { filter: 'scale=320:-1', chafa: CHAFA_SIXEL_FLAGS },
  }),
  defineProfile({
    name: 'kitty',
    format: 'kitty',
    description: 'Kitty graphics protocol output',
    flags: { filter: 'scale=320:-1', kitty: '--scale-up' },
  }),
  defineProfile({
    name: 'ascii',
    format: 'ascii',
    description: 'ASCII art output via jp2a',
    flags: { filter: 'scale=80:-1', jp2a: '--colors --width=80' },
  }),
  defineProfile({
    name: 'ansi',
    format: 'ansi',
    description: 'ANSI colored output via img2txt',
    flags: { filter: 'scale=80:-1', img2txt: '--width=80' },
  }),
  defineProfile({
    name: 'utf8',
    format: 'utf8',
    description: 'UTF8 colored output via img2txt',
    flags: { filter: 'scale=80:-1', img2txt: '--width=80' },
  }),
  defineProfile({
    name: 'caca',
    format: 'caca',
    description: 'Libcaca output',
    flags: { filter: 'scale=80:-1', img2txt: '--width=80' },
  }),
  defineProfile({
    name: 'gif',
    format: 'gif',
    description: 'Animated GIF output via ffmpeg',
    flags: { filter: 'scale=320:-1:flags=lanczos' },
  }),
  defineProfile({
    name: 'mp4',
    format: 'mp4',
    description: 'MP4 output via ffmpeg',
    flags: { filter: 'scale=640:-1', encoder: '-c:v libx264 -preset fast -crf 23' },
  }),
]);

export function builtinProfileSet(): ProfileSet {
  return new Map(BUILTIN_PROFILES.map((entry) => [entry.name, entry]));
}
