/**
 * Profile Types
 */

import type { Format } from './format.js';

/**
 * Flag strings handed to each external tool.
 *
 * `filter` is the ffmpeg `-vf` chain that follows the rate filter;
 * `encoder` holds the ffmpeg output codec flags for gif/mp4.
 */
export interface ToolFlags {
  filter?: string;
  encoder?: string;
  chafa?: string;
  jp2a?: string;
  img2txt?: string;
  kitty?: string;
  ffplay?: string;
}

export type ToolFlagKey = keyof ToolFlags;

export const TOOL_FLAG_KEYS: readonly ToolFlagKey[] = [
  'filter',
  'encoder',
  'chafa',
  'jp2a',
  'img2txt',
  'kitty',
  'ffplay',
];

export interface Profile {
  readonly name: string;
  readonly format: Format;
  readonly description: string;
  readonly flags: Readonly<ToolFlags>;
}

/** Merged built-in and user profiles, keyed by name. */
export type ProfileSet = ReadonlyMap<string, Profile>;
