/**
 * Resolved Invocation Config
 */

import type { Format } from './format.js';
import type { ToolFlags } from './profile.js';

export type MediaLocator = { kind: 'stream' } | { kind: 'file'; path: string };

export const STREAM: MediaLocator = Object.freeze({ kind: 'stream' });

export interface ResolvedConfig {
  readonly input: MediaLocator;
  readonly output: MediaLocator;
  readonly format: Format;
  readonly fps: number;
  readonly audio: boolean;
  readonly videoFlags: readonly string[];
  readonly audioFlags: readonly string[];
  /** Flags from the last applied profile; empty when none was used. */
  readonly toolFlags: Readonly<ToolFlags>;
  readonly profile: string | null;
  readonly verbose: boolean;
  readonly dryRun: boolean;
}

export const DEFAULT_FPS = 24;

export function describeLocator(locator: MediaLocator): string {
  return locator.kind === 'stream' ? 'stream' : locator.path;
}
