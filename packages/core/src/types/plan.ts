/**
 * Command Plan Types
 */

import type { Format } from './format.js';
import type { MediaLocator } from './config.js';

export type StageRole = 'video' | 'render' | 'audio';

export type ToolName = 'ffmpeg' | 'ffplay' | 'chafa' | 'jp2a' | 'img2txt' | 'kitty';

/**
 * Where a stage reads from: the run's input stream, the previous
 * stage's stdout, or nothing.
 */
export type StageInput = 'source' | 'upstream' | 'none';

export type StageSink =
  | { kind: 'terminal' }
  | { kind: 'downstream' }
  | { kind: 'discard' }
  | { kind: 'file'; path: string };

export interface Stage {
  readonly role: StageRole;
  readonly tool: ToolName;
  /** Resolved executable. */
  readonly command: string;
  readonly args: readonly string[];
  readonly stdin: StageInput;
  readonly stdout: StageSink;
}

/**
 * How the video-side stages relate:
 * - single: one stage
 * - pipeline: two stages run together, first stdout into second stdin
 * - sequence: first runs to completion, then the second
 */
export type Linkage = 'single' | 'pipeline' | 'sequence';

export interface CommandPlan {
  readonly format: Format;
  readonly input: MediaLocator;
  readonly linkage: Linkage;
  readonly stages: readonly Stage[];
  readonly audio: Stage | null;
}
