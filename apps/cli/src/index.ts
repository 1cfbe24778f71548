#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Play any media file or stream in the terminal, or convert it to
 * gif/mp4, by driving ffmpeg and the terminal renderers.
 */

import { constants } from 'node:os';
import { run } from './cli.js';

// Temp workspaces remove themselves on 'exit', which a bare signal skips
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    process.exit(128 + constants.signals[signal]);
  });
}

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
