/**
 * Profile Commands
 */

import chalk from 'chalk';
import { listProfiles, type ProfileSet, type ProfileStore } from '@termplay/core';
import { printSuccess } from '../lib/output.js';

export function listProfilesCommand(profiles: ProfileSet): void {
  console.log('Available profiles:');
  for (const entry of listProfiles(profiles)) {
    console.log(`  - ${chalk.cyan(entry.name)}: ${entry.summary}`);
  }
}

export async function restoreDefaultsCommand(store: ProfileStore): Promise<void> {
  const path = await store.restoreDefaults();
  printSuccess(`Default profiles restored to ${path}`);
}
