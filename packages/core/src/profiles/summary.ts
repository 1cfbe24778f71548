/**
 * Profile Listing
 */

import { TOOL_FLAG_KEYS, type ProfileSet, type ToolFlags } from '../types/profile.js';
import type { Format } from '../types/format.js';

/** Marks where a profile's flags end and its description begins in legacy listings. */
export const DESCRIPTION_SEPARATOR = 'DESC=';

export interface ProfileListing {
  name: string;
  format: Format;
  description: string;
  summary: string;
}

function stripDescription(value: string): string {
  const cut = value.indexOf(DESCRIPTION_SEPARATOR);
  return cut === -1 ? value : value.slice(0, cut).trimEnd();
}

/**
 * Render a profile's flags as `key='value'` pairs
 */
export function formatFlagSummary(flags: Readonly<ToolFlags>): string {
  const parts: string[] = [];
  for (const key of TOOL_FLAG_KEYS) {
    const value = flags[key];
    if (value === undefined) continue;
    const shown = stripDescription(value).trim();
    if (shown.length > 0) {
      parts.push(`${key}='${shown}'`);
    }
  }
  return parts.length > 0 ? parts.join(' ') : '(no flags)';
}

export function listProfiles(profiles: ProfileSet): ProfileListing[] {
  return [...profiles.values()].map((entry) => ({
    name: entry.name,
    format: entry.format,
    description: entry.description,
    summary: formatFlagSummary(entry.flags),
  }));
}
