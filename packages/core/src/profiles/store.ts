/**
 * Profile Store
 *
 * Built-in profiles merged with user overrides from a JSON file:
 *
 *   {
 *     "tiny-sixel": {
 *       "format": "sixel",
 *       "description": "Small sixel preview",
 *       "flags": { "filter": "scale=160:-1", "chafa": "-f sixels --colors=16" }
 *     }
 *   }
 *
 * An override replaces the built-in of the same name entirely. Entries
 * that fail validation are skipped with a warning; the rest still load.
 */

import { z } from 'zod';
import { isObject, safeReadFile, safeWriteFile, silentLogger, type Logger } from '@termplay/utils';
import { FORMATS } from '../types/format.js';
import type { Profile, ProfileSet } from '../types/profile.js';
import { ProfileStoreError } from '../errors/index.js';
import { BUILTIN_PROFILES, defineProfile } from './builtin.js';

const profileNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][\w.-]*$/, 'Profile names may only contain letters, digits, ".", "_" and "-"');

const toolFlagsSchema = z
  .object({
    filter: z.string().optional(),
    encoder: z.string().optional(),
    chafa: z.string().optional(),
    jp2a: z.string().optional(),
    img2txt: z.string().optional(),
    kitty: z.string().optional(),
    ffplay: z.string().optional(),
  })
  .strict();

const profileEntrySchema = z.object({
  format: z.enum(FORMATS),
  description: z.string().default(''),
  flags: toolFlagsSchema.default({}),
});

type ProfileEntry = z.infer<typeof profileEntrySchema>;

export interface ProfileStoreOptions {
  path: string;
  logger?: Logger;
}

export class ProfileStore {
  readonly path: string;
  private readonly logger: Logger;

  constructor(options: ProfileStoreOptions) {
    this.path = options.path;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Built-in profiles with user overrides applied
   */
  async load(): Promise<ProfileSet> {
    const merged = new Map<string, Profile>(BUILTIN_PROFILES.map((entry) => [entry.name, entry]));

    for (const override of await this.readOverrides()) {
      if (merged.has(override.name)) {
        this.logger.debug({ profile: override.name }, 'User profile overrides built-in');
      }
      merged.set(override.name, override);
    }

    return merged;
  }

  /**
   * Overwrite the profile file with the built-in set
   */
  async restoreDefaults(): Promise<string> {
    try {
      await safeWriteFile(this.path, serializeProfiles(BUILTIN_PROFILES));
    } catch (error) {
      throw new ProfileStoreError(`Could not write profiles to ${this.path}`, this.path, error);
    }
    this.logger.debug({ path: this.path }, 'Default profiles restored');
    return this.path;
  }

  private async readOverrides(): Promise<Profile[]> {
    let content: string | null;
    try {
      content = await safeReadFile(this.path);
    } catch (error) {
      this.logger.warn({ err: error, path: this.path }, 'Could not read profile file, using built-in profiles');
      return [];
    }
    if (content === null) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn({ err: error, path: this.path }, 'Profile file is not valid JSON, using built-in profiles');
      return [];
    }

    if (!isObject(parsed)) {
      this.logger.warn({ path: this.path }, 'Profile file must contain an object of profiles, using built-in profiles');
      return [];
    }

    const overrides: Profile[] = [];
    for (const [name, entry] of Object.entries(parsed)) {
      const nameResult = profileNameSchema.safeParse(name);
      if (!nameResult.success) {
        this.logger.warn({ profile: name, issues: describeIssues(nameResult.error) }, 'Skipping invalid profile');
        continue;
      }

      const entryResult = profileEntrySchema.safeParse(entry);
      if (!entryResult.success) {
        this.logger.warn({ profile: name, issues: describeIssues(entryResult.error) }, 'Skipping invalid profile');
        continue;
      }

      overrides.push(defineProfile({ name, ...entryResult.data }));
    }

    this.logger.debug({ path: this.path, count: overrides.length }, 'Loaded user profiles');
    return overrides;
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Deterministic JSON rendering of a profile list
 */
export function serializeProfiles(profiles: readonly Profile[]): string {
  const document: Record<string, ProfileEntry> = {};
  for (const entry of profiles) {
    document[entry.name] = {
      format: entry.format,
      description: entry.description,
      flags: { ...entry.flags },
    };
  }
  return `${JSON.stringify(document, null, 2)}\n`;
}
