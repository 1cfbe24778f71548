/**
 * @termplay/core
 *
 * Domain package containing:
 * - Format, profile, config and command plan types
 * - Built-in profiles and the profile store
 * - Tool path configuration
 * - Error handling
 */

// Types
export {
  FORMATS,
  CACA_FORMATS,
  DEFAULT_FORMAT,
  isFormat,
  isCacaFormat,
  type Format,
  type CacaFormat,
} from './types/format.js';

export { TOOL_FLAG_KEYS, type Profile, type ProfileSet, type ToolFlags, type ToolFlagKey } from './types/profile.js';

export {
  STREAM,
  DEFAULT_FPS,
  describeLocator,
  type MediaLocator,
  type ResolvedConfig,
} from './types/config.js';

export type {
  CommandPlan,
  Linkage,
  Stage,
  StageInput,
  StageRole,
  StageSink,
  ToolName,
} from './types/plan.js';

// Profiles
export { BUILTIN_PROFILES, builtinProfileSet, defineProfile } from './profiles/builtin.js';
export { ProfileStore, serializeProfiles, type ProfileStoreOptions } from './profiles/store.js';
export {
  DESCRIPTION_SEPARATOR,
  formatFlagSummary,
  listProfiles,
  type ProfileListing,
} from './profiles/summary.js';

// Tools
export {
  TOOL_ENV_VARS,
  resolveToolPaths,
  createToolProbe,
  type ToolPaths,
  type ToolProbe,
} from './config/tools.js';

// Errors
export {
  TermplayError,
  UsageError,
  UnknownProfileError,
  UnsupportedFormatError,
  InputNotFoundError,
  DependencyMissingError,
  PlanError,
  ConfigError,
  ProfileStoreError,
  StageFailedError,
} from './errors/index.js';
