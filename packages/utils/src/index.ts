/**
 * @termplay/utils
 *
 * Shared utilities package containing:
 * - Process launching
 * - File and temp directory helpers
 * - Argument splitting and shell quoting
 * - Type guards
 * - Logger
 */

// Process launching
export {
  launchProcess,
  probeCommand,
  EXIT_COMMAND_NOT_FOUND,
  type Launcher,
  type LaunchOptions,
  type LaunchedProcess,
  type ProcessExit,
  type StdioMode,
} from './command.js';

// File operations
export { ensureDir, safeWriteFile, safeReadFile, isRegularFile, TempWorkspace } from './file.js';

// Arguments
export { splitFlags, quoteArg, formatCommandLine } from './args.js';

// Type guards
export { isObject, isErrnoException } from './guards.js';

// Logger
export { createLogger, silentLogger, type Logger, type CreateLoggerOptions } from './logger.js';
