/**
 * Custom Error Classes
 */

import type { StageRole } from '../types/plan.js';

/**
 * Base error class for all termplay errors
 */
export class TermplayError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TermplayError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad or missing command-line argument
 */
export class UsageError extends TermplayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE_ERROR', details);
    this.name = 'UsageError';
  }
}

export class UnknownProfileError extends TermplayError {
  constructor(profile: string) {
    super(`Unknown profile '${profile}'`, 'UNKNOWN_PROFILE', { profile });
    this.name = 'UnknownProfileError';
  }
}

export class UnsupportedFormatError extends TermplayError {
  constructor(format: string) {
    super(`Unsupported format '${format}'`, 'UNSUPPORTED_FORMAT', { format });
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * A named input file that does not exist
 */
export class InputNotFoundError extends TermplayError {
  constructor(path: string) {
    super(`Input file not found: ${path}`, 'INPUT_NOT_FOUND', { path });
    this.name = 'InputNotFoundError';
  }
}

/**
 * A required external tool is not installed
 */
export class DependencyMissingError extends TermplayError {
  constructor(tool: string, hint?: string) {
    super(
      hint ? `Required tool not found: ${tool} (${hint})` : `Required tool not found: ${tool}`,
      'DEPENDENCY_MISSING',
      { tool }
    );
    this.name = 'DependencyMissingError';
  }
}

/**
 * A command plan that is missing a stage it needs
 */
export class PlanError extends TermplayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PLAN_ERROR', details);
    this.name = 'PlanError';
  }
}

/**
 * Invalid environment configuration
 */
export class ConfigError extends TermplayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ProfileStoreError extends TermplayError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'PROFILE_STORE_ERROR', {
      path,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = 'ProfileStoreError';
  }
}

/**
 * An external stage exited non-zero
 */
export class StageFailedError extends TermplayError {
  constructor(role: StageRole, command: string, exitCode: number) {
    super(`${role} stage (${command}) exited with code ${exitCode}`, 'STAGE_FAILED', {
      role,
      command,
      exitCode,
    });
    this.name = 'StageFailedError';
  }
}
