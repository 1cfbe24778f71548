/**
 * Type Guards
 */

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error raised by a Node.js system call, carrying an errno `code`
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && typeof Reflect.get(value, 'code') === 'string';
}
