/**
 * Argument Utilities
 */

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/**
 * Split a flag string on whitespace. Quotes are not interpreted.
 */
export function splitFlags(flags: string | undefined): string[] {
  if (!flags) return [];
  const trimmed = flags.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

/**
 * Quote a single argument for display in a POSIX shell
 */
export function quoteArg(arg: string): string {
  if (SHELL_SAFE.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command and its arguments as one shell-quoted line
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}
