/**
 * Output Formats
 */

export const FORMATS = ['sixel', 'kitty', 'ascii', 'ansi', 'utf8', 'caca', 'gif', 'mp4'] as const;

export type Format = (typeof FORMATS)[number];

/** Text-art formats rendered by img2txt, with the value passed to its `-f` flag. */
export const CACA_FORMATS = ['ansi', 'utf8', 'caca'] as const;

export type CacaFormat = (typeof CACA_FORMATS)[number];

export const DEFAULT_FORMAT: Format = 'sixel';

export function isFormat(value: string): value is Format {
  return FORMATS.some((format) => format === value);
}

export function isCacaFormat(format: Format): format is CacaFormat {
  return CACA_FORMATS.some((caca) => caca === format);
}
