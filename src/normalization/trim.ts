import type { RawOutput } from './types';

const TRAILING_WHITESPACE = /\p{White_Space}+$/u;

/** Lossy UTF-8 decode: invalid sequences become U+FFFD. A leading BOM is kept. */
export function decodeOutput(output: RawOutput): string {
  if (typeof output === 'string') {
    return output;
  }
  return Buffer.from(output.buffer, output.byteOffset, output.byteLength).toString('utf8');
}

export function trimTrailingWhitespace(text: string): string {
  return text.replace(TRAILING_WHITESPACE, '');
}

/**
 * Decodes the output and strips trailing whitespace. Non-empty results end with
 * exactly one newline; whitespace-only input yields the empty string.
 */
export function trim(output: RawOutput): string {
  const normalized = trimTrailingWhitespace(decodeOutput(output));
  return normalized.length > 0 ? `${normalized}\n` : '';
}
