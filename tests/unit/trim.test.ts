import { describe, it, expect } from 'vitest';
import { decodeOutput, trim } from '../../src/normalization/trim';

describe('trim', () => {
  it('returns the empty string for empty or whitespace-only input', () => {
    expect(trim('')).toBe('');
    expect(trim('  \n\t\r\n')).toBe('');
  });

  it('keeps exactly one trailing newline', () => {
    expect(trim('error\n\n\n')).toBe('error\n');
    expect(trim('error')).toBe('error\n');
    expect(trim(Buffer.from('warning: unused  \r\n'))).toBe('warning: unused\n');
  });

  it('leaves whitespace inside the text alone', () => {
    expect(trim('a  \n\nb')).toBe('a  \n\nb\n');
  });

  it('is idempotent', () => {
    for (const input of ['', ' \n', 'a\n\n', 'a \t\nb  \n\n', '\n\nx']) {
      expect(trim(trim(input))).toBe(trim(input));
    }
  });

  it('decodes invalid UTF-8 with replacement characters', () => {
    expect(trim(new Uint8Array([0x61, 0xff, 0x62]))).toBe('a\uFFFDb\n');
  });

  it('decodes only the viewed bytes of a subarray', () => {
    expect(decodeOutput(Buffer.from('xxhello').subarray(2))).toBe('hello');
  });
});
