import { describe, it, expect } from 'vitest';
import { expandRanges } from '../../../src/domain/services/CharacterRanges.js';
import { CharacterRangeError } from '../../../src/domain/errors/CsvSedErrors.js';

describe('expandRanges', () => {
  it('should expand a simple range', () => {
    expect(expandRanges('a-f')).toBe('abcdef');
  });

  it('should treat an escaped dash literally', () => {
    expect(expandRanges('a\\-f')).toBe('a-f');
  });

  it('should keep a trailing dash', () => {
    expect(expandRanges('abc-')).toBe('abc-');
  });

  it('should keep a leading dash', () => {
    expect(expandRanges('-abc')).toBe('-abc');
  });

  it('should start a range from an escaped character', () => {
    expect(expandRanges('a\\\\-_z')).toBe('a\\]^_z');
  });

  it('should chain ranges from the last emitted character', () => {
    expect(expandRanges('a-c-e-g')).toBe('abcdefg');
  });

  it('should expand ranges between non-ASCII characters', () => {
    expect(expandRanges('α-ε')).toBe('αβγδε');
  });

  it('should emit a single character for a degenerate range', () => {
    expect(expandRanges('a-a')).toBe('a');
  });

  it('should keep a lone trailing backslash', () => {
    expect(expandRanges('ab\\')).toBe('ab\\');
  });

  it('should return an empty string for empty input', () => {
    expect(expandRanges('')).toBe('');
  });

  it('should reject a range whose start comes after its end', () => {
    expect(() => expandRanges('z-a')).toThrow(CharacterRangeError);
    expect(() => expandRanges('z-a')).toThrow('invalid range end: "z-a"');
  });

  it('should be idempotent on input without dashes or escapes', () => {
    for (const input of ['abc', 'xyz123', 'αβγ', '']) {
      expect(expandRanges(expandRanges(input))).toBe(expandRanges(input));
    }
  });
});
