import { CharacterRangeError } from '../errors/CsvSedErrors.js';

/**
 * Expand character ranges such as `a-z` into the explicit characters they cover.
 *
 * A `-` is a range only between an already emitted character and a following one, so a
 * leading or trailing dash is literal. `\` makes the next character literal. Ranges chain:
 * `a-c-e` continues from `c`. Works on Unicode code points.
 *
 * @throws CharacterRangeError when a range ends before it starts (`z-a`).
 */
export function expandRanges(input: string): string {
  const chars = Array.from(input);
  const out: string[] = [];
  let idx = 0;

  while (idx < chars.length) {
    let ch = chars[idx++] ?? '';
    const previous = out[out.length - 1];
    const end = chars[idx];

    if (ch === '-' && previous !== undefined && end !== undefined) {
      const from = codePoint(previous);
      const to = codePoint(end);
      if (from > to) {
        throw new CharacterRangeError(previous, end);
      }
      for (let cp = from + 1; cp <= to; cp++) {
        out.push(String.fromCodePoint(cp));
      }
      idx++;
      continue;
    }

    if (ch === '\\' && idx < chars.length) {
      ch = chars[idx++] ?? '';
    }
    out.push(ch);
  }

  return out.join('');
}

function codePoint(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}
