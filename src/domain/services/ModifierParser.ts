import type {
  Modifier,
  ModifierInput,
  ReplacementPart,
  SubstituteFlag,
  SubstituteModifier,
  TransliterateFlag,
  TransliterateModifier,
  ExecuteModifier,
} from '../model/Modifier.js';
import { CharacterRangeError, InvalidModifierError } from '../errors/CsvSedErrors.js';
import { expandRanges } from './CharacterRanges.js';

interface ModifierForm {
  readonly name: string;
  readonly parts: number;
  /** Usage written with `/` as the delimiter; shown with the caller's delimiter in errors. */
  readonly usage: string;
}

const FORMS = {
  s: { name: 'substitute', parts: 4, usage: 's/REGEX/REPL/FLAGS' },
  y: { name: 'transliterate', parts: 4, usage: 'y/SRC/DST/FLAGS' },
  e: { name: 'execute', parts: 3, usage: 'e/COMMAND/' },
} as const satisfies Record<string, ModifierForm>;

const SUBSTITUTE_FLAGS: readonly SubstituteFlag[] = ['g', 'i', 'l', 'm', 's', 'u', 'x'];
const TRANSLITERATE_FLAGS: readonly TransliterateFlag[] = ['i'];
const EXECUTE_FLAGS: readonly never[] = [];

/**
 * Parse modifier text into an operator.
 *
 * Supported forms, where `/` may be any character used consistently:
 *
 * - `s/REGEX/REPL/FLAGS` substitutes matches of `REGEX` with `REPL` (`\1`, `\g<name>`).
 * - `y/SRC/DST/FLAGS` transliterates characters of `SRC` to those of `DST` (ranges allowed).
 * - `e/COMMAND/` pipes the value through a shell command.
 *
 * Functions are accepted as-is.
 *
 * @throws InvalidModifierError when the text is malformed.
 */
export function parseModifier(input: ModifierInput): Modifier {
  if (typeof input === 'function') {
    return { kind: 'function', source: input.name ? `<function ${input.name}>` : '<function>', fn: input };
  }
  if (input.length === 0) {
    throw new InvalidModifierError(input, 'empty modifier');
  }

  const type = input.charAt(0);
  switch (type) {
    case 's':
      return parseSubstitute(input, splitParts(input, FORMS.s));
    case 'y':
      return parseTransliterate(input, splitParts(input, FORMS.y));
    case 'e':
      return parseExecute(input, splitParts(input, FORMS.e));
    default:
      throw new InvalidModifierError(input, `unsupported modifier type "${type}" (expected one of: s, y, e)`);
  }
}

function splitParts(input: string, form: ModifierForm): string[] {
  const delimiter = input.charAt(1);
  const parts = input.length >= form.parts ? input.split(delimiter) : [];
  if (parts.length !== form.parts) {
    const usage = form.usage.replaceAll('/', () => delimiter || '/');
    throw new InvalidModifierError(input, `does not match expected form "${usage}"`);
  }
  return parts;
}

function parseFlags<F extends string>(input: string, raw: string, supported: readonly F[], kind: string): F[] {
  const flags: F[] = [];
  for (const ch of raw) {
    const flag = supported.find((candidate) => candidate === ch.toLowerCase());
    if (flag === undefined) {
      throw new InvalidModifierError(input, `unsupported flag "${ch}" for ${kind} modifier (${describeFlags(supported)})`);
    }
    if (!flags.includes(flag)) flags.push(flag);
  }
  return flags;
}

function describeFlags(supported: readonly string[]): string {
  if (supported.length === 0) return 'it takes no flags';
  if (supported.length === 1) return `supported flag: ${supported.join('')}`;
  return `supported flags: ${supported.join(', ')}`;
}

function parseSubstitute(input: string, parts: readonly string[]): SubstituteModifier {
  const [, rawPattern = '', rawReplacement = '', rawFlags = ''] = parts;
  if (rawPattern === '') {
    throw new InvalidModifierError(input, 'no previous regular expression');
  }

  const flags = parseFlags(input, rawFlags, SUBSTITUTE_FLAGS, FORMS.s.name);
  const source = toUnicodePattern(flags.includes('x') ? stripVerbose(rawPattern) : rawPattern);
  // Patterns always match code points, so `u` is implied. `l` has no counterpart:
  // JavaScript character classes do not depend on the locale.
  const regexFlags = `${flags.filter((flag) => flag === 'i' || flag === 'm' || flag === 's').join('')}u`;
  const global = flags.includes('g');

  let pattern: RegExp;
  let probe: RegExpExecArray | null;
  try {
    pattern = new RegExp(source, global ? `${regexFlags}g` : regexFlags);
    probe = new RegExp(`(?:${source})|`, regexFlags).exec('');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidModifierError(input, `invalid regular expression: ${message}`, { cause: error });
  }

  const groups: GroupInfo = {
    count: probe ? probe.length - 1 : 0,
    names: new Set(Object.keys(probe?.groups ?? {})),
  };

  return {
    kind: 'substitute',
    source: input,
    pattern,
    replacement: compileReplacement(input, rawReplacement, groups),
    flags,
    count: global ? 0 : 1,
  };
}

function parseTransliterate(input: string, parts: readonly string[]): TransliterateModifier {
  const [, rawSource = '', rawDestination = '', rawFlags = ''] = parts;
  if (rawSource === '') {
    throw new InvalidModifierError(input, 'no previous regular expression');
  }

  const flags = parseFlags(input, rawFlags, TRANSLITERATE_FLAGS, FORMS.y.name);
  const source = Array.from(expandForModifier(input, rawSource));
  const destination = Array.from(expandForModifier(input, rawDestination));
  if (source.length !== destination.length) {
    throw new InvalidModifierError(
      input,
      `source and destination must have equal length (${String(source.length)} != ${String(destination.length)})`,
    );
  }

  const table = new Map<string, string>();
  const assign = (from: string, to: string): void => {
    // Only single code points can be mapped; the first assignment wins.
    if (Array.from(from).length === 1 && !table.has(from)) table.set(from, to);
  };

  if (flags.includes('i')) {
    source.forEach((ch, i) => assign(ch.toLowerCase(), destination[i] ?? ch));
    source.forEach((ch, i) => assign(ch.toUpperCase(), destination[i] ?? ch));
  } else {
    source.forEach((ch, i) => assign(ch, destination[i] ?? ch));
  }

  return { kind: 'transliterate', source: input, table, flags };
}

function parseExecute(input: string, parts: readonly string[]): ExecuteModifier {
  const [, command = '', rawFlags = ''] = parts;
  parseFlags(input, rawFlags, EXECUTE_FLAGS, FORMS.e.name);
  if (command.trim() === '') {
    throw new InvalidModifierError(input, 'missing command');
  }
  return { kind: 'execute', source: input, command };
}

function expandForModifier(input: string, part: string): string {
  try {
    return expandRanges(part);
  } catch (error) {
    if (error instanceof CharacterRangeError) {
      throw new InvalidModifierError(input, error.message, { cause: error });
    }
    throw error;
  }
}

interface GroupInfo {
  readonly count: number;
  readonly names: ReadonlySet<string>;
}

const ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r' };

/**
 * Compile a replacement template. `\N` and `\g<N>` refer to numbered groups (`\g<0>` is the
 * whole match), `\g<name>` to a named one. `\0` starts an octal escape, so `\0` alone is NUL.
 * `$` carries no meaning.
 */
function compileReplacement(input: string, template: string, groups: GroupInfo): ReplacementPart[] {
  const parts: ReplacementPart[] = [];
  const chars = Array.from(template);
  let text = '';
  let idx = 0;

  const pushGroup = (group: number | string): void => {
    if (text) parts.push({ type: 'text', text });
    text = '';
    parts.push({ type: 'group', group });
  };

  const checkNumber = (group: number): number => {
    if (group > groups.count) {
      throw new InvalidModifierError(input, `invalid group reference ${String(group)}`);
    }
    return group;
  };

  while (idx < chars.length) {
    const ch = chars[idx++] ?? '';
    const next = chars[idx];
    if (ch !== '\\' || next === undefined) {
      text += ch;
      continue;
    }
    idx++;

    if (next === '0') {
      let octal = next;
      while (octal.length < 3 && isOctalDigit(chars[idx])) octal += chars[idx++] ?? '';
      text += String.fromCharCode(parseInt(octal, 8));
      continue;
    }

    if (isDigit(next)) {
      const following = chars[idx];
      if (following !== undefined && isDigit(following) && Number(next + following) <= groups.count) {
        idx++;
        pushGroup(Number(next + following));
      } else {
        pushGroup(checkNumber(Number(next)));
      }
      continue;
    }

    if (next === 'g' && chars[idx] === '<') {
      const close = chars.indexOf('>', idx);
      if (close < 0) {
        throw new InvalidModifierError(input, 'missing ">" in group reference');
      }
      const name = chars.slice(idx + 1, close).join('');
      idx = close + 1;
      if (/^\d+$/.test(name)) {
        pushGroup(checkNumber(Number(name)));
      } else if (groups.names.has(name)) {
        pushGroup(name);
      } else {
        throw new InvalidModifierError(input, `unknown group name "${name}"`);
      }
      continue;
    }

    text += ESCAPES[next] ?? next;
  }

  if (text) parts.push({ type: 'text', text });
  return parts;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isOctalDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '7';
}

/** Drop unescaped whitespace and `#` comments outside character classes. */
function stripVerbose(pattern: string): string {
  const chars = Array.from(pattern);
  let out = '';
  let inClass = false;
  let idx = 0;

  while (idx < chars.length) {
    const ch = chars[idx++] ?? '';

    if (ch === '\\') {
      const next = chars[idx++];
      if (next === undefined) out += ch;
      else if (!inClass && (next === '#' || /\s/.test(next))) out += next;
      else out += ch + next;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      out += ch;
      continue;
    }
    if (ch === '[') {
      inClass = true;
      out += ch;
      continue;
    }
    if (/\s/.test(ch)) continue;
    if (ch === '#') {
      while (idx < chars.length && chars[idx] !== '\n') idx++;
      continue;
    }
    out += ch;
  }

  return out;
}

const SYNTAX_CHARACTERS = new Set(['^', '$', '\\', '.', '*', '+', '?', '(', ')', '[', ']', '{', '}', '|', '/']);
const QUANTIFIER = /^\{\d+(?:,\d*)?\}/;

/**
 * Rewrite a pattern so that unicode mode accepts it: escaped punctuation without a meaning
 * (`\-`, `\#`, `\ `) becomes the plain character, and a lone `]`, `{` or `}` is escaped.
 */
function toUnicodePattern(pattern: string): string {
  const chars = Array.from(pattern);
  let out = '';
  let inClass = false;
  let idx = 0;

  while (idx < chars.length) {
    const ch = chars[idx++] ?? '';

    if (ch === '\\') {
      const next = chars[idx++];
      if (next === undefined) out += ch;
      else if (/[A-Za-z0-9]/.test(next) || SYNTAX_CHARACTERS.has(next) || (inClass && next === '-')) out += ch + next;
      else out += next;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      out += ch;
      continue;
    }
    if (ch === '[') {
      inClass = true;
      out += ch;
      // A leading `]` (after an optional `^`) is a member of the class.
      if (chars[idx] === '^') {
        out += '^';
        idx++;
      }
      if (chars[idx] === ']') {
        out += '\\]';
        idx++;
      }
      continue;
    }
    if (ch === '{') {
      const quantifier = QUANTIFIER.exec(chars.slice(idx - 1).join(''));
      if (quantifier) {
        out += quantifier[0];
        idx += quantifier[0].length - 1;
      } else {
        out += '\\{';
      }
      continue;
    }
    if (ch === ']' || ch === '}') {
      out += `\\${ch}`;
      continue;
    }
    out += ch;
  }

  return out;
}
