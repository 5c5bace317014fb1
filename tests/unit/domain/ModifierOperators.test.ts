import { describe, it, expect, vi } from 'vitest';
import { parseModifier } from '../../../src/domain/services/ModifierParser.js';
import { applyModifier, substitute, transliterate } from '../../../src/domain/services/ModifierOperators.js';
import type { ExecutionContext } from '../../../src/domain/services/ModifierOperators.js';
import type { CommandResult, CommandRunner } from '../../../src/domain/ports/CommandRunner.js';
import type { Modifier } from '../../../src/domain/model/Modifier.js';
import { ExecutionError, InvalidModifierError } from '../../../src/domain/errors/CsvSedErrors.js';

function fakeRunner(result: CommandResult) {
  return { run: vi.fn<CommandRunner['run']>().mockResolvedValue(result) };
}

function contextWith(runner: CommandRunner): ExecutionContext {
  return { runner, timeoutMs: 1000 };
}

const noCommands = contextWith({
  run: () => Promise.reject(new Error('no command expected')),
});

function apply(text: string, value: string): Promise<string> {
  return applyModifier(parseModifier(text), value, noCommands);
}

describe('substitute', () => {
  it('should replace only the first match by default', async () => {
    expect(await apply('s/a/b/', 'abcabc')).toBe('bbcabc');
    expect(await apply('s/./x/', 'field 1.1')).toBe('xield 1.1');
  });

  it('should replace every match with the global flag', async () => {
    expect(await apply('s/a/b/g', 'abcabc')).toBe('bbcbbc');
    expect(await apply('s/./x/g', 'field 1.1')).toBe('xxxxxxxxx');
  });

  it('should honor case-insensitive matching', async () => {
    expect(await apply('s/a/b/g', 'abcABC')).toBe('bbcABC');
    expect(await apply('s/a/b/gi', 'abcABC')).toBe('bbcbBC');
    expect(await apply('s/[IE]/../i', 'field 1.1')).toBe('f..eld 1.1');
    expect(await apply('s/[IE]/../ig', 'field 1.1')).toBe('f....ld 1.1');
  });

  it('should return the value unchanged when nothing matches', async () => {
    expect(await apply('s/[IE]/../', 'field 1.1')).toBe('field 1.1');
  });

  it('should match characters outside the basic multilingual plane as one character', async () => {
    expect(await apply('s/./*/', '😀b')).toBe('*b');
    expect(await apply('s/^.$/one/', '😀')).toBe('one');
    expect(await apply('s/[😀😁]/:)/g', 'a😁b😀')).toBe('a:)b:)');
  });

  it('should accept escaped punctuation with or without the unicode flag', async () => {
    expect(await apply('s/a\\-b/x/', 'a-b')).toBe('x');
    expect(await apply('s/a\\-b/x/u', 'a-b')).toBe('x');
    expect(await apply('s/[\\-]+/_/g', 'a--b-c')).toBe('a_b_c');
  });

  it('should work on non-ASCII text', async () => {
    expect(await apply('s/π/p/', 'κάππα')).toBe('κάpπα');
    expect(await apply('s/π/Π/g', 'κάππα')).toBe('κάΠΠα');
    expect(await apply('s/(,|[^άα])//g', 'άλφα,βήτα,γάμμα')).toBe('άααάα');
  });

  it('should remove matches with an empty replacement', async () => {
    expect(await apply('s/,//g', '123,456,789.0')).toBe('123456789.0');
  });

  it('should expand numbered and named back-references', async () => {
    expect(await apply('s/(\\w+) (\\w+)/\\2 \\1/', 'hello world')).toBe('world hello');
    expect(await apply('s/(?<first>\\w+)-(?<second>\\w+)/\\g<second>-\\g<first>/', 'ab-cd')).toBe('cd-ab');
    expect(await apply('s/b+/[\\g<0>]/', 'abbc')).toBe('a[bb]c');
  });

  it('should insert a NUL character for \\0', async () => {
    expect(await apply('s/b/\\0/', 'abc')).toBe('a\0c');
  });

  it('should expand an unmatched group to nothing', async () => {
    expect(await apply('s/(x)?a/<\\1>/', 'a')).toBe('<>');
  });

  it('should treat dollar signs in the replacement literally', async () => {
    expect(await apply('s/a/$1$&/', 'xa')).toBe('x$1$&');
  });

  it('should expand control character escapes', async () => {
    expect(await apply('s/,/\\n/g', 'a,b,c')).toBe('a\nb\nc');
    expect(await apply('s/,/\\t/', 'a,b')).toBe('a\tb');
  });

  it('should apply multiline and dot-all flags', async () => {
    expect(await apply('s/^b/X/g', 'a\nb')).toBe('a\nb');
    expect(await apply('s/^b/X/gm', 'a\nb')).toBe('a\nX');
    expect(await apply('s/a.b/X/', 'a\nb')).toBe('a\nb');
    expect(await apply('s/a.b/X/s', 'a\nb')).toBe('X');
  });

  it('should give the same result when applied repeatedly', () => {
    const modifier = parseModifier('s/a/b/g');
    if (modifier.kind !== 'substitute') throw new Error('expected substitute');
    expect(substitute(modifier, 'aaa')).toBe('bbb');
    expect(substitute(modifier, 'aaa')).toBe('bbb');
  });
});

describe('transliterate', () => {
  it('should map characters one to one', async () => {
    expect(await apply('y/abc/def/', 'b,a,c')).toBe('e,d,f');
    expect(await apply('y/abc/def/', 'b,A,C')).toBe('e,A,C');
  });

  it('should map both cases with the case-insensitive flag', async () => {
    expect(await apply('y/abc/def/i', 'b,A,C')).toBe('e,d,f');
  });

  it('should expand ranges and escaped dashes', async () => {
    expect(await apply('y/a-z/A-Z/', 'Back-Up')).toBe('BACK-UP');
    expect(await apply('y/a\\-z/A~Z/', 'Back-Up')).toBe('BAck~Up');
  });

  it('should map non-ASCII characters', async () => {
    expect(await apply('y/αβγ/abg/', 'β,α,γ')).toBe('b,a,g');
    expect(await apply('y/abg/αβγ/', 'b,a,g')).toBe('β,α,γ');
    expect(await apply('y/αβγ/γαβ/', 'β,α,γ')).toBe('α,γ,β');
  });

  it('should preserve length', () => {
    const modifier = parseModifier('y/a-m/n-z/');
    if (modifier.kind !== 'transliterate') throw new Error('expected transliterate');
    const value = 'the quick brown fox';
    expect(transliterate(modifier, value)).toHaveLength(value.length);
  });
});

describe('execute', () => {
  it('should pipe the value through the command and drop one trailing newline', async () => {
    const runner = fakeRunner({ exitCode: 0, stdout: 'y,x,c\n', stderr: '' });

    const result = await applyModifier(parseModifier('e/tr ab xy/'), 'b,a,c', contextWith(runner));

    expect(result).toBe('y,x,c');
    expect(runner.run).toHaveBeenCalledWith('tr ab xy', 'b,a,c', { timeoutMs: 1000 });
  });

  it('should only trim a single trailing newline', async () => {
    const runner = fakeRunner({ exitCode: 0, stdout: '16\n\n', stderr: '' });
    expect(await applyModifier(parseModifier('e/bc/'), '4^2', contextWith(runner))).toBe('16\n');
  });

  it('should leave output without a trailing newline untouched', async () => {
    const runner = fakeRunner({ exitCode: 0, stdout: '16', stderr: '' });
    expect(await applyModifier(parseModifier('e/bc/'), '4^2', contextWith(runner))).toBe('16');
  });

  it('should fail with the command and its stderr on a non-zero exit', async () => {
    const runner = fakeRunner({ exitCode: 2, stdout: '', stderr: 'boom\n' });

    const promise = applyModifier(parseModifier('e/false/'), 'x', contextWith(runner));

    await expect(promise).rejects.toBeInstanceOf(ExecutionError);
    await expect(promise).rejects.toMatchObject({
      command: 'false',
      reason: 'exit',
      exitCode: 2,
      stderr: 'boom\n',
      message: 'command "false" failed with exit code 2: boom',
    });
  });

  it('should fail when the command was killed by a signal', async () => {
    const runner = fakeRunner({ exitCode: null, stdout: '', stderr: '' });

    await expect(applyModifier(parseModifier('e/sleep 5/'), 'x', contextWith(runner))).rejects.toMatchObject({
      reason: 'exit',
      exitCode: null,
    });
  });

  it('should propagate runner failures', async () => {
    const runner: CommandRunner = {
      run: () => Promise.reject(new ExecutionError('slow', 'timeout', { timeoutMs: 1000 })),
    };

    await expect(applyModifier(parseModifier('e/slow/'), 'x', contextWith(runner))).rejects.toThrow(
      'command "slow" timed out after 1000ms',
    );
  });
});

describe('function modifiers', () => {
  it('should call synchronous and asynchronous functions', async () => {
    expect(await applyModifier(parseModifier((value) => value.toUpperCase()), 'abc', noCommands)).toBe('ABC');
    expect(await applyModifier(parseModifier(async (value) => `${value}!`), 'abc', noCommands)).toBe('abc!');
  });

  it('should reject a function that does not return a string', async () => {
    const modifier: Modifier = {
      kind: 'function',
      source: '<function>',
      fn: () => 42 as unknown as string,
    };

    await expect(applyModifier(modifier, 'abc', noCommands)).rejects.toThrow(InvalidModifierError);
    await expect(applyModifier(modifier, 'abc', noCommands)).rejects.toThrow(
      'Invalid modifier "<function>": function returned number instead of a string',
    );
  });
});
