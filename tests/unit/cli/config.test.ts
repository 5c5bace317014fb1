import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseColumns, parseTimeout, resolveCliConfig, type CliOptions } from '../../../src/cli/config.js';

const BASE: CliOptions = { columns: '0', expr: 's/a/b/', headerRow: true };

describe('parseTimeout', () => {
  it.each([
    ['500ms', 500],
    ['30s', 30_000],
    ['5m', 300_000],
    ['2h', 7_200_000],
    ['45', 45_000],
    [' 10s ', 10_000],
  ])('should parse %j as %i milliseconds', (value, expected) => {
    expect(parseTimeout(value)).toBe(expected);
  });

  it.each(['', '0', '0s', 'soon', '1.5s', '-1', '10d'])('should reject %j', (value) => {
    expect(() => parseTimeout(value)).toThrow(InvalidArgumentError);
  });

  it('should explain the accepted format', () => {
    expect(() => parseTimeout('soon')).toThrow('Invalid duration "soon". Use e.g. 500ms, 30s, 5m or 2h.');
  });
});

describe('parseColumns', () => {
  it('should split indices and names', () => {
    expect(parseColumns('0,header 2, 3')).toEqual([0, 'header 2', 3]);
  });

  it('should reject empty identifiers', () => {
    expect(() => parseColumns('a,,b')).toThrow('Invalid column list "a,,b": empty column identifier.');
  });
});

describe('resolveCliConfig', () => {
  it('should apply defaults', () => {
    expect(resolveCliConfig(BASE, {})).toEqual({
      columns: [0],
      expr: 's/a/b/',
      header: true,
      inputDelimiter: undefined,
      outputDelimiter: ',',
      quoteChar: '"',
      lineNumbers: false,
      timeoutMs: 30_000,
      logLevel: undefined,
    });
  });

  it('should map the command-line switches', () => {
    const config = resolveCliConfig(
      {
        ...BASE,
        columns: 'header 1,2',
        delimiter: ';',
        quotechar: "'",
        outDelimiter: '|',
        headerRow: false,
        linenumbers: true,
        verbose: true,
      },
      {},
    );

    expect(config).toMatchObject({
      columns: ['header 1', 2],
      header: false,
      inputDelimiter: ';',
      outputDelimiter: '|',
      quoteChar: "'",
      lineNumbers: true,
      logLevel: 'debug',
    });
  });

  it('should let --tabs override the delimiter', () => {
    expect(resolveCliConfig({ ...BASE, delimiter: ';', tabs: true }, {}).inputDelimiter).toBe('\t');
  });

  it('should read the timeout from the environment', () => {
    expect(resolveCliConfig(BASE, { CSVSED_TIMEOUT: '5s' }).timeoutMs).toBe(5000);
  });

  it('should prefer the --timeout option over the environment', () => {
    expect(resolveCliConfig({ ...BASE, timeout: 100 }, { CSVSED_TIMEOUT: '5s' }).timeoutMs).toBe(100);
  });

  it('should name the variable when the environment timeout is invalid', () => {
    expect(() => resolveCliConfig(BASE, { CSVSED_TIMEOUT: 'soon' })).toThrow(
      'CSVSED_TIMEOUT: Invalid duration "soon". Use e.g. 500ms, 30s, 5m or 2h.',
    );
  });
});
