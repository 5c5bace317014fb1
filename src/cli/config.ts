import { InvalidArgumentError } from 'commander';
import { DEFAULT_TIMEOUT_MS } from '../CsvSed.js';

/** Options as parsed by commander. */
export interface CliOptions {
  readonly columns: string;
  readonly expr: string;
  readonly delimiter?: string;
  readonly tabs?: boolean;
  readonly quotechar?: string;
  readonly outDelimiter?: string;
  readonly headerRow: boolean;
  readonly linenumbers?: boolean;
  readonly timeout?: number;
  readonly verbose?: boolean;
}

/** Fully resolved settings for one CLI run. */
export interface CliConfig {
  readonly columns: readonly (number | string)[];
  readonly expr: string;
  readonly header: boolean;
  readonly inputDelimiter?: string;
  readonly outputDelimiter: string;
  readonly quoteChar: string;
  readonly lineNumbers: boolean;
  readonly timeoutMs: number;
  /** Set by `--verbose`; otherwise the logger keeps its `LOG_LEVEL` default. */
  readonly logLevel?: 'debug';
}

const DURATION = /^(\d+)(ms|s|m|h)?$/;
const UNIT_MS: Readonly<Record<string, number>> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };

/**
 * Parse a duration such as `500ms`, `30s`, `5m` or `2h` into milliseconds. A bare number is
 * taken as seconds.
 */
export function parseTimeout(value: string): number {
  const match = DURATION.exec(value.trim());
  const amount = Number(match?.[1]);
  const unit = UNIT_MS[match?.[2] ?? 's'];
  if (!match || unit === undefined || amount <= 0) {
    throw new InvalidArgumentError(`Invalid duration "${value}". Use e.g. 500ms, 30s, 5m or 2h.`);
  }
  return amount * unit;
}

/** Split a `--columns` list into 0-based indices and header names. */
export function parseColumns(list: string): (number | string)[] {
  const columns = list.split(',').map((item) => item.trim());
  if (columns.some((column) => column === '')) {
    throw new Error(`Invalid column list "${list}": empty column identifier.`);
  }
  return columns.map((column) => (/^\d+$/.test(column) ? Number(column) : column));
}

function timeoutFromEnv(env: NodeJS.ProcessEnv): number | undefined {
  const value = env.CSVSED_TIMEOUT;
  if (!value) return undefined;
  try {
    return parseTimeout(value);
  } catch (error) {
    throw new Error(`CSVSED_TIMEOUT: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
}

/** Combine command-line options with the environment; options win. */
export function resolveCliConfig(options: CliOptions, env: NodeJS.ProcessEnv): CliConfig {
  return {
    columns: parseColumns(options.columns),
    expr: options.expr,
    header: options.headerRow,
    inputDelimiter: options.tabs ? '\t' : options.delimiter,
    outputDelimiter: options.outDelimiter ?? ',',
    quoteChar: options.quotechar ?? '"',
    lineNumbers: options.linenumbers ?? false,
    timeoutMs: options.timeout ?? timeoutFromEnv(env) ?? DEFAULT_TIMEOUT_MS,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}
