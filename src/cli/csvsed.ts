import type { Writable } from 'node:stream';
import { Command, CommanderError, Option } from 'commander';
import { CsvSed } from '../CsvSed.js';
import type { CommandRunner } from '../domain/ports/CommandRunner.js';
import type { DataSource, SourceMetadata } from '../domain/ports/DataSource.js';
import type { RowSink } from '../domain/ports/RowSink.js';
import { CsvRowReader } from '../infrastructure/csv/CsvRowReader.js';
import { CsvRowWriter } from '../infrastructure/csv/CsvRowWriter.js';
import { LineNumberSink } from '../infrastructure/csv/LineNumberSink.js';
import { FilePathSource } from '../infrastructure/sources/FilePathSource.js';
import { StreamSource } from '../infrastructure/sources/StreamSource.js';
import logger from '../infrastructure/logging/logger.js';
import { parseTimeout, resolveCliConfig, type CliConfig, type CliOptions } from './config.js';

/** Streams the CLI reads from and writes to; injectable for tests. */
export interface CliIo {
  readonly stdin: AsyncIterable<string | Buffer>;
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly env: NodeJS.ProcessEnv;
  /** Overrides the shell runner used by `e/COMMAND/` modifiers. */
  readonly commandRunner?: CommandRunner;
}

const DESCRIPTION =
  'A stream-oriented CSV modification tool. Like a stripped-down "sed" command, but for tabular data.';

/** Name of the input for log lines, with its size when known: `data.csv (120 bytes)`. */
export function describeSource(metadata: SourceMetadata): string {
  const name = metadata.fileName ?? 'input';
  return metadata.fileSize === undefined ? name : `${name} (${String(metadata.fileSize)} bytes)`;
}

/** Build the `csvsed` command. `onRun` receives the resolved configuration and input path. */
export function createProgram(onRun: (config: CliConfig, file: string | undefined) => Promise<void>, io: CliIo): Command {
  return new Command()
    .name('csvsed')
    .description(DESCRIPTION)
    .argument('[file]', 'CSV file to read (default: standard input)')
    .requiredOption('-c, --columns <list>', 'comma-separated list of 0-based column indices or names to modify')
    .requiredOption(
      '-r, --expr <modifier>',
      'modifier to apply: s/REGEX/REPL/FLAGS, y/SRC/DST/FLAGS or e/COMMAND/',
    )
    .option('-d, --delimiter <char>', 'input field delimiter (default: auto-detect)')
    .option('-t, --tabs', 'input is tab-delimited')
    .option('-q, --quotechar <char>', 'character used to quote fields')
    .option('-D, --out-delimiter <char>', 'output field delimiter', ',')
    .option('-H, --no-header-row', 'input has no header row; columns must be given by index')
    .option('-l, --linenumbers', 'prefix each row with a line_number column')
    .addOption(
      new Option('--timeout <duration>', 'maximum run time of each e/COMMAND/ call (e.g. 500ms, 30s, 5m)').argParser(
        parseTimeout,
      ),
    )
    .option('-v, --verbose', 'log filter progress to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .action(async (file: string | undefined, options: CliOptions) => {
      await onRun(resolveCliConfig(options, io.env), file);
    });
}

/** Run the modifier engine over one CSV input as configured on the command line. */
export async function runFilter(config: CliConfig, file: string | undefined, io: CliIo): Promise<void> {
  if (config.logLevel) logger.setLevel(config.logLevel);

  const source: DataSource = file ? new FilePathSource(file) : new StreamSource(io.stdin, { fileName: 'stdin' });
  const modifiers = new Map(config.columns.map((column) => [column, config.expr] as const));

  const sed = new CsvSed({
    modifiers,
    header: config.header,
    timeoutMs: config.timeoutMs,
    commandRunner: io.commandRunner,
    onHandlerError: (error, event) => {
      logger.warn(`Event handler for ${event.type} failed: ${error instanceof Error ? error.message : String(error)}`);
    },
  })
    .from(source, new CsvRowReader({ delimiter: config.inputDelimiter, quoteChar: config.quoteChar }))
    .on('filter:started', (event) => {
      logger.debug(`Modifying columns [${event.columns.join(', ')}] of ${describeSource(source.metadata())}`);
    })
    .on('filter:completed', (event) => {
      logger.debug(`Wrote ${String(event.rowCount)} rows`);
    })
    .on('filter:failed', (event) => {
      logger.debug(`Stopped at row ${String(event.rowIndex)}: ${event.error}`);
    });

  const writer = new CsvRowWriter(io.stdout, { delimiter: config.outputDelimiter, quoteChar: config.quoteChar });
  const sink: RowSink = config.lineNumbers ? new LineNumberSink(writer) : writer;
  await sed.run(sink);
}

/**
 * Parse `argv` (without the node and script entries), run, and return the exit status.
 * Errors are reported on `io.stderr` as `csvsed: <message>`.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const program = createProgram((config, file) => runFilter(config, file, io), io);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed usage errors, help and version output.
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message);
    io.stderr.write(`csvsed: ${message}\n`);
    return 1;
  }
}
