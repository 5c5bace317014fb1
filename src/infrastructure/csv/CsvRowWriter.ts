import { once } from 'node:events';
import type { Writable } from 'node:stream';
import Papa from 'papaparse';
import type { Row } from '../../domain/model/Row.js';
import type { DialectOptions } from '../../domain/ports/RowReader.js';
import type { RowSink } from '../../domain/ports/RowSink.js';

export interface CsvRowWriterOptions extends DialectOptions {
  /** Line terminator. Default: `'\n'`. */
  readonly newline?: string;
  /** End `output` when the sink is ended. Default: `false` (e.g. for `process.stdout`). */
  readonly closeOutput?: boolean;
}

/** CSV encoder writing one PapaParse-quoted line per row, honoring back-pressure. */
export class CsvRowWriter implements RowSink {
  private readonly delimiter: string;
  private readonly quoteChar: string;
  private readonly newline: string;
  private readonly closeOutput: boolean;

  constructor(
    private readonly output: Writable,
    options?: CsvRowWriterOptions,
  ) {
    this.delimiter = options?.delimiter ?? ',';
    this.quoteChar = options?.quoteChar ?? '"';
    this.newline = options?.newline ?? '\n';
    this.closeOutput = options?.closeOutput ?? false;
  }

  writeHeader(row: Row): Promise<void> {
    return this.write(row);
  }

  async write(row: Row): Promise<void> {
    // A row holding one empty field is quoted, or it would read back as an empty line.
    const line =
      row.length === 1 && row[0] === ''
        ? this.quoteChar + this.quoteChar
        : Papa.unparse([row], {
            delimiter: this.delimiter,
            quoteChar: this.quoteChar,
            newline: this.newline,
            header: false,
          });
    if (!this.output.write(line + this.newline)) {
      await once(this.output, 'drain');
    }
  }

  async end(): Promise<void> {
    if (!this.closeOutput) return;
    await new Promise<void>((resolve) => {
      this.output.end(() => resolve());
    });
  }
}
