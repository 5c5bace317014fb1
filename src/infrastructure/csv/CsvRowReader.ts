import { PassThrough, Readable } from 'node:stream';
import Papa from 'papaparse';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { DialectOptions, RowReader } from '../../domain/ports/RowReader.js';
import { isRow, type Row } from '../../domain/model/Row.js';

export interface CsvRowReaderOptions extends DialectOptions {
  /** Skip lines with no content. A quoted empty field (`""`) is a row, not an empty line. Default: `true`. */
  readonly skipEmptyLines?: boolean;
}

/**
 * CSV decoder using PapaParse's streaming parser.
 *
 * Chunks are fed to the parser as they arrive, so records may span chunk boundaries and the
 * whole file is never held in memory. Values are left as strings.
 */
export class CsvRowReader implements RowReader {
  private readonly options: CsvRowReaderOptions;

  constructor(options?: CsvRowReaderOptions) {
    this.options = {
      delimiter: options?.delimiter,
      quoteChar: options?.quoteChar ?? '"',
      skipEmptyLines: options?.skipEmptyLines ?? true,
    };
  }

  async *read(source: DataSource): AsyncIterable<Row> {
    const input = Readable.from(source.read());
    const rows = new PassThrough({ objectMode: true });
    let cursor = 0;

    Papa.parse<unknown, Readable>(input, {
      header: false,
      delimiter: this.options.delimiter,
      quoteChar: this.options.quoteChar,
      skipEmptyLines: false,
      dynamicTyping: false,
      step: (results, parser) => {
        if (rows.destroyed) {
          parser.abort();
          return;
        }
        // Papa reports an empty line and a lone `""` alike as `['']`; only the number of
        // characters consumed tells them apart.
        const consumed = results.meta.cursor - cursor;
        cursor = results.meta.cursor;
        if (this.options.skipEmptyLines && isEmptyLine(results.data, consumed, results.meta.linebreak)) return;

        if (!rows.write(results.data)) {
          input.pause();
          rows.once('drain', () => input.resume());
        }
      },
      complete: () => {
        if (!rows.destroyed) rows.end();
      },
      error: (error) => {
        rows.destroy(error);
      },
    });

    try {
      for await (const value of rows) {
        if (!isRow(value)) {
          throw new Error(`CsvRowReader: expected a row of strings, got ${JSON.stringify(value)}`);
        }
        yield value;
      }
    } finally {
      input.destroy();
      rows.destroy();
    }
  }
}

function isEmptyLine(data: unknown, consumed: number, linebreak: string): boolean {
  return Array.isArray(data) && data.length === 1 && data[0] === '' && consumed <= linebreak.length;
}
