import type { Row } from '../model/Row.js';
import type { DataSource } from './DataSource.js';

/** CSV dialect options shared by readers and writers. */
export interface DialectOptions {
  /** Field delimiter (e.g. `','`, `';'`, `'\t'`). Readers auto-detect when omitted. */
  readonly delimiter?: string;
  /** Character used to quote fields. Default: `'"'`. */
  readonly quoteChar?: string;
}

/**
 * Port for decoding a data source into rows.
 *
 * Implement this interface to plug in another CSV decoder. Rows are yielded lazily, in order,
 * including the header row when the data has one.
 */
export interface RowReader {
  read(source: DataSource): AsyncIterable<Row>;
}
