import type { Row } from '../model/Row.js';

/** Port for consuming filtered rows, e.g. encoding them back to CSV. */
export interface RowSink {
  /** Accept the header row. Called at most once, before any data row. */
  writeHeader(row: Row): Promise<void> | void;
  /** Accept the next data row. */
  write(row: Row): Promise<void> | void;
  /** Flush and release the underlying output, if the sink owns one. */
  end?(): Promise<void> | void;
}
