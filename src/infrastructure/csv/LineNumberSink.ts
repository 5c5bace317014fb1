import type { Row } from '../../domain/model/Row.js';
import type { RowSink } from '../../domain/ports/RowSink.js';

/** Sink decorator that prefixes each row with its 1-based data row number. */
export class LineNumberSink implements RowSink {
  private line = 0;

  constructor(
    private readonly inner: RowSink,
    private readonly columnName = 'line_number',
  ) {}

  writeHeader(row: Row): Promise<void> | void {
    return this.inner.writeHeader([this.columnName, ...row]);
  }

  write(row: Row): Promise<void> | void {
    this.line++;
    return this.inner.write([String(this.line), ...row]);
  }

  end(): Promise<void> | void {
    return this.inner.end?.();
  }
}
