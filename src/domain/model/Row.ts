/** One CSV record: an ordered sequence of string fields. */
export type Row = string[];

/** Anything rows can be pulled from, one at a time. The `RowFilter` is itself one. */
export type RowSource = Iterable<Row> | AsyncIterable<Row>;

/** Check that a value produced by a parser is a row of strings. */
export function isRow(value: unknown): value is Row {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}
