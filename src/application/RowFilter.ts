import type { ColumnMapping, ModifierEntries } from '../domain/model/ColumnMapping.js';
import type { Row, RowSource } from '../domain/model/Row.js';
import type { ExecutionContext } from '../domain/services/ModifierOperators.js';
import { applyModifier } from '../domain/services/ModifierOperators.js';
import { resolveColumns } from '../domain/services/ColumnResolver.js';
import { ColumnIdentifierError } from '../domain/errors/CsvSedErrors.js';
import type { EventBus } from './EventBus.js';

/** Lifecycle of a `RowFilter`. */
export type FilterState = 'awaiting-header' | 'streaming' | 'exhausted';

export interface RowFilterOptions {
  /** When `true`, the first row is the header: it names columns and is passed through untouched. */
  readonly header?: boolean;
  /** Runner and timeout for `e/COMMAND/` modifiers. */
  readonly execution: ExecutionContext;
  readonly events?: EventBus;
}

type RowIterator = Iterator<Row, unknown> | AsyncIterator<Row, unknown>;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Applies a resolved column mapping to rows as they are pulled.
 *
 * Single pass, one row at a time: each pull requests exactly one row upstream, replaces every
 * mapped field with its modifier's result and yields the same row. The header row, when there
 * is one, is yielded first and never modified. Once the source ends or a modifier fails the
 * filter stays exhausted.
 *
 * @example
 * ```typescript
 * const filter = await RowFilter.open(rows, { 'header 1': 's/./x/g' }, { header: true, execution });
 * for await (const row of filter) writer.write(row);
 * ```
 */
export class RowFilter implements AsyncIterableIterator<Row> {
  private stateValue: FilterState;
  private rowCount = 0;

  constructor(
    private readonly upstream: RowIterator,
    readonly columns: ColumnMapping,
    private readonly execution: ExecutionContext,
    /** The header row already pulled from `upstream`, if any. */
    readonly header?: Row,
    private readonly events?: EventBus,
  ) {
    this.stateValue = header ? 'awaiting-header' : 'streaming';
  }

  /**
   * Pull the header row (when configured), resolve `modifiers` against it and return a filter
   * positioned before the first row.
   *
   * @throws InvalidModifierError | ColumnIdentifierError before any row is yielded.
   */
  static async open(source: RowSource, modifiers: ModifierEntries, options: RowFilterOptions): Promise<RowFilter> {
    const upstream = toIterator(source);
    let header: Row | undefined;
    let ended = false;

    if (options.header) {
      const first = await upstream.next();
      ended = first.done === true;
      header = first.done ? [] : first.value;
    }

    let columns: ColumnMapping;
    try {
      columns = resolveColumns(header, modifiers);
    } catch (error) {
      await upstream.return?.();
      throw error;
    }

    options.events?.emit({
      type: 'filter:started',
      columns: [...columns.keys()],
      hasHeader: header !== undefined,
      timestamp: Date.now(),
    });

    const filter = new RowFilter(upstream, columns, options.execution, ended ? undefined : header, options.events);
    if (ended) filter.finish();
    return filter;
  }

  get state(): FilterState {
    return this.stateValue;
  }

  /** Number of data rows yielded so far. */
  get rowsProcessed(): number {
    return this.rowCount;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<Row, undefined>> {
    switch (this.stateValue) {
      case 'exhausted':
        return DONE;
      case 'awaiting-header':
        this.stateValue = 'streaming';
        return { done: false, value: this.header ?? [] };
      case 'streaming':
        return this.pull();
    }
  }

  /** Stop early: the filter becomes exhausted and the upstream iterator is closed. */
  async return(): Promise<IteratorResult<Row, undefined>> {
    if (this.stateValue !== 'exhausted') {
      this.stateValue = 'exhausted';
      await this.upstream.return?.();
    }
    return DONE;
  }

  private async pull(): Promise<IteratorResult<Row, undefined>> {
    const next = await this.upstream.next();
    if (next.done) {
      this.finish();
      return DONE;
    }

    const row = next.value;
    const rowIndex = this.rowCount;
    try {
      await this.transform(row, rowIndex);
    } catch (error) {
      this.stateValue = 'exhausted';
      this.events?.emit({
        type: 'filter:failed',
        rowIndex,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      await this.upstream.return?.();
      throw error;
    }

    this.rowCount++;
    this.events?.emit({
      type: 'row:transformed',
      rowIndex,
      columns: [...this.columns.keys()],
      timestamp: Date.now(),
    });
    return { done: false, value: row };
  }

  private async transform(row: Row, rowIndex: number): Promise<void> {
    for (const [col, modifier] of this.columns) {
      const value = row[col];
      if (value === undefined) {
        throw new ColumnIdentifierError(
          `Column index ${String(col)} is out of range for row ${String(rowIndex)} with ${String(row.length)} fields.`,
          col,
        );
      }
      row[col] = await applyModifier(modifier, value, this.execution);
    }
  }

  private finish(): void {
    if (this.stateValue === 'exhausted') return;
    this.stateValue = 'exhausted';
    this.events?.emit({ type: 'filter:completed', rowCount: this.rowCount, timestamp: Date.now() });
  }
}

function toIterator(source: RowSource): RowIterator {
  return Symbol.asyncIterator in source ? source[Symbol.asyncIterator]() : source[Symbol.iterator]();
}
