import { Writable } from 'node:stream';
import type { ModifierEntries } from './domain/model/ColumnMapping.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RowReader } from './domain/ports/RowReader.js';
import type { RowSink } from './domain/ports/RowSink.js';
import type { CommandRunner } from './domain/ports/CommandRunner.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import { EventBus, type HandlerErrorCallback } from './application/EventBus.js';
import { RowFilter } from './application/RowFilter.js';
import { CsvRowReader, type CsvRowReaderOptions } from './infrastructure/csv/CsvRowReader.js';
import { CsvRowWriter, type CsvRowWriterOptions } from './infrastructure/csv/CsvRowWriter.js';
import { BufferSource } from './infrastructure/sources/BufferSource.js';
import { ShellCommandRunner } from './infrastructure/commands/ShellCommandRunner.js';

/** Default upper bound on each `e/COMMAND/` invocation. */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Configuration for a csvsed run. */
export interface CsvSedConfig {
  /** Modifiers by column position, index or header name. */
  readonly modifiers: ModifierEntries;
  /** Whether the first row is a header: it names columns and is never modified. Default: `true`. */
  readonly header?: boolean;
  /** Maximum run time of each external command, in milliseconds. Default: `30000`. */
  readonly timeoutMs?: number;
  /** Runner for `e/COMMAND/` modifiers. Default: `ShellCommandRunner`. */
  readonly commandRunner?: CommandRunner;
  /** Receives errors thrown by event subscribers. */
  readonly onHandlerError?: HandlerErrorCallback;
}

/** Outcome of `CsvSed.run()`. */
export interface CsvSedSummary {
  /** Number of data rows written (the header row is not counted). */
  readonly rowCount: number;
  /** The header row as written, when the input had one. */
  readonly header?: readonly string[];
}

/** Options for `CsvSed.transform()`. */
export interface TransformOptions extends Omit<CsvSedConfig, 'modifiers'> {
  readonly reader?: CsvRowReaderOptions;
  readonly writer?: Omit<CsvRowWriterOptions, 'closeOutput'>;
}

/**
 * Facade over the modifier engine: source → CSV reader → row filter → sink.
 *
 * @example
 * ```typescript
 * const sed = new CsvSed({ modifiers: { email: 'y/A-Z/a-z/' } });
 * sed.from(new FilePathSource('users.csv'));
 * await sed.run(new CsvRowWriter(process.stdout));
 * ```
 */
export class CsvSed {
  private readonly modifiers: ModifierEntries;
  private readonly header: boolean;
  private readonly timeoutMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly events: EventBus;
  private source: DataSource | null = null;
  private reader: RowReader | null = null;
  private started = false;

  constructor(config: CsvSedConfig) {
    this.modifiers = config.modifiers;
    this.header = config.header ?? true;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.commandRunner = config.commandRunner ?? new ShellCommandRunner();
    this.events = new EventBus(config.onHandlerError);

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new Error(`timeoutMs must be a positive number, got ${String(config.timeoutMs)}`);
    }
  }

  /**
   * Transform CSV text in one call and return the resulting CSV text.
   *
   * @example
   * ```typescript
   * await CsvSed.transform('name\nalice\n', { name: 's/^./A/' }); // 'name\nAlice\n'
   * ```
   */
  static async transform(csv: string, modifiers: ModifierEntries, options?: TransformOptions): Promise<string> {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
        callback();
      },
    });

    const sed = new CsvSed({ ...options, modifiers });
    sed.from(new BufferSource(csv), new CsvRowReader(options?.reader));
    await sed.run(new CsvRowWriter(output, options?.writer));
    return chunks.join('');
  }

  /** Set the data source and reader. Returns `this` for chaining. */
  from(source: DataSource, reader: RowReader = new CsvRowReader()): this {
    this.source = source;
    this.reader = reader;
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.events.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.events.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.events.offAny(handler);
    return this;
  }

  /**
   * Resolve the modifiers and return the lazily filtered rows, header first when there is one.
   *
   * @throws Error if the source is not configured or the rows were already opened.
   * @throws InvalidModifierError | ColumnIdentifierError before any row is produced.
   */
  async open(): Promise<RowFilter> {
    if (!this.source || !this.reader) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    if (this.started) {
      throw new Error('This CsvSed instance has already been run. Create a new one for another input.');
    }
    this.started = true;

    return RowFilter.open(this.reader.read(this.source), this.modifiers, {
      header: this.header,
      execution: { runner: this.commandRunner, timeoutMs: this.timeoutMs },
      events: this.events,
    });
  }

  /** Stream every filtered row into `sink`, then end it. */
  async run(sink: RowSink): Promise<CsvSedSummary> {
    const rows = await this.open();
    let rowCount = 0;

    try {
      for await (const row of rows) {
        if (rows.header && row === rows.header) {
          await sink.writeHeader(row);
        } else {
          await sink.write(row);
          rowCount++;
        }
      }
    } finally {
      await sink.end?.();
    }

    return rows.header ? { rowCount, header: rows.header } : { rowCount };
  }
}
