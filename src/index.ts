// Main entry point
export { CsvSed, DEFAULT_TIMEOUT_MS } from './CsvSed.js';
export type { CsvSedConfig, CsvSedSummary, TransformOptions } from './CsvSed.js';

// Domain model
export type { Row, RowSource } from './domain/model/Row.js';
export { isRow } from './domain/model/Row.js';
export type {
  Modifier,
  ModifierKind,
  ModifierFn,
  ModifierInput,
  SubstituteModifier,
  SubstituteFlag,
  TransliterateModifier,
  TransliterateFlag,
  ExecuteModifier,
  FunctionModifier,
  ReplacementPart,
} from './domain/model/Modifier.js';
export type { ColumnMapping, ModifierEntries, ModifierEntry } from './domain/model/ColumnMapping.js';

// Errors
export {
  CsvSedError,
  InvalidModifierError,
  CharacterRangeError,
  ColumnIdentifierError,
  ExecutionError,
} from './domain/errors/CsvSedErrors.js';
export type { CsvSedErrorCode, ExecutionFailureReason } from './domain/errors/CsvSedErrors.js';

// Domain services
export { expandRanges } from './domain/services/CharacterRanges.js';
export { parseModifier } from './domain/services/ModifierParser.js';
export { applyModifier, substitute, transliterate, execute } from './domain/services/ModifierOperators.js';
export type { ExecutionContext } from './domain/services/ModifierOperators.js';
export { resolveColumns } from './domain/services/ColumnResolver.js';

// Application
export { RowFilter } from './application/RowFilter.js';
export type { RowFilterOptions, FilterState } from './application/RowFilter.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorCallback } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RowReader, DialectOptions } from './domain/ports/RowReader.js';
export type { RowSink } from './domain/ports/RowSink.js';
export type { CommandRunner, CommandResult, CommandRunOptions } from './domain/ports/CommandRunner.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  FilterStartedEvent,
  RowTransformedEvent,
  FilterCompletedEvent,
  FilterFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { CsvRowReader } from './infrastructure/csv/CsvRowReader.js';
export type { CsvRowReaderOptions } from './infrastructure/csv/CsvRowReader.js';
export { CsvRowWriter } from './infrastructure/csv/CsvRowWriter.js';
export type { CsvRowWriterOptions } from './infrastructure/csv/CsvRowWriter.js';
export { LineNumberSink } from './infrastructure/csv/LineNumberSink.js';
export { ShellCommandRunner } from './infrastructure/commands/ShellCommandRunner.js';
export type { ShellCommandRunnerOptions } from './infrastructure/commands/ShellCommandRunner.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
