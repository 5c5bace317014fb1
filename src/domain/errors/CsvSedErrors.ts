/** Machine-readable code carried by every csvsed error. */
export type CsvSedErrorCode = 'INVALID_MODIFIER' | 'INVALID_RANGE' | 'COLUMN_IDENTIFIER' | 'EXECUTION_FAILED';

/** Base class for all errors raised by the modifier engine. */
export abstract class CsvSedError extends Error {
  abstract readonly code: CsvSedErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Modifier text is malformed, uses an unknown type or flag, or does not compile. */
export class InvalidModifierError extends CsvSedError {
  readonly code = 'INVALID_MODIFIER';

  constructor(
    /** The raw modifier text as supplied by the caller. */
    readonly modifier: string,
    /** What is wrong with it, without the modifier text. */
    readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid modifier "${modifier}": ${reason}`, options);
  }
}

/** A character range such as `z-a` whose start comes after its end. */
export class CharacterRangeError extends CsvSedError {
  readonly code = 'INVALID_RANGE';

  constructor(
    readonly start: string,
    readonly end: string,
  ) {
    super(`invalid range end: "${start}-${end}" (start comes after end)`);
  }
}

/**
 * A column cannot be addressed as requested: a name and an index collide, a name cannot be
 * resolved, an index is invalid, or a row is too short for a mapped column.
 */
export class ColumnIdentifierError extends CsvSedError {
  readonly code = 'COLUMN_IDENTIFIER';

  constructor(
    message: string,
    /** The offending column name or index, when there is a single one. */
    readonly column?: string | number,
  ) {
    super(message);
  }
}

/** Why an external command did not produce a value. */
export type ExecutionFailureReason = 'exit' | 'timeout' | 'spawn';

/** An external command exited non-zero, timed out, or could not be started. */
export class ExecutionError extends CsvSedError {
  readonly code = 'EXECUTION_FAILED';

  constructor(
    readonly command: string,
    readonly reason: ExecutionFailureReason,
    readonly detail: { readonly exitCode?: number | null; readonly stderr?: string; readonly timeoutMs?: number },
    options?: ErrorOptions,
  ) {
    super(ExecutionError.describe(command, reason, detail, options), options);
  }

  get exitCode(): number | null {
    return this.detail.exitCode ?? null;
  }

  get stderr(): string {
    return this.detail.stderr ?? '';
  }

  private static describe(
    command: string,
    reason: ExecutionFailureReason,
    detail: { readonly exitCode?: number | null; readonly stderr?: string; readonly timeoutMs?: number },
    options?: ErrorOptions,
  ): string {
    switch (reason) {
      case 'timeout':
        return `command "${command}" timed out after ${String(detail.timeoutMs ?? 0)}ms`;
      case 'spawn': {
        const cause = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
        return `command "${command}" could not be started: ${cause}`;
      }
      case 'exit':
        return `command "${command}" failed with exit code ${String(detail.exitCode ?? null)}: ${(detail.stderr ?? '').trim()}`;
    }
  }
}
