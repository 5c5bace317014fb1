/** Metadata about the data source (optional, for logging). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading CSV text from any origin (file, buffer, stdin).
 *
 * `read()` yields chunks lazily; chunk boundaries carry no meaning and may split a record.
 */
export interface DataSource {
  /** Yield text chunks for streaming consumption. */
  read(): AsyncIterable<string>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
