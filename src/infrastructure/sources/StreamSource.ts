import { StringDecoder } from 'node:string_decoder';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** Encoding for converting Buffer chunks to string. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/** Data source over an `AsyncIterable` such as `process.stdin`. Can be read once. */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Buffer>;
  private readonly meta: SourceMetadata;
  private readonly encoding: BufferEncoding;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.encoding = options?.encoding ?? 'utf-8';
    this.meta = { fileName: options?.fileName ?? 'stream-input' };
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    // Buffers may end in the middle of a multi-byte character.
    const decoder = new StringDecoder(this.encoding);
    for await (const chunk of this.stream) {
      const text = typeof chunk === 'string' ? chunk : decoder.write(chunk);
      if (text) yield text;
    }
    const rest = decoder.end();
    if (rest) yield rest;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
