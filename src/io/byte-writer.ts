/**
 * Buffered byte sinks
 *
 * The fixed-width writer emits whole lines into a ByteSink; the sink
 * decides when bytes reach the underlying stream.
 */

import { StreamError } from "../errors";

const DEFAULT_BUFFER_SIZE = 65536;

/**
 * Byte-level write operations the record writer depends on
 */
export interface ByteSink {
  write(bytes: Uint8Array): Promise<void>;
  writeByte(byte: number): Promise<void>;
  /** Push buffered bytes downstream; safe to call repeatedly */
  flush(): Promise<void>;
}

function concat(chunks: readonly Uint8Array[], size: number): Uint8Array {
  const out = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * ByteSink over a WritableStream<Uint8Array>
 *
 * Bytes are held until `bufferSize` is reached or `flush()` is called.
 */
export class BufferedByteWriter implements ByteSink {
  private chunks: Uint8Array[] = [];
  private pending = 0;
  private written = 0;
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;

  constructor(
    stream: WritableStream<Uint8Array>,
    private readonly bufferSize: number = DEFAULT_BUFFER_SIZE
  ) {
    this.writer = stream.getWriter();
  }

  /** Bytes handed to the underlying stream so far */
  get bytesWritten(): number {
    return this.written;
  }

  /** Bytes waiting in the buffer */
  get buffered(): number {
    return this.pending;
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (bytes.length === 0) return;
    this.chunks.push(bytes.slice());
    this.pending += bytes.length;
    if (this.pending >= this.bufferSize) {
      await this.flush();
    }
  }

  async writeByte(byte: number): Promise<void> {
    await this.write(Uint8Array.of(byte));
  }

  async flush(): Promise<void> {
    if (this.pending === 0) return;

    const data = concat(this.chunks, this.pending);
    this.chunks = [];
    this.pending = 0;

    try {
      await this.writer.write(data);
    } catch (error) {
      throw new StreamError(
        `Byte stream write failed: ${error instanceof Error ? error.message : String(error)}`,
        "flush",
        this.written
      );
    }
    this.written += data.length;
  }

  /**
   * Flush, then close the underlying stream
   */
  async close(): Promise<void> {
    await this.flush();
    await this.writer.close();
  }
}

/**
 * ByteSink that keeps everything in memory
 *
 * @example
 * ```typescript
 * const sink = new ByteArraySink();
 * const writer = new FixedWidthWriter(sink, { fieldLengths: [3] });
 * await writer.write(["ab"]);
 * sink.toString(); // "ab \r\n"
 * ```
 */
export class ByteArraySink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private size = 0;

  async write(bytes: Uint8Array): Promise<void> {
    this.chunks.push(bytes.slice());
    this.size += bytes.length;
  }

  async writeByte(byte: number): Promise<void> {
    await this.write(Uint8Array.of(byte));
  }

  async flush(): Promise<void> {
    // nothing buffered beyond memory
  }

  get length(): number {
    return this.size;
  }

  toBytes(): Uint8Array {
    return concat(this.chunks, this.size);
  }

  toString(): string {
    return new TextDecoder("utf-8", { ignoreBOM: true }).decode(this.toBytes());
  }
}
