/**
 * Buffered byte source over a Web ReadableStream
 *
 * Gives the fixed-width reader the three primitives it frames lines with:
 * read a count of bytes, read up to a delimiter byte, and look at the next
 * byte without consuming it. Chunks from the stream are buffered so line
 * boundaries need not align with chunk boundaries.
 */

import { EndOfStreamError, StreamError } from "../errors";

/**
 * Byte-level read operations the record reader depends on
 */
export interface ByteSource {
  /**
   * Read up to `count` bytes; fewer only when the stream ends first
   * @throws {EndOfStreamError} When no bytes remain
   */
  readBytes(count: number): Promise<Uint8Array>;

  /**
   * Read through the next `delimiter` byte, delimiter included; without
   * the delimiter when the stream ends first
   * @throws {EndOfStreamError} When no bytes remain
   */
  readUntil(delimiter: number): Promise<Uint8Array>;

  /**
   * Read one byte
   * @throws {EndOfStreamError} When no bytes remain
   */
  readByte(): Promise<number>;

  /** Next byte without consuming it, or undefined at end of stream */
  peekByte(): Promise<number | undefined>;

  /** Bytes consumed so far */
  readonly bytesRead: number;

  /** Release the underlying stream; later reads see end of stream */
  cancel(reason?: unknown): Promise<void>;
}

/**
 * ByteSource backed by a ReadableStream<Uint8Array>
 *
 * @example
 * ```typescript
 * const source = BufferedByteReader.fromString("AB\r\nCD\r\n");
 * await source.readUntil(0x0d); // bytes "AB\r"
 * await source.peekByte();      // 0x0a
 * ```
 */
export class BufferedByteReader implements ByteSource {
  private buffer: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private exhausted = false;
  private consumed = 0;
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  static fromBytes(bytes: Uint8Array): BufferedByteReader {
    return new BufferedByteReader(
      new ReadableStream<Uint8Array>({
        start(controller) {
          if (bytes.length > 0) {
            controller.enqueue(bytes);
          }
          controller.close();
        },
      })
    );
  }

  static fromString(text: string): BufferedByteReader {
    return BufferedByteReader.fromBytes(new TextEncoder().encode(text));
  }

  get bytesRead(): number {
    return this.consumed;
  }

  private get available(): number {
    return this.buffer.length - this.offset;
  }

  /**
   * Pull the next chunk into the buffer
   * @returns false once the stream is exhausted
   */
  private async fill(): Promise<boolean> {
    if (this.exhausted) return false;

    let result: ReadableStreamReadResult<Uint8Array>;
    try {
      result = await this.reader.read();
    } catch (error) {
      // an errored stream cannot be cancelled
      this.exhausted = true;
      throw new StreamError(
        `Byte stream read failed: ${error instanceof Error ? error.message : String(error)}`,
        "read",
        this.consumed
      );
    }

    if (result.done) {
      this.exhausted = true;
      this.reader.releaseLock();
      return false;
    }

    const remaining = this.buffer.subarray(this.offset);
    const merged = new Uint8Array(remaining.length + result.value.length);
    merged.set(remaining);
    merged.set(result.value, remaining.length);
    this.buffer = merged;
    this.offset = 0;
    return true;
  }

  /**
   * Cancel the underlying stream and drop buffered bytes
   *
   * Does nothing once the stream has ended or failed.
   */
  async cancel(reason?: unknown): Promise<void> {
    this.buffer = new Uint8Array(0);
    this.offset = 0;
    if (this.exhausted) return;

    this.exhausted = true;
    await this.reader.cancel(reason);
    this.reader.releaseLock();
  }

  private take(count: number): Uint8Array {
    const out = this.buffer.slice(this.offset, this.offset + count);
    this.offset += count;
    this.consumed += count;
    return out;
  }

  private endOfStream(): EndOfStreamError {
    return new EndOfStreamError("end of stream", this.consumed);
  }

  async readBytes(count: number): Promise<Uint8Array> {
    while (this.available < count) {
      if (!(await this.fill())) break;
    }
    if (this.available === 0 && count > 0) {
      throw this.endOfStream();
    }
    return this.take(Math.min(count, this.available));
  }

  async readUntil(delimiter: number): Promise<Uint8Array> {
    let scanned = 0;
    for (;;) {
      const index = this.buffer.indexOf(delimiter, this.offset + scanned);
      if (index !== -1) {
        return this.take(index - this.offset + 1);
      }
      scanned = this.available;
      if (!(await this.fill())) break;
    }
    if (this.available === 0) {
      throw this.endOfStream();
    }
    return this.take(this.available);
  }

  async readByte(): Promise<number> {
    const byte = await this.peekByte();
    if (byte === undefined) {
      throw this.endOfStream();
    }
    this.offset += 1;
    this.consumed += 1;
    return byte;
  }

  async peekByte(): Promise<number | undefined> {
    if (this.available === 0 && !(await this.fill())) {
      return undefined;
    }
    return this.buffer[this.offset];
  }
}
