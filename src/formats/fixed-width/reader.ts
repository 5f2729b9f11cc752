/**
 * @module formats/fixed-width/reader
 * @description Fixed-width record reader
 *
 * Frames lines out of a byte source according to the configured line
 * ending, skips leading and comment lines, and slices each data line into
 * its columns.
 */

import {
  EndOfStreamError,
  FixedWidthParseError,
  IncompleteReadError,
  StreamError,
  ValidationError,
} from "../../errors";
import { type ByteSource, BufferedByteReader } from "../../io/byte-reader";
import { createStream } from "../../io/file-reader";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { CR, DEFAULT_LINE_ENDING, LF } from "./constants";
import { describeClamping, resolveLayout } from "./layout";
import { parseLine } from "./line";
import type { FixedWidthReaderOptions, FixedWidthRecord, LineLayout } from "./types";
import { validateReaderOptions } from "./validation";

interface RawLine {
  readonly bytes: Uint8Array;
  readonly line: number;
}

/**
 * FixedWidthReader - decodes fixed-width lines from one byte source
 *
 * The layout is resolved from the current options at the start of every
 * record, so `configure()` may change it between records.
 *
 * @example Reading everything
 * ```typescript
 * const reader = FixedWidthReader.fromString(text, {
 *   fieldLengths: [7, 4],
 *   skipStart: 2,
 *   skipLines: 1,
 *   commentMarker: "#",
 *   lineEnding: "lf",
 *   trimFields: true,
 * });
 * const rows = await reader.readAll(); // [["John", "1245"], ...]
 * ```
 *
 * @example Iterating with line numbers
 * ```typescript
 * for await (const { fields, lineNumber } of reader) {
 *   console.log(lineNumber, fields);
 * }
 * ```
 */
export class FixedWidthReader
  extends AbstractParser<string[], FixedWidthReaderOptions>
  implements AsyncIterable<FixedWidthRecord>
{
  private readonly source: ByteSource;
  private linesRead = 0;
  private linesSkipped = 0;
  private initialSkipDone = false;

  constructor(
    source: ByteSource | ReadableStream<Uint8Array>,
    options: FixedWidthReaderOptions = {}
  ) {
    validateReaderOptions(options);
    super(options);
    this.source = source instanceof ReadableStream ? new BufferedByteReader(source) : source;
    this.reportClamping(options);
  }

  /**
   * Reader over an in-memory string, encoded as UTF-8
   */
  static fromString(data: string, options: FixedWidthReaderOptions = {}): FixedWidthReader {
    return new FixedWidthReader(BufferedByteReader.fromString(data), options);
  }

  /**
   * Reader over a file; `.gz` files are decompressed
   *
   * @throws {FileError} When the file cannot be opened
   */
  static async fromFile(
    path: string,
    options: FixedWidthReaderOptions & FileReaderOptions = {}
  ): Promise<FixedWidthReader> {
    validateReaderOptions(options);
    const stream = await createStream(path, options);
    return new FixedWidthReader(stream, options);
  }

  protected getDefaultOptions(): Partial<FixedWidthReaderOptions> {
    return {
      fieldLengths: [],
      skipStart: 0,
      skipEnd: 0,
      skipLines: 0,
      trimFields: false,
      lineEnding: DEFAULT_LINE_ENDING,
    };
  }

  protected getFormatName(): string {
    return "FixedWidth";
  }

  /** Raw lines consumed so far, including skipped and comment lines */
  get lineNumber(): number {
    return this.linesRead;
  }

  /**
   * Change options for the records that follow
   *
   * @throws {ValidationError} If the merged options are invalid
   */
  configure(patch: Partial<FixedWidthReaderOptions>): void {
    const merged = { ...this.options, ...patch };
    validateReaderOptions(merged);
    this.options = merged;
    this.reportClamping(patch);
  }

  private reportClamping(options: FixedWidthReaderOptions): void {
    for (const warning of describeClamping(options)) {
      this.warn(warning);
    }
  }

  private isComment(bytes: Uint8Array): boolean {
    const marker = this.options.commentMarker;
    return marker !== undefined && bytes.length > 0 && bytes[0] === marker.charCodeAt(0);
  }

  /**
   * Frame the next raw line, line ending removed
   *
   * @throws {EndOfStreamError} When no bytes remain
   */
  private async readRawLine(layout: LineLayout): Promise<RawLine> {
    const lineEnding = this.options.lineEnding ?? DEFAULT_LINE_ENDING;

    switch (lineEnding) {
      case "none": {
        const bytes = await this.source.readBytes(layout.lineWidth);
        const line = ++this.linesRead;
        if (bytes.length < layout.lineWidth) {
          throw new FixedWidthParseError(
            "INCORRECT_LINE_WIDTH",
            { line },
            `expected ${layout.lineWidth} bytes, stream ended after ${bytes.length}`
          );
        }
        return { bytes, line };
      }

      case "cr":
      case "lf": {
        const delimiter = lineEnding === "cr" ? CR : LF;
        const bytes = await this.source.readUntil(delimiter);
        const line = ++this.linesRead;
        const terminated = bytes[bytes.length - 1] === delimiter;
        return { bytes: terminated ? bytes.subarray(0, -1) : bytes, line };
      }

      case "crlf": {
        const bytes = await this.source.readUntil(CR);
        const line = ++this.linesRead;
        if (bytes[bytes.length - 1] !== CR) {
          // final line without a terminator
          return { bytes, line };
        }
        if ((await this.source.peekByte()) !== LF) {
          throw new FixedWidthParseError("MALFORMED_LINE_ENDING", { line });
        }
        await this.source.readByte();
        return { bytes: bytes.subarray(0, -1), line };
      }
    }
  }

  /**
   * Discard `skipLines` raw lines, once per reader
   *
   * A failed attempt resumes with the lines still to skip.
   *
   * @throws {StreamError} When the input ends before enough lines were skipped
   */
  private async skipInitialLines(layout: LineLayout): Promise<void> {
    const skipLines = Math.max(this.options.skipLines ?? 0, 0);

    while (this.linesSkipped < skipLines) {
      try {
        await this.readRawLine(layout);
      } catch (error) {
        if (error instanceof EndOfStreamError) {
          throw new StreamError(
            `not enough lines: expected to skip ${skipLines}, input ended after ${this.linesSkipped}`,
            "read",
            this.source.bytesRead,
            this.linesRead + 1
          );
        }
        throw error;
      }
      this.linesSkipped++;
    }
    this.initialSkipDone = true;
  }

  /**
   * Read the next record with the line it came from
   *
   * @throws {FixedWidthParseError} When the line does not fit the layout
   * @throws {EndOfStreamError} When the input is exhausted
   */
  async readRecord(): Promise<FixedWidthRecord> {
    const layout = resolveLayout(this.options, { line: this.linesRead + 1 });

    if (!this.initialSkipDone) {
      await this.skipInitialLines(layout);
    }

    let raw = await this.readRawLine(layout);
    while (this.isComment(raw.bytes)) {
      raw = await this.readRawLine(layout);
    }

    const fields = parseLine(raw.bytes, layout, this.options.trimFields ?? false, {
      line: raw.line,
    });
    return { fields, lineNumber: raw.line };
  }

  /**
   * Read the next record
   */
  async read(): Promise<string[]> {
    const record = await this.readRecord();
    return record.fields;
  }

  /**
   * Read exactly `count` records
   *
   * @throws {IncompleteReadError} When a failure follows at least one
   * successful record; `records` holds what was read and `cause` the failure
   */
  async readRows(count: number): Promise<string[][]> {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`Row count must be a non-negative integer, got ${count}`);
    }

    const records: string[][] = [];
    for (let i = 0; i < count; i++) {
      try {
        records.push(await this.read());
      } catch (error) {
        if (records.length === 0) throw error;
        throw new IncompleteReadError(records, error);
      }
    }
    return records;
  }

  /**
   * Read records until the input is exhausted
   *
   * End of stream ends the read successfully; any other failure propagates.
   */
  async readAll(): Promise<string[][]> {
    const records: string[][] = [];
    for await (const record of this.records()) {
      records.push(record.fields);
    }
    return records;
  }

  /**
   * Iterate records until the input is exhausted
   *
   * The byte source is cancelled when iteration ends, whether by end of
   * input, an error or the consumer breaking out early.
   */
  async *records(): AsyncGenerator<FixedWidthRecord> {
    try {
      for (;;) {
        this.checkAborted();

        let record: FixedWidthRecord;
        try {
          record = await this.readRecord();
        } catch (error) {
          if (error instanceof EndOfStreamError) return;
          throw error;
        }
        yield record;
      }
    } finally {
      await this.close();
    }
  }

  /**
   * Release the byte source; further reads end with EndOfStreamError
   */
  async close(): Promise<void> {
    await this.source.cancel();
  }

  [Symbol.asyncIterator](): AsyncIterator<FixedWidthRecord> {
    return this.records();
  }
}

/**
 * Parse fixed-width records from a string
 */
export function parseString(
  data: string,
  options: FixedWidthReaderOptions = {}
): AsyncIterable<FixedWidthRecord> {
  return FixedWidthReader.fromString(data, options).records();
}

/**
 * Parse fixed-width records from a file; `.gz` files are decompressed
 */
export async function* parseFile(
  path: string,
  options: FixedWidthReaderOptions & FileReaderOptions = {}
): AsyncIterable<FixedWidthRecord> {
  const reader = await FixedWidthReader.fromFile(path, options);
  try {
    yield* reader.records();
  } finally {
    await reader.close();
  }
}
