/**
 * @module formats/fixed-width/writer
 * @description Fixed-width record writer
 *
 * Pads or truncates each value to its column, surrounds the field region
 * with the configured skip spaces and terminates the line.
 */

import { type ByteSink, BufferedByteWriter, ByteArraySink } from "../../io/byte-writer";
import { writeBytes } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import { DEFAULT_LINE_ENDING } from "./constants";
import { describeClamping, resolveLayout } from "./layout";
import { formatComment, formatLine } from "./line";
import type { FixedWidthWriterOptions } from "./types";
import { validateWriterOptions } from "./validation";

/**
 * FixedWidthWriter - encodes records into fixed-width lines on one sink
 *
 * Each line is composed in full before it reaches the sink, so a record
 * that fails validation writes nothing.
 *
 * @example
 * ```typescript
 * const sink = new ByteArraySink();
 * const writer = new FixedWidthWriter(sink, {
 *   fieldLengths: [2, 20, 10],
 *   fieldAlign: ["left", "left", "right"],
 *   lineEnding: "lf",
 * });
 * await writer.write(["us", "United States", "English"]);
 * await writer.flush();
 * ```
 */
export class FixedWidthWriter {
  private options: FixedWidthWriterOptions;
  private readonly sink: ByteSink;
  private linesWritten = 0;

  constructor(sink: ByteSink | WritableStream<Uint8Array>, options: FixedWidthWriterOptions = {}) {
    validateWriterOptions(options);

    this.options = {
      fieldLengths: [],
      skipStart: 0,
      skipEnd: 0,
      trimFields: false,
      lineEnding: DEFAULT_LINE_ENDING,
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
        console.warn(`FixedWidth Warning${where}: ${warning}`);
      },
      ...options,
    };
    this.sink = sink instanceof WritableStream ? new BufferedByteWriter(sink) : sink;
    this.reportClamping(options);
  }

  /** Lines written so far, comment lines included */
  get lineNumber(): number {
    return this.linesWritten;
  }

  /**
   * Change options for the records that follow
   *
   * @throws {ValidationError} If the merged options are invalid
   */
  configure(patch: Partial<FixedWidthWriterOptions>): void {
    const merged = { ...this.options, ...patch };
    validateWriterOptions(merged);
    this.options = merged;
    this.reportClamping(patch);
  }

  private reportClamping(options: FixedWidthWriterOptions): void {
    for (const warning of describeClamping(options)) {
      this.options.onWarning?.(warning);
    }
  }

  /**
   * Write one record
   *
   * @throws {FixedWidthParseError} NO_FIELDS_CONFIGURED, INVALID_FIELD_WIDTH
   * or FIELD_COUNT_MISMATCH; nothing of the record is written
   */
  async write(fields: readonly string[]): Promise<void> {
    const position = { line: this.linesWritten + 1 };
    const layout = resolveLayout(this.options, position);
    const line = formatLine(
      fields,
      layout,
      this.options.trimFields ?? false,
      this.options.lineEnding ?? DEFAULT_LINE_ENDING,
      position
    );

    await this.sink.write(line);
    this.linesWritten++;
  }

  /**
   * Write records in order, then flush
   *
   * Stops at the first failing record; records before it stay written.
   */
  async writeAll(records: Iterable<readonly string[]>): Promise<void> {
    for (const record of records) {
      await this.write(record);
    }
    await this.flush();
  }

  /**
   * Write a comment line: the marker, then `text` cut or padded to the
   * line width minus one
   *
   * Does nothing when no comment marker is configured.
   */
  async writeComment(text: string): Promise<void> {
    const marker = this.options.commentMarker;
    if (marker === undefined) return;

    const layout = resolveLayout(this.options, { line: this.linesWritten + 1 });
    await this.sink.write(
      formatComment(marker, text, layout, this.options.lineEnding ?? DEFAULT_LINE_ENDING)
    );
    this.linesWritten++;
  }

  async flush(): Promise<void> {
    await this.sink.flush();
  }
}

/**
 * Format records into a fixed-width string
 *
 * @example
 * ```typescript
 * await formatRecords([["ab", "1"]], { fieldLengths: [3, 2], lineEnding: "lf" }); // "ab 1 \n"
 * ```
 */
export async function formatRecords(
  records: Iterable<readonly string[]>,
  options: FixedWidthWriterOptions = {}
): Promise<string> {
  const sink = new ByteArraySink();
  await new FixedWidthWriter(sink, options).writeAll(records);
  return sink.toString();
}

/**
 * Write records to a file; a `.gz` path is gzip-compressed unless
 * `autoCompress` is false
 */
export async function writeFile(
  path: string,
  records: Iterable<readonly string[]>,
  options: FixedWidthWriterOptions & WriteOptions = {}
): Promise<void> {
  const sink = new ByteArraySink();
  await new FixedWidthWriter(sink, options).writeAll(records);
  await writeBytes(path, sink.toBytes(), options);
}
