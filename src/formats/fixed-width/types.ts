/**
 * @module formats/fixed-width/types
 * @description Type definitions for fixed-width reading and writing
 */

import type { ParserOptions } from "../../types";

/**
 * How a line's end is found on read and emitted on write
 *
 * `none` means lines are not delimited at all: each line is exactly the
 * layout's width in bytes.
 */
export type LineEnding = "none" | "cr" | "lf" | "crlf";

/**
 * Padding side of a column on write
 */
export type FieldAlignment = "left" | "right";

/**
 * Column layout and framing shared by the reader and the writer
 */
export interface FixedWidthOptions {
  /** Byte width of each column, in order */
  fieldLengths?: readonly number[];
  /** Alignment of each column; every column is left-aligned when unset */
  fieldAlign?: readonly FieldAlignment[];
  /** Bytes ignored (read) or spaces emitted (write) before the first column */
  skipStart?: number;
  /** Bytes ignored (read) or spaces emitted (write) after the last column */
  skipEnd?: number;
  /** Trim spaces and tabs on read; truncate oversized values on write */
  trimFields?: boolean;
  lineEnding?: LineEnding;
  /** Single ASCII character that starts a comment line */
  commentMarker?: string;
  /** Receives non-fatal configuration warnings */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

export interface FixedWidthReaderOptions extends FixedWidthOptions, ParserOptions {
  /** Raw lines discarded before the first record */
  skipLines?: number;
}

export type FixedWidthWriterOptions = FixedWidthOptions;

/**
 * A decoded record and the physical line it came from
 */
export interface FixedWidthRecord {
  readonly fields: string[];
  /** 1-based, counting skipped and comment lines */
  readonly lineNumber: number;
}

/**
 * Layout derived from the options at the start of a record operation
 */
export interface LineLayout {
  readonly fieldLengths: readonly number[];
  readonly fieldAlign: readonly FieldAlignment[];
  readonly skipStart: number;
  readonly skipEnd: number;
  /** `skipStart + skipEnd + sum(fieldLengths)` */
  readonly lineWidth: number;
}
