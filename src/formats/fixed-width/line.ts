/**
 * Fixed-width line codec
 *
 * Pure functions that slice a raw line into fields and compose fields into
 * a raw line. Neither touches a stream; the reader and writer call them
 * once per record with the layout resolved for that record.
 */

import { FixedWidthParseError, type RecordPosition } from "../../errors";
import { CR, LF, LINE_ENDING_BYTES, SPACE } from "./constants";
import type { LineEnding, LineLayout } from "./types";

// a leading U+FEFF is field content, not a byte order mark
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });
const encoder = new TextEncoder();

/**
 * Strip leading and trailing spaces and tabs
 *
 * Other whitespace (non-breaking spaces, form feeds) is field content.
 */
export function trimField(field: string): string {
  return field.replace(/^[ \t]+|[ \t]+$/g, "");
}

/**
 * Check whether a raw line contains a CR or LF byte
 */
export function containsLineBreak(line: Uint8Array): boolean {
  return line.includes(CR) || line.includes(LF);
}

/**
 * Slice a raw line into its fields
 *
 * @param line - Raw line bytes without the line ending
 * @param layout - Layout in force for this line
 * @param trim - Strip spaces and tabs from each field
 * @param position - Where a failure should be reported
 * @returns One string per column, in column order
 * @throws {FixedWidthParseError} INCORRECT_LINE_WIDTH when the line's length
 * differs from the layout width or it holds a stray CR/LF
 *
 * @example
 * ```typescript
 * const layout = resolveLayout({ fieldLengths: [7, 4], skipStart: 2 }, { line: 1 });
 * parseLine(new TextEncoder().encode("  John   1245"), layout, true, { line: 1 });
 * // ["John", "1245"]
 * ```
 */
export function parseLine(
  line: Uint8Array,
  layout: LineLayout,
  trim: boolean,
  position: RecordPosition
): string[] {
  if (line.length !== layout.lineWidth) {
    throw new FixedWidthParseError(
      "INCORRECT_LINE_WIDTH",
      position,
      `expected ${layout.lineWidth} bytes, got ${line.length}`
    );
  }
  if (containsLineBreak(line)) {
    throw new FixedWidthParseError(
      "INCORRECT_LINE_WIDTH",
      position,
      "line contains an embedded CR or LF"
    );
  }

  const fields: string[] = [];
  let offset = layout.skipStart;
  for (const length of layout.fieldLengths) {
    const field = decoder.decode(line.subarray(offset, offset + length));
    fields.push(trim ? trimField(field) : field);
    offset += length;
  }
  return fields;
}

/**
 * Compose fields into one raw line, line ending included
 *
 * The whole line is built before it is returned, so a field that fails
 * leaves nothing half-written.
 *
 * @param fields - One value per column
 * @param layout - Layout in force for this line
 * @param truncate - Cut oversized values instead of rejecting them
 * @param lineEnding - Line ending appended to the line
 * @param position - Where a failure should be reported
 * @throws {FixedWidthParseError} FIELD_COUNT_MISMATCH or INVALID_FIELD_WIDTH
 */
export function formatLine(
  fields: readonly string[],
  layout: LineLayout,
  truncate: boolean,
  lineEnding: LineEnding,
  position: RecordPosition
): Uint8Array {
  if (fields.length !== layout.fieldLengths.length) {
    throw new FixedWidthParseError(
      "FIELD_COUNT_MISMATCH",
      position,
      `expected ${layout.fieldLengths.length} fields, got ${fields.length}`
    );
  }

  const ending = LINE_ENDING_BYTES[lineEnding];
  const out = new Uint8Array(layout.lineWidth + ending.length).fill(SPACE);
  let offset = layout.skipStart;

  for (const [index, length] of layout.fieldLengths.entries()) {
    const value = encoder.encode(fields[index] ?? "");

    if (value.length > length) {
      if (!truncate) {
        throw new FixedWidthParseError(
          "INVALID_FIELD_WIDTH",
          { line: position.line, column: index + 1 },
          `value is ${value.length} bytes, column holds ${length}`
        );
      }
      out.set(value.subarray(0, length), offset);
    } else {
      const align = layout.fieldAlign[index] ?? "left";
      switch (align) {
        case "left":
          out.set(value, offset);
          break;
        case "right":
          out.set(value, offset + length - value.length);
          break;
      }
    }
    offset += length;
  }

  out.set(ending, layout.lineWidth);
  return out;
}

/**
 * Compose a comment line: marker, text fitted to `lineWidth - 1` bytes,
 * then the line ending
 */
export function formatComment(
  marker: string,
  text: string,
  layout: LineLayout,
  lineEnding: LineEnding
): Uint8Array {
  const ending = LINE_ENDING_BYTES[lineEnding];
  const bodyWidth = Math.max(layout.lineWidth - 1, 0);
  const body = encoder.encode(text).subarray(0, bodyWidth);

  const out = new Uint8Array(1 + bodyWidth + ending.length).fill(SPACE);
  out[0] = marker.charCodeAt(0);
  out.set(body, 1);
  out.set(ending, 1 + bodyWidth);
  return out;
}
