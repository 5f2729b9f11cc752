/**
 * @module formats/fixed-width/layout
 * @description Derives the line layout from reader/writer options
 *
 * The layout is recomputed at the start of every record operation, so the
 * options may change between records and each line is checked against the
 * configuration in force when it is read or written.
 */

import { FixedWidthParseError, type RecordPosition } from "../../errors";
import type { FieldAlignment, FixedWidthOptions, LineLayout } from "./types";

/**
 * Clamp a skip count to a non-negative integer
 */
export function clampSkip(value: number | undefined): number {
  return value === undefined || value < 0 ? 0 : value;
}

/**
 * Resolve the layout for one record operation
 *
 * @param options - Options in force for this record
 * @param position - Where a failure should be reported
 * @throws {FixedWidthParseError} NO_FIELDS_CONFIGURED or INVALID_FIELD_WIDTH
 */
export function resolveLayout(options: FixedWidthOptions, position: RecordPosition): LineLayout {
  const fieldLengths = options.fieldLengths ?? [];
  if (fieldLengths.length === 0) {
    throw new FixedWidthParseError("NO_FIELDS_CONFIGURED", position);
  }

  const skipStart = clampSkip(options.skipStart);
  const skipEnd = clampSkip(options.skipEnd);
  let lineWidth = skipStart + skipEnd;

  for (const [index, length] of fieldLengths.entries()) {
    if (!Number.isInteger(length) || length <= 0) {
      throw new FixedWidthParseError(
        "INVALID_FIELD_WIDTH",
        { line: position.line, column: index + 1 },
        `width ${length} is not a positive integer`
      );
    }
    lineWidth += length;
  }

  const fieldAlign: readonly FieldAlignment[] =
    options.fieldAlign ?? fieldLengths.map((): FieldAlignment => "left");

  return { fieldLengths, fieldAlign, skipStart, skipEnd, lineWidth };
}

/**
 * Warnings for option values that will be adjusted rather than rejected
 */
export function describeClamping(options: FixedWidthOptions): string[] {
  const warnings: string[] = [];
  if (options.skipStart !== undefined && options.skipStart < 0) {
    warnings.push(`skipStart ${options.skipStart} is negative; treating it as 0`);
  }
  if (options.skipEnd !== undefined && options.skipEnd < 0) {
    warnings.push(`skipEnd ${options.skipEnd} is negative; treating it as 0`);
  }
  return warnings;
}
