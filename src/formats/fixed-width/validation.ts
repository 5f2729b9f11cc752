/**
 * @module formats/fixed-width/validation
 * @description ArkType schemas for fixed-width reader and writer options
 *
 * The schemas check shapes and cross-field rules. Column widths are only
 * checked for being integers here: a zero or negative width is reported
 * by the record operation that meets it, as a positioned error.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { FixedWidthReaderOptions, FixedWidthWriterOptions } from "./types";

// `| undefined` lets configure() clear an option by passing undefined
const layoutShape = {
  "fieldLengths?": "number.integer[] | undefined",
  "fieldAlign?": '("left"|"right")[] | undefined',
  "skipStart?": "number.integer | undefined",
  "skipEnd?": "number.integer | undefined",
  "trimFields?": "boolean | undefined",
  "lineEnding?": '"none"|"cr"|"lf"|"crlf" | undefined',
  "commentMarker?": "string | undefined",
} as const;

/**
 * ArkType validation schema for fixed-width writer options
 */
export const FixedWidthWriterOptionsSchema = type(layoutShape).narrow((options, ctx) => {
  if (
    options.fieldAlign !== undefined &&
    options.fieldLengths !== undefined &&
    options.fieldAlign.length !== options.fieldLengths.length
  ) {
    return ctx.reject({
      path: ["fieldAlign"],
      expected: `one alignment per field (${options.fieldLengths.length})`,
      actual: `${options.fieldAlign.length} alignments`,
    });
  }

  if (options.commentMarker !== undefined) {
    const marker = options.commentMarker;
    if (marker.length !== 1 || marker.charCodeAt(0) > 0x7f) {
      return ctx.reject({
        path: ["commentMarker"],
        expected: "a single ASCII character",
        actual: JSON.stringify(marker),
      });
    }
    if (marker === "\r" || marker === "\n") {
      return ctx.reject({
        path: ["commentMarker"],
        expected: "a character other than CR or LF",
        actual: JSON.stringify(marker),
      });
    }
  }

  return true;
});

/**
 * ArkType validation schema for fixed-width reader options
 */
export const FixedWidthReaderOptionsSchema = FixedWidthWriterOptionsSchema.and({
  "skipLines?": "number.integer | undefined",
});

/**
 * Validate reader options, throwing a ValidationError on failure
 */
export function validateReaderOptions(options: FixedWidthReaderOptions): void {
  const validation = FixedWidthReaderOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid fixed-width reader options: ${validation.summary}`);
  }
}

/**
 * Validate writer options, throwing a ValidationError on failure
 */
export function validateWriterOptions(options: FixedWidthWriterOptions): void {
  const validation = FixedWidthWriterOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid fixed-width writer options: ${validation.summary}`);
  }
}
