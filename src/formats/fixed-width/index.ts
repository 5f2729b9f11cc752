/**
 * @module formats/fixed-width
 * @description Fixed-width record reading and writing
 *
 * Columns occupy fixed byte offsets and widths instead of being separated
 * by a delimiter.
 *
 * @example Reading
 * ```typescript
 * import { FixedWidthReader } from './formats/fixed-width';
 *
 * const reader = FixedWidthReader.fromString(text, { fieldLengths: [7, 4], lineEnding: "lf" });
 * for await (const { fields } of reader) {
 *   console.log(fields);
 * }
 * ```
 *
 * @example Writing
 * ```typescript
 * import { formatRecords } from './formats/fixed-width';
 *
 * const text = await formatRecords(rows, { fieldLengths: [2, 20, 10], lineEnding: "crlf" });
 * ```
 */

export type {
  FieldAlignment,
  FixedWidthOptions,
  FixedWidthReaderOptions,
  FixedWidthRecord,
  FixedWidthWriterOptions,
  LineEnding,
  LineLayout,
} from "./types";

export { FixedWidthReader, parseFile, parseString } from "./reader";

export { FixedWidthWriter, formatRecords, writeFile } from "./writer";

export { CR, DEFAULT_LINE_ENDING, LF, LINE_ENDING_BYTES, SPACE } from "./constants";

export { clampSkip, resolveLayout } from "./layout";

export { containsLineBreak, formatComment, formatLine, parseLine, trimField } from "./line";

export {
  FixedWidthReaderOptionsSchema,
  FixedWidthWriterOptionsSchema,
  validateReaderOptions,
  validateWriterOptions,
} from "./validation";
