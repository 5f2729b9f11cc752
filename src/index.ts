/**
 * fixwidth - fixed-width record reader and writer
 *
 * @example
 * ```typescript
 * import { FixedWidthReader, FixedWidthWriter } from "fixwidth";
 * ```
 */

export * from "./compression";
export * from "./errors";
export * from "./formats";
export { type ByteSource, BufferedByteReader } from "./io/byte-reader";
export { type ByteSink, BufferedByteWriter, ByteArraySink } from "./io/byte-writer";
export { createStream, exists } from "./io/file-reader";
export { writeBytes, writeString } from "./io/file-writer";
export type {
  CompressionDetection,
  CompressionFormat,
  FileReaderOptions,
  ParserOptions,
  WriteOptions,
} from "./types";
