/**
 * Shared type definitions
 *
 * Format-specific types live beside their format under `formats/`; this
 * module holds what the parser base class and the I/O layer share.
 */

/**
 * Options common to every parser
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats the I/O layer understands
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  /** Detected compression format */
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  /** Detection method used */
  readonly detectionMethod: "extension" | "magic-bytes";
}

/**
 * File writing options with compression support
 */
export interface WriteOptions {
  /** Automatically compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection (default: auto-detect from extension) */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Chunk size for streamed reads in bytes */
  readonly bufferSize?: number;
  /** Decompress `.gz` files transparently (default: true) */
  readonly autoDecompress?: boolean;
}
