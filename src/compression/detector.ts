/**
 * Compression format detection
 *
 * Files are matched on extension first; magic bytes confirm the guess when
 * content is at hand.
 */

import type { CompressionDetection, CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension("/data/accounts.txt.gz"); // "gzip"
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * detection.format; // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   */
  static fromExtension(filePath: string): CompressionFormat {
    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the first bytes of content
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const isGzip = bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE;
    return {
      format: isGzip ? "gzip" : "none",
      confidence: isGzip ? 1.0 : 0.5,
      detectionMethod: "magic-bytes",
    };
  }
}
