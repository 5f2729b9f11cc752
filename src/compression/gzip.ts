/**
 * Gzip compression on Node's zlib
 */

import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { CompressionError } from "../errors";
import { CompressionDetector } from "./detector";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface GzipOptions {
  /** Compression level 1-9 */
  level?: number;
}

/**
 * Compress data with gzip
 *
 * @throws {CompressionError} If compression fails
 */
export async function compress(data: Uint8Array, options: GzipOptions = {}): Promise<Uint8Array> {
  try {
    const result = await gzipAsync(data, { level: options.level ?? 6 });
    return new Uint8Array(result);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error);
  }
}

/**
 * Decompress gzip data
 *
 * @throws {CompressionError} If the data is not gzip or is corrupt
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (CompressionDetector.fromMagicBytes(compressed).format !== "gzip") {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }
}
