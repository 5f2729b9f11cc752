/**
 * File writing on Effect Platform
 *
 * Compression is applied through the CompressionService, chosen from
 * the file extension unless the options say otherwise.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError } from "../errors";
import type { WriteOptions } from "../types";
import { runWithPlatform, validatePath } from "./file-reader";

/**
 * Compress data if the options or the file extension call for it
 */
function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions
): Effect.Effect<Uint8Array, CompressionError, CompressionService> {
  const autoCompress = options.autoCompress ?? true;
  if (!autoCompress) {
    return Effect.succeed(data);
  }

  let compressionFormat = options.compressionFormat ?? "none";
  if (compressionFormat === "none") {
    compressionFormat = CompressionDetector.fromExtension(filePath);
  }
  if (compressionFormat === "none") {
    return Effect.succeed(data);
  }

  const format = compressionFormat;
  return Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(data, format, options.compressionLevel ?? 6);
  });
}

/**
 * Write binary data to file (overwrites if exists, creates if not)
 *
 * @example Automatic gzip compression
 * ```typescript
 * await writeBytes("accounts.txt.gz", bytes);
 * ```
 *
 * @throws {FileError} When the write fails
 * @throws {CompressionError} When compression fails
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const finalData = yield* applyCompression(content, validatedPath, options);
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFile(validatedPath, finalData)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));
  });

  await runWithPlatform(program);
}

/**
 * Write string to file as UTF-8 (overwrites if exists, creates if not)
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  await writeBytes(path, new TextEncoder().encode(content), options);
}
