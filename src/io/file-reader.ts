/**
 * File reading on Effect Platform
 *
 * Opens a file as a ReadableStream<Uint8Array> for the fixed-width
 * reader. Gzip files are decompressed through the CompressionService.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Either, Stream } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, ValidationError } from "../errors";
import type { FileReaderOptions } from "../types";
import { getPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
};

export const FilePathSchema = type("string>0").narrow((path, ctx) =>
  path.includes("\0") ? ctx.reject({ expected: "a path without null characters" }) : true
);

export function validatePath(path: string): string {
  const validation = FilePathSchema(path);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid file path: ${validation.summary}`);
  }
  return validation;
}

/**
 * Run an Effect and rethrow its typed failure as-is
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem | CompressionService>
): Promise<A> {
  const result = await Effect.runPromise(
    program.pipe(
      Effect.provide(CompressionService.Live),
      Effect.provide(getPlatform()),
      Effect.either
    )
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

function streamOfBytes(bytes: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (bytes.length > 0) {
        controller.enqueue(bytes);
      }
      controller.close();
    },
  });
}

/**
 * Check if a file exists and is a regular file
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runWithPlatform(program);
}

/**
 * Open a file as a byte stream
 *
 * Plain files are streamed in `bufferSize` chunks. Files with a gzip
 * extension are read whole and decompressed unless `autoDecompress` is false.
 *
 * @throws {FileError} When the file cannot be read
 * @throws {CompressionError} When a gzip file is corrupt
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const merged = { ...DEFAULT_OPTIONS, ...options };
  const format = merged.autoDecompress ? CompressionDetector.fromExtension(validatedPath) : "none";

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    if (format === "none") {
      yield* fs.access(validatedPath, { readable: true });
      return Stream.toReadableStream(fs.stream(validatedPath, { chunkSize: merged.bufferSize }));
    }

    const compressed = yield* fs.readFile(validatedPath);
    const compression = yield* CompressionService;
    const bytes = yield* compression.decompress(compressed, format);
    return streamOfBytes(bytes);
  }).pipe(
    Effect.mapError((error) =>
      error instanceof CompressionError
        ? error
        : FileError.fromSystemError("read", validatedPath, error)
    )
  );

  return runWithPlatform(program);
}
