/**
 * Effect-based compression service
 *
 * The file reader and writer ask for a CompressionService instead of
 * calling gzip directly, so tests can provide a different layer.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "gzip", 6);
 * });
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip } from "./gzip";

export interface CompressionServiceShape {
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

export class CompressionService extends Context.Tag("@fixwidth/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer; "none" passes data through
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function toCompressionError(
  operation: "compress" | "decompress"
): (error: unknown) => CompressionError {
  return (error) =>
    error instanceof CompressionError
      ? error
      : CompressionError.fromSystemError("gzip", operation, error);
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: toCompressionError("compress"),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => decompressGzip(data),
            catch: toCompressionError("decompress"),
          }),
  };
}
