/**
 * Gzip compression and CompressionService tests
 */

import { Effect } from "effect";
import { gzipSync, strFromU8, strToU8 } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionService, compress, decompress } from "../../src/compression";
import { CompressionError } from "../../src/errors";

describe("gzip", () => {
  test("decompresses data from another gzip implementation", async () => {
    const compressed = gzipSync(strToU8("ab 1 \n"));

    expect(strFromU8(await decompress(compressed))).toBe("ab 1 \n");
  });

  test("round trips its own output", async () => {
    const data = strToU8("x".repeat(1000));
    const compressed = await compress(data, { level: 9 });

    expect(compressed.length).toBeLessThan(data.length);
    expect(await decompress(compressed)).toEqual(data);
  });

  test("rejects data without the gzip header", async () => {
    const error = await decompress(strToU8("plain")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CompressionError);
    expect(error).toMatchObject({
      message: "Invalid gzip magic bytes - file may not be gzip compressed",
    });
  });

  test("rejects truncated gzip data", async () => {
    const compressed = gzipSync(strToU8("x".repeat(100)));

    await expect(decompress(compressed.subarray(0, 12))).rejects.toBeInstanceOf(
      CompressionError
    );
  });
});

describe("CompressionService", () => {
  const run = <A>(program: Effect.Effect<A, CompressionError, CompressionService>): Promise<A> =>
    Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));

  test("passes data through for none", async () => {
    const data = strToU8("abc");
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.compress(data, "none");
      })
    );

    expect(result).toBe(data);
  });

  test("compresses and decompresses gzip", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        const compressed = yield* service.compress(strToU8("fixed"), "gzip", 1);
        return yield* service.decompress(compressed, "gzip");
      })
    );

    expect(strFromU8(result)).toBe("fixed");
  });
});
