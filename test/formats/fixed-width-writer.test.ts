/**
 * Fixed-width writer tests
 *
 * Covers padding and alignment, truncation, line endings, comment lines,
 * failure atomicity and round trips through the reader.
 */

import { describe, expect, test, vi } from "vitest";
import { FixedWidthParseError, ValidationError } from "../../src/errors";
import { FixedWidthReader, FixedWidthWriter, formatRecords } from "../../src/formats/fixed-width";
import { ByteArraySink } from "../../src/io/byte-writer";
import { decode, recordingStream } from "../utils/collect";

describe("FixedWidthWriter", () => {
  describe("basic writing", () => {
    test("pads each field to its column", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [2, 20, 10], trimFields: true });

      await writer.write(["us", "United States", "English"]);

      expect(sink.toString()).toBe(`usUnited States${" ".repeat(7)}English${" ".repeat(3)}\r\n`);
      expect(writer.lineNumber).toBe(1);
    });

    test("aligns columns left or right", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, {
        fieldLengths: [5, 5],
        fieldAlign: ["left", "right"],
        lineEnding: "lf",
      });

      await writer.write(["ab", "cd"]);

      expect(sink.toString()).toBe("ab      cd\n");
    });

    test("fills skip regions with spaces", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, {
        fieldLengths: [3],
        skipStart: 2,
        skipEnd: 1,
        lineEnding: "lf",
      });

      await writer.write(["ab"]);

      expect(sink.toString()).toBe("  ab  \n");
    });

    test.each([
      ["none", "ab "],
      ["cr", "ab \r"],
      ["lf", "ab \n"],
      ["crlf", "ab \r\n"],
    ] as const)("terminates lines in %s mode", async (lineEnding, expected) => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [3], lineEnding });

      await writer.write(["ab"]);

      expect(sink.toString()).toBe(expected);
    });

    test("writes empty values as blank columns", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [2, 2], lineEnding: "lf" });

      await writer.write(["", "x"]);

      expect(sink.toString()).toBe("  x \n");
    });

    test("counts multi-byte characters by their encoded size", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [3], lineEnding: "lf" });

      await writer.write(["é"]);

      expect(sink.length).toBe(4);
      expect(sink.toString()).toBe("é \n");
    });
  });

  describe("oversized values", () => {
    test("truncates with trimFields", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, {
        fieldLengths: [3],
        trimFields: true,
        lineEnding: "lf",
      });

      await writer.write(["abcdef"]);

      expect(sink.toString()).toBe("abc\n");
    });

    test("rejects without trimFields and writes nothing", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, {
        fieldLengths: [3],
        skipStart: 2,
        lineEnding: "lf",
      });

      await writer.write(["ab"]);
      await expect(writer.write(["abcd"])).rejects.toMatchObject({
        kind: "INVALID_FIELD_WIDTH",
        line: 2,
        column: 1,
        message: "line 2, column 1: field width incorrect: value is 4 bytes, column holds 3",
      });

      expect(sink.toString()).toBe("  ab \n");
      expect(writer.lineNumber).toBe(1);
    });
  });

  describe("errors", () => {
    test("rejects a record with the wrong number of fields", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [2, 2], skipStart: 2 });

      await expect(writer.write(["a"])).rejects.toMatchObject({
        kind: "FIELD_COUNT_MISMATCH",
        line: 1,
      });
      expect(sink.length).toBe(0);
    });

    test("requires a layout", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink);

      const error = await writer.write(["a"]).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(FixedWidthParseError);
      expect(error).toMatchObject({ kind: "NO_FIELDS_CONFIGURED" });
      expect(sink.length).toBe(0);
    });

    test("rejects a non-positive width", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [-1] });

      await expect(writer.write(["a"])).rejects.toMatchObject({
        kind: "INVALID_FIELD_WIDTH",
        column: 1,
      });
    });

    test("rejects invalid options", () => {
      expect(() => new FixedWidthWriter(new ByteArraySink(), { commentMarker: "" })).toThrow(
        ValidationError
      );
    });
  });

  describe("comments", () => {
    test("pads short comment text to the line width", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, {
        fieldLengths: [5, 5],
        commentMarker: "#",
        lineEnding: "lf",
      });

      await writer.writeComment("hi");

      expect(sink.toString()).toBe("#hi       \n");
      expect(writer.lineNumber).toBe(1);
    });

    test("cuts long comment text", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [5, 5], commentMarker: "#" });

      await writer.writeComment("hello world, too long");

      expect(sink.toString()).toBe("#hello wor\r\n");
    });

    test("writes nothing without a marker", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [5] });

      await writer.writeComment("ignored");

      expect(sink.length).toBe(0);
      expect(writer.lineNumber).toBe(0);
    });
  });

  describe("buffering", () => {
    test("holds lines until flushed", async () => {
      const { stream, chunks } = recordingStream();
      const writer = new FixedWidthWriter(stream, { fieldLengths: [2], lineEnding: "lf" });

      await writer.write(["ab"]);
      await writer.write(["cd"]);
      expect(chunks).toHaveLength(0);

      await writer.flush();
      await writer.flush();
      expect(chunks.map(decode)).toEqual(["ab\ncd\n"]);
    });

    test("writeAll flushes at the end", async () => {
      const { stream, chunks } = recordingStream();
      const writer = new FixedWidthWriter(stream, { fieldLengths: [2], lineEnding: "lf" });

      await writer.writeAll([["ab"], ["cd"]]);

      expect(chunks.map(decode)).toEqual(["ab\ncd\n"]);
    });

    test("writeAll stops at the first failing record", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [3], lineEnding: "lf" });

      await expect(writer.writeAll([["ab"], ["toolong"], ["cd"]])).rejects.toMatchObject({
        kind: "INVALID_FIELD_WIDTH",
        line: 2,
      });
      expect(sink.toString()).toBe("ab \n");
    });
  });

  describe("configuration", () => {
    test("applies new options to later records", async () => {
      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, { fieldLengths: [2], lineEnding: "lf" });

      await writer.write(["ab"]);
      writer.configure({ fieldLengths: [1, 3], fieldAlign: ["left", "right"] });
      await writer.write(["c", "d"]);

      expect(sink.toString()).toBe("ab\nc  d\n");
    });

    test("warns about negative skips", () => {
      const onWarning = vi.fn();
      const writer = new FixedWidthWriter(new ByteArraySink(), { fieldLengths: [2], onWarning });

      writer.configure({ skipEnd: -4 });

      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith("skipEnd -4 is negative; treating it as 0");
    });
  });

  describe("formatRecords", () => {
    test("formats records into a string", async () => {
      expect(await formatRecords([["ab", "1"]], { fieldLengths: [3, 2], lineEnding: "lf" })).toBe(
        "ab 1 \n"
      );
    });
  });

  describe("round trip", () => {
    test("keeps a leading U+FEFF in a field", async () => {
      const options = { fieldLengths: [5, 2], lineEnding: "lf" } as const;
      const sink = new ByteArraySink();
      await new FixedWidthWriter(sink, options).writeAll([["\uFEFFab", "cd"]]);

      expect(sink.toString()).toBe("\uFEFFabcd\n");
      const reader = FixedWidthReader.fromString(sink.toString(), options);
      expect(await reader.readAll()).toEqual([["\uFEFFab", "cd"]]);
    });

    test("reads back what was written", async () => {
      const options = {
        fieldLengths: [7, 4],
        fieldAlign: ["left", "right"],
        skipStart: 2,
        skipEnd: 1,
        commentMarker: "#",
        trimFields: true,
      } as const;
      const records = [
        ["John", "1245"],
        ["Peter", "35"],
      ];

      const sink = new ByteArraySink();
      const writer = new FixedWidthWriter(sink, options);
      await writer.writeComment("people");
      await writer.writeAll(records);

      const reader = FixedWidthReader.fromString(sink.toString(), options);
      expect(await reader.readAll()).toEqual(records);
    });
  });
});
