/**
 * Error hierarchy tests
 */

import { describe, expect, test } from "vitest";
import {
  EndOfStreamError,
  FileError,
  FixedWidthError,
  FixedWidthParseError,
  IncompleteReadError,
  ParseError,
  StreamError,
  getErrorSuggestion,
} from "../src/errors";

describe("FixedWidthParseError", () => {
  test("formats line, column and detail", () => {
    const error = new FixedWidthParseError("INVALID_FIELD_WIDTH", { line: 3, column: 2 }, "too wide");

    expect(error.message).toBe("line 3, column 2: field width incorrect: too wide");
    expect(error.lineNumber).toBe(3);
    expect(error.code).toBe("PARSE_ERROR");
    expect(error.format).toBe("FixedWidth");
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toBeInstanceOf(FixedWidthError);
  });

  test("uses column 0 for line-level failures", () => {
    const error = new FixedWidthParseError("MALFORMED_LINE_ENDING", { line: 7 });

    expect(error.message).toBe("line 7, column 0: CRLF not found at end of line");
    expect(error.column).toBeUndefined();
  });

  test("includes position and context in toString", () => {
    const error = new FixedWidthParseError("INCORRECT_LINE_WIDTH", { line: 2 }, "expected 4 bytes, got 3");

    expect(error.toString()).toBe(
      "FixedWidthParseError: line 2, column 0: incorrect line width: expected 4 bytes, got 3 (line 2)\n" +
        "Context: expected 4 bytes, got 3"
    );
  });
});

describe("stream errors", () => {
  test("end of stream is a read stream error", () => {
    const error = new EndOfStreamError();

    expect(error).toBeInstanceOf(StreamError);
    expect(error.streamType).toBe("read");
    expect(error.code).toBe("STREAM_ERROR");
  });
});

describe("IncompleteReadError", () => {
  test("carries records and cause", () => {
    const cause = new FixedWidthParseError("INCORRECT_LINE_WIDTH", { line: 3 });
    const error = new IncompleteReadError([["a"], ["b"]], cause);

    expect(error.message).toBe("read 2 record(s) before failing: line 3, column 0: incorrect line width");
    expect(error.records).toEqual([["a"], ["b"]]);
    expect(error.cause).toBe(cause);
    expect(error.lineNumber).toBe(3);
  });
});

describe("FileError", () => {
  test("adds a suggestion for a missing file", () => {
    const error = FileError.fromSystemError(
      "read",
      "/tmp/missing.txt",
      new Error("ENOENT: no such file or directory")
    );

    expect(error.message).toBe(
      "read operation failed: ENOENT: no such file or directory. Check that the file path is correct and the file exists"
    );
    expect(error.toString()).toContain("System Error: Error: ENOENT: no such file or directory");
  });
});

describe("getErrorSuggestion", () => {
  test("suggests a fix per failure kind", () => {
    expect(getErrorSuggestion(new FixedWidthParseError("NO_FIELDS_CONFIGURED", { line: 1 }))).toBe(
      "Set fieldLengths before reading or writing records"
    );
  });

  test("looks through incomplete reads", () => {
    const cause = new FixedWidthParseError("MALFORMED_LINE_ENDING", { line: 2 });

    expect(getErrorSuggestion(new IncompleteReadError([["a"]], cause))).toBe(
      "The input may use LF or CR line endings; set lineEnding accordingly"
    );
  });

  test("has nothing for other errors", () => {
    expect(getErrorSuggestion(new StreamError("boom", "read"))).toBeUndefined();
  });
});
