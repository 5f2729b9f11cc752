/**
 * Reading and writing fixed-width records
 *
 * Writes a small account listing with a header comment, reads it back,
 * then shows how a bad line is reported.
 */

import {
  ByteArraySink,
  FixedWidthParseError,
  FixedWidthReader,
  FixedWidthWriter,
  type FixedWidthOptions,
  getErrorSuggestion,
} from "../src";

const layout: FixedWidthOptions = {
  fieldLengths: [2, 20, 10],
  fieldAlign: ["left", "left", "right"],
  commentMarker: "#",
  lineEnding: "lf",
  trimFields: true,
};

// ============================================================================
// Example 1: Writing records
// ============================================================================

async function example1_writing(): Promise<string> {
  console.log("\n=== Example 1: Writing records ===\n");

  const sink = new ByteArraySink();
  const writer = new FixedWidthWriter(sink, layout);

  await writer.writeComment("country languages");
  await writer.writeAll([
    ["us", "United States", "English"],
    ["fr", "France", "French"],
    ["br", "Brazil", "Portuguese"],
  ]);

  const text = sink.toString();
  console.log(text);
  return text;
}

// ============================================================================
// Example 2: Reading records back
// ============================================================================

async function example2_reading(text: string): Promise<void> {
  console.log("\n=== Example 2: Reading records back ===\n");

  for await (const { fields, lineNumber } of FixedWidthReader.fromString(text, layout)) {
    console.log(`  line ${lineNumber}: ${fields.join(" | ")}`);
  }
}

// ============================================================================
// Example 3: Handling a malformed line
// ============================================================================

async function example3_errors(): Promise<void> {
  console.log("\n=== Example 3: Handling a malformed line ===\n");

  const reader = FixedWidthReader.fromString("usUnited States\n", layout);
  try {
    await reader.read();
  } catch (error) {
    if (!(error instanceof FixedWidthParseError)) throw error;
    console.log(`  ${error.message}`);
    console.log(`  hint: ${getErrorSuggestion(error) ?? "none"}`);
  }
}

async function main(): Promise<void> {
  const text = await example1_writing();
  await example2_reading(text);
  await example3_errors();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
