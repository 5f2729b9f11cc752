/**
 * @module formats/fixed-width/constants
 * @description Byte values and defaults for fixed-width processing
 */

import type { LineEnding } from "./types";

export const CR = 0x0d;
export const LF = 0x0a;
export const SPACE = 0x20;

/** Both the reader and the writer default to CR LF */
export const DEFAULT_LINE_ENDING: LineEnding = "crlf";

/**
 * Bytes emitted after each written line
 */
export const LINE_ENDING_BYTES: Record<LineEnding, Uint8Array> = {
  none: new Uint8Array(0),
  cr: new Uint8Array([CR]),
  lf: new Uint8Array([LF]),
  crlf: new Uint8Array([CR, LF]),
};
