/**
 * Format parsers and writers
 */

export { AbstractParser } from "./abstract-parser";
export * from "./fixed-width";
