/**
 * Compression support for fixed-width files
 */

export { CompressionDetector } from "./detector";
export { compress, decompress, type GzipOptions } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
