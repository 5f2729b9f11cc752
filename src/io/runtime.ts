/**
 * Effect platform layer for file I/O
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Layer providing FileSystem, Path and the other platform services on Node.js
 */
export function getPlatform() {
  return NodeContext.layer;
}
