/**
 * Effect platform layer selection
 *
 * File I/O goes through Effect's FileSystem service; this module is the one
 * place that decides which platform implementation backs it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem and Path
 *
 * @returns Effect platform layer for Node.js
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Whether a command-line path argument names standard input
 */
export function isStdinPath(path: string): boolean {
  return path === "-";
}
