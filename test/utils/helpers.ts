/**
 * Shared test helpers
 */

import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { CliIO } from "../../src/cli/terminal";

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

/**
 * Async iterable over fixed items
 */
export async function* fromArray<T>(items: readonly T[]): AsyncIterable<T> {
  yield* items;
}

/**
 * Byte stream over a string, optionally cut into chunks of `chunkSize` bytes
 */
export function streamOf(text: string | Uint8Array, chunkSize?: number): ReadableStream<Uint8Array> {
  const bytes = typeof text === "string" ? new TextEncoder().encode(text) : text;
  const size = chunkSize ?? Math.max(bytes.length, 1);
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (let i = 0; i < bytes.length; i += size) {
        controller.enqueue(bytes.slice(i, i + size));
      }
      controller.close();
    },
  });
}

/**
 * Fresh temporary directory
 */
export function makeTempDir(prefix = "genefilters-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * CLI I/O capturing stdout and stderr lines, with fixed stdin text
 */
export function captureIO(stdinText = ""): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    stdin: () => streamOf(stdinText),
  };
}
