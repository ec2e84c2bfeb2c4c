/**
 * Concatenated line input from files and standard input
 *
 * Every utility reads its arguments the same way: files in the order given,
 * `-` (or no arguments at all) meaning standard input, all joined into one
 * logical stream of lines.
 */

import { Readable } from "node:stream";
import type { FileReaderOptions, InputLine, InputSource } from "../types";
import { createStream } from "./file-reader";
import { isStdinPath } from "./runtime";
import { readLines } from "./stream-utils";

/**
 * Open standard input as a web ReadableStream
 */
export function stdinStream(): ReadableStream<Uint8Array> {
  return Readable.toWeb(process.stdin);
}

/**
 * Resolve a source to a display name and a byte stream
 */
export async function openSource(
  source: InputSource,
  options: FileReaderOptions = {}
): Promise<{ name: string; stream: ReadableStream<Uint8Array> }> {
  if (typeof source !== "string") {
    return source;
  }
  if (isStdinPath(source)) {
    return { name: "<stdin>", stream: stdinStream() };
  }
  return { name: source, stream: await createStream(source, options) };
}

/**
 * Read the lines of every source in order, as one stream
 *
 * Sources are opened lazily, so an unreadable later file only fails once
 * the earlier ones have been consumed.
 *
 * @example
 * ```typescript
 * for await (const line of readInputLines(["a.gff3", "-"])) {
 *   console.log(`${line.source}:${line.lineNumber}: ${line.text}`);
 * }
 * ```
 */
export async function* readInputLines(
  sources: readonly InputSource[],
  options: FileReaderOptions = {}
): AsyncIterable<InputLine> {
  const effectiveSources: readonly InputSource[] = sources.length === 0 ? ["-"] : sources;

  for (const source of effectiveSources) {
    const { name, stream } = await openSource(source, options);
    let lineNumber = 0;
    for await (const text of readLines(stream)) {
      lineNumber++;
      yield { text, source: name, lineNumber };
    }
  }
}
