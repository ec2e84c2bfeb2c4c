/**
 * Stream processing utilities for line-oriented text
 *
 * Byte streams arrive in arbitrary chunks; these helpers reassemble them
 * into complete lines without holding more than one partial line in memory.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 10_000_000;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * A trailing line without a newline is still yielded; a final empty line
 * (file ending in "\n") is not.
 *
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a single line exceeds the maximum length
 * @example
 * ```typescript
 * const stream = await createStream('annotation.gff3');
 * for await (const line of readLines(stream)) {
 *   if (!line.startsWith('#')) console.log(line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  maxLineLength = MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          totalBytesProcessed
        );
      }

      if (chunk.done) break;

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    // A lone "\r" held back at the end of the last chunk is a line ending
    if (buffer.endsWith("\r")) buffer = buffer.slice(0, -1);
    if (buffer.length > 0) {
      yield buffer;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Split complete lines out of a text buffer
 *
 * Handles "\n", "\r\n" and bare "\r" line endings. A "\r" at the very end
 * of the buffer stays in the remainder, since the next chunk may begin
 * with its "\n".
 *
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string, maxLineLength = MAX_LINE_LENGTH): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLength(buffer.slice(lineStart, lineEnd), maxLineLength));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLength(buffer.slice(lineStart, position), maxLineLength));
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > maxLineLength) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

/**
 * Split an in-memory string into lines using the same rules as readLines
 */
export async function* linesOf(data: string): AsyncIterable<string> {
  const { lines, remainder } = processBuffer(data);
  yield* lines;
  const last = remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  if (last.length > 0) yield last;
}

function checkLength(line: string, maxLineLength: number): string {
  if (line.length > maxLineLength) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
      line.length,
      "overflow",
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

export const StreamUtils = {
  readLines,
  processBuffer,
  linesOf,
} as const;
