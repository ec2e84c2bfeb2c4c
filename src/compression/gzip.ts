/**
 * Streaming gzip decompression
 *
 * Wraps fflate's incremental Gunzip in a web TransformStream so compressed
 * input flows through the same line reader as plain text.
 */

import { Gunzip } from 'fflate';
import { CompressionError } from '../errors';

/**
 * Create a TransformStream that gunzips the bytes written to it
 *
 * @example
 * ```typescript
 * const plain = compressed.pipeThrough(createStream());
 * ```
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  let bytesProcessed = 0;
  let gunzip: Gunzip | undefined;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      gunzip = new Gunzip((chunk) => {
        if (chunk.length > 0) controller.enqueue(chunk);
      });
    },
    transform(chunk, controller) {
      bytesProcessed += chunk.length;
      try {
        gunzip?.push(chunk);
      } catch (err) {
        controller.error(CompressionError.fromSystemError('gzip', 'stream', err, bytesProcessed));
      }
    },
    flush(controller) {
      try {
        gunzip?.push(new Uint8Array(0), true);
      } catch (err) {
        controller.error(CompressionError.fromSystemError('gzip', 'stream', err, bytesProcessed));
      }
    },
  });
}

/**
 * Wrap a compressed readable stream with gzip decompression
 *
 * @throws {CompressionError} If the stream cannot be piped
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  try {
    return input.pipeThrough(createStream());
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'stream', err);
  }
}

export const GzipDecompressor = {
  createStream,
  wrapStream,
} as const;
