/**
 * Per-record sequence lengths
 */

import type { FastaSequence } from "../types";

/**
 * Yield `id\tlength` for every record, in input order
 */
export async function* sequenceLengths(
  sequences: AsyncIterable<Pick<FastaSequence, "id" | "length">>
): AsyncIterable<string> {
  for await (const seq of sequences) {
    yield `${seq.id}\t${seq.length}`;
  }
}
