/**
 * FASTQ format writer
 */

import type { FastqSequence } from "../../types";
import { formatHeader } from "./primitives";
import type { FastqWriterOptions } from "./types";

/**
 * Formats reads back into four-line FASTQ text
 *
 * @example
 * ```typescript
 * const writer = new FastqWriter();
 * process.stdout.write(writer.formatRecord(read));
 * ```
 */
export class FastqWriter {
  private readonly options: Required<FastqWriterOptions>;

  constructor(options: FastqWriterOptions = {}) {
    this.options = {
      includeDescription: options.includeDescription ?? true,
      preserveSeparator: options.preserveSeparator ?? true,
    };
  }

  /**
   * Format one read as four newline-terminated lines
   */
  formatRecord(read: FastqSequence): string {
    const header = formatHeader(
      read.id,
      this.options.includeDescription ? read.description : undefined
    );
    const separator = this.options.preserveSeparator ? read.separator : "+";
    return `${header}\n${read.sequence}\n${separator}\n${read.quality}\n`;
  }

  /**
   * Format a stream of reads
   */
  async *formatStream(reads: AsyncIterable<FastqSequence>): AsyncIterable<string> {
    for await (const read of reads) {
      yield this.formatRecord(read);
    }
  }
}
