/**
 * FASTQ format parser
 *
 * Reads strict four-line records: header, sequence, separator, quality.
 * Wrapped (multi-line) FASTQ is not supported; every record must occupy
 * exactly four lines. Blank lines between records are skipped.
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../../errors";
import type { FastqSequence } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { extractDescription, extractId, isValidHeader, isValidSeparator } from "./primitives";
import type { FastqParserOptions } from "./types";

const FastqParserOptionsSchema = type({
  "strict?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "requireMatchingLengths?": "boolean",
  "signal?": "unknown",
  "onWarning?": "Function",
});

/**
 * Streaming FASTQ parser
 *
 * @example
 * ```typescript
 * const parser = new FastqParser();
 * for await (const read of parser.parseFile("reads.fastq.gz")) {
 *   console.log(`${read.id}: ${read.length} bp`);
 * }
 * ```
 */
export class FastqParser extends AbstractParser<FastqSequence, FastqParserOptions> {
  constructor(options: FastqParserOptions = {}) {
    const validationResult = FastqParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTQ parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected override getDefaultOptions(): Partial<FastqParserOptions> {
    return { requireMatchingLengths: true };
  }

  protected getFormatName(): string {
    return "FASTQ";
  }

  /**
   * @throws {ParseError} On a missing '@' header or '+' separator, a record
   * cut short by end of input, or mismatched sequence/quality lengths
   */
  async *parseLines(lines: AsyncIterable<string>): AsyncIterable<FastqSequence> {
    let pending: string[] = [];
    let recordStart = 0;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      if (pending.length === 0) {
        if (line.trim() === "") continue;
        recordStart = lineNumber;
      }

      pending.push(line);
      if (pending.length === 4) {
        yield this.buildRecord(pending, recordStart);
        pending = [];
      }
    }

    if (pending.length > 0) {
      throw new ParseError(
        `Truncated FASTQ record: expected 4 lines, found ${pending.length}`,
        "FASTQ",
        recordStart,
        pending[0]
      );
    }
  }

  private buildRecord(lines: readonly string[], lineNumber: number): FastqSequence {
    const [header = "", sequence = "", separator = "", quality = ""] = lines;

    if (!isValidHeader(header)) {
      throw new ParseError(
        "FASTQ header must start with '@' followed by an identifier",
        "FASTQ",
        lineNumber,
        header
      );
    }
    if (!isValidSeparator(separator)) {
      throw new ParseError(
        "FASTQ separator line must start with '+'",
        "FASTQ",
        lineNumber + 2,
        separator
      );
    }

    const id = extractId(header);
    if (this.options.requireMatchingLengths && sequence.length !== quality.length) {
      throw new ParseError(
        `Read '${id}': sequence length ${sequence.length} does not match quality length ${quality.length}`,
        "FASTQ",
        lineNumber + 3
      );
    }

    const description = extractDescription(header);
    return {
      format: "fastq",
      id,
      ...(description !== undefined && { description }),
      sequence,
      quality,
      separator,
      length: sequence.length,
      ...(this.options.trackLineNumbers && { lineNumber }),
    };
  }
}
