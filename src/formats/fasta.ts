/**
 * FASTA format parser and writer
 *
 * Records are a `>` header followed by any number of sequence lines, which
 * are concatenated with whitespace removed. Blank lines and `;` comment
 * lines are ignored.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { FastaSequence, ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * FASTA-specific parser options
 */
export interface FastaParserOptions extends ParserOptions {}

/**
 * FASTA writer options
 */
export interface FastaWriterOptions {
  /** Residues per sequence line; 0 writes each sequence on one line (default 60) */
  lineWidth?: number;
  /** Write the description after the identifier (default true) */
  includeDescription?: boolean;
}

const FastaParserOptionsSchema = type({
  "strict?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "signal?": "unknown",
  "onWarning?": "Function",
});

const FastaWriterOptionsSchema = type({
  "lineWidth?": "number.integer>=0",
  "includeDescription?": "boolean",
});

interface PendingRecord {
  id: string;
  description: string | undefined;
  chunks: string[];
  lineNumber: number;
}

/**
 * Streaming FASTA parser
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const seq of parser.parseFile("contigs.fa")) {
 *   console.log(`${seq.id}\t${seq.length}`);
 * }
 * ```
 */
export class FastaParser extends AbstractParser<FastaSequence, FastaParserOptions> {
  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  async *parseLines(lines: AsyncIterable<string>): AsyncIterable<FastaSequence> {
    let current: PendingRecord | undefined;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      if (line.startsWith(">")) {
        if (current !== undefined) yield this.finishRecord(current);
        current = this.startRecord(line, lineNumber);
        continue;
      }

      const trimmed = line.trim();
      if (trimmed === "" || trimmed.startsWith(";")) continue;

      if (current === undefined) {
        this.reportAnomaly("sequence data before the first header; line skipped", lineNumber, line);
        continue;
      }
      current.chunks.push(trimmed.replace(/\s+/g, ""));
    }

    if (current !== undefined) yield this.finishRecord(current);
  }

  private startRecord(header: string, lineNumber: number): PendingRecord {
    const text = header.slice(1).trim();
    const match = /^(\S*)\s*(.*)$/.exec(text);
    const id = match?.[1] ?? "";
    const description = match?.[2] ?? "";

    if (id === "") {
      this.reportAnomaly("header without an identifier", lineNumber, header);
    }

    return {
      id,
      description: description === "" ? undefined : description,
      chunks: [],
      lineNumber,
    };
  }

  private finishRecord(record: PendingRecord): FastaSequence {
    const sequence = record.chunks.join("");
    return {
      format: "fasta",
      id: record.id,
      ...(record.description !== undefined && { description: record.description }),
      sequence,
      length: sequence.length,
      ...(this.options.trackLineNumbers && { lineNumber: record.lineNumber }),
    };
  }
}

/**
 * FASTA writer
 *
 * @example
 * ```typescript
 * new FastaWriter({ lineWidth: 4 }).formatSequence(seq);
 * // ">chr1\nACGT\nAC\n"
 * ```
 */
export class FastaWriter {
  private readonly lineWidth: number;
  private readonly includeDescription: boolean;

  constructor(options: FastaWriterOptions = {}) {
    const validationResult = FastaWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA writer options: ${validationResult.summary}`);
    }
    this.lineWidth = options.lineWidth ?? 60;
    this.includeDescription = options.includeDescription ?? true;
  }

  /**
   * Format one sequence, header and wrapped residues, newline-terminated
   */
  formatSequence(sequence: Pick<FastaSequence, "id" | "description" | "sequence">): string {
    let header = `>${sequence.id}`;
    if (this.includeDescription && sequence.description !== undefined) {
      header += ` ${sequence.description}`;
    }
    return `${header}\n${this.wrap(sequence.sequence)}`;
  }

  /**
   * Format several sequences back to back
   */
  formatSequences(sequences: readonly Pick<FastaSequence, "id" | "description" | "sequence">[]): string {
    return sequences.map((seq) => this.formatSequence(seq)).join("");
  }

  private wrap(text: string): string {
    if (text === "") return "";
    if (this.lineWidth === 0) return `${text}\n`;

    let wrapped = "";
    for (let i = 0; i < text.length; i += this.lineWidth) {
      wrapped += `${text.slice(i, i + this.lineWidth)}\n`;
    }
    return wrapped;
  }
}
