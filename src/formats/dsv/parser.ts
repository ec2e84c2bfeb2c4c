/**
 * Header-bearing delimited table reader
 *
 * The first non-blank line is the header; every later non-blank line is a
 * row. Fields are split on the delimiter with no quoting rules.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { openSource } from "../../io/input";
import { readLines } from "../../io/stream-utils";
import type { InputSource } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { DelimitedParserOptions, DelimitedRow, DelimitedTable } from "./types";

const DelimitedParserOptionsSchema = type({
  "strict?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "delimiter?": "string==1",
  "signal?": "unknown",
  "onWarning?": "Function",
});

/**
 * Delimited table parser
 *
 * `parseLines` streams data rows and drops the header; `readTable` keeps
 * both.
 *
 * @example
 * ```typescript
 * const parser = new DelimitedParser();
 * const { name, header, rows } = await parser.readSource("counts.tsv");
 * ```
 */
export class DelimitedParser extends AbstractParser<DelimitedRow, DelimitedParserOptions> {
  private readonly delimiter: string;

  constructor(options: DelimitedParserOptions = {}) {
    const validationResult = DelimitedParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid delimited parser options: ${validationResult.summary}`);
    }
    super(options);
    this.delimiter = options.delimiter ?? "\t";
  }

  protected getFormatName(): string {
    return "DSV";
  }

  async *parseLines(lines: AsyncIterable<string>): AsyncIterable<DelimitedRow> {
    let seenHeader = false;
    for await (const row of this.splitLines(lines)) {
      if (seenHeader) yield row;
      seenHeader = true;
    }
  }

  /**
   * Read a whole table into memory. An input with no non-blank line gives
   * an empty header and no rows.
   */
  async readTable(lines: AsyncIterable<string>): Promise<DelimitedTable> {
    let header: string[] | undefined;
    const rows: DelimitedRow[] = [];

    for await (const row of this.splitLines(lines)) {
      if (header === undefined) {
        header = row.fields;
      } else {
        rows.push(row);
      }
    }

    return { header: header ?? [], rows };
  }

  /**
   * Read a table from a file path, `-` for standard input, or a named stream
   *
   * @throws {FileError} When a file cannot be opened
   */
  async readSource(source: InputSource): Promise<DelimitedTable & { name: string }> {
    const { name, stream } = await openSource(source);
    const table = await this.readTable(readLines(stream, this.options.maxLineLength));
    return { name, ...table };
  }

  private async *splitLines(lines: AsyncIterable<string>): AsyncIterable<DelimitedRow> {
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();
      if (line.trim() === "") continue;
      yield { fields: line.split(this.delimiter), lineNumber };
    }
  }
}
