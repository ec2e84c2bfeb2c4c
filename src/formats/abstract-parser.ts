/**
 * Abstract base parser for line-oriented formats
 *
 * Each format implements `parseLines`; string, file and stream entry points,
 * interrupt handling and the strict/lenient warning policy are shared here.
 */

import { ParseError } from "../errors";
import { createStream } from "../io/file-reader";
import { linesOf, readLines } from "../io/stream-utils";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions &
  Required<Pick<ParserOptions, "strict" | "maxLineLength" | "trackLineNumbers" | "onWarning">>;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults = {
      strict: false,
      maxLineLength: 10_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(
          lineNumber === undefined
            ? `${this.getFormatName()} Warning: ${warning}`
            : `${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`
        );
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected getDefaultOptions(): Partial<TOptions> {
    return {};
  }

  /**
   * Format identifier used in errors and warnings (e.g. "GFF3", "FASTA")
   */
  protected abstract getFormatName(): string;

  /**
   * Parse records from an async sequence of text lines
   */
  abstract parseLines(lines: AsyncIterable<string>): AsyncIterable<T>;

  /**
   * Parse records from an in-memory string
   */
  async *parseString(data: string): AsyncIterable<T> {
    yield* this.parseLines(linesOf(data));
  }

  /**
   * Parse records from a file, gunzipping `.gz` input
   *
   * @throws {FileError} When the file cannot be opened
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T> {
    const stream = await createStream(filePath, options);
    yield* this.parse(stream);
  }

  /**
   * Parse records from a byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T> {
    yield* this.parseLines(readLines(stream, this.options.maxLineLength));
  }

  /**
   * Check if parsing should stop; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted(this.getFormatName());
  }

  /**
   * Report a recoverable anomaly: a warning in lenient mode, a ParseError
   * in strict mode
   */
  protected reportAnomaly(message: string, lineNumber?: number, context?: string): void {
    if (this.options.strict) {
      throw new ParseError(message, this.getFormatName(), lineNumber, context);
    }
    this.options.onWarning(message, lineNumber);
  }
}

/**
 * AbortSignal integration for format parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(format: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`${format} parsing was aborted`, format);
    }
  }
}
