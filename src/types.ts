/**
 * Core type definitions shared by the readers, operations and CLI
 *
 * Record types stay close to the text they came from: every parsed record
 * keeps enough of its source line to be echoed back in diagnostics.
 */

import { type } from "arktype";

/**
 * Strand orientation
 */
export type Strand = "+" | "-" | ".";

/**
 * Common shape for FASTA and FASTQ records
 */
export interface AbstractSequence {
  /** Sequence identifier (first word of the header) */
  readonly id: string;
  /** Remainder of the header line after the identifier */
  readonly description?: string;
  /** The sequence itself, line breaks removed */
  readonly sequence: string;
  /** Cached sequence length */
  readonly length: number;
  /** Line number of the header, for error reporting */
  readonly lineNumber?: number;
}

/**
 * FASTA record
 */
export interface FastaSequence extends AbstractSequence {
  readonly format: "fasta";
}

/**
 * FASTQ record. `separator` is the third line of the record, kept so that
 * writers can reproduce `+` lines that repeat the identifier.
 */
export interface FastqSequence extends AbstractSequence {
  readonly format: "fastq";
  readonly quality: string;
  readonly separator: string;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Turn recoverable anomalies into ParseErrors instead of warnings */
  strict?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to record source line numbers on parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats understood by the reader
 */
export type CompressionFormat = "gzip" | "none";

/**
 * File reader configuration
 */
export interface FileReaderOptions {
  /** Chunk size used when streaming from disk */
  bufferSize?: number;
  /** Maximum accepted file size in bytes */
  maxFileSize?: number;
  /** Decompress `.gz` input transparently */
  autoDecompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
}

/**
 * Line processing result for streaming text files
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

/**
 * Where a stream of input lines comes from. `"-"` is standard input.
 */
export type InputSource = string | { readonly name: string; readonly stream: ReadableStream<Uint8Array> };

/**
 * One line of concatenated input together with its origin
 */
export interface InputLine {
  readonly text: string;
  readonly source: string;
  readonly lineNumber: number;
}

/**
 * Branded file path produced by FilePathSchema
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * File path validation: non-empty, no NUL bytes, separators normalised
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path.replace(/[\\/]+/g, "/") as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});
