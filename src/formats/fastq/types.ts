/**
 * FASTQ reader and writer options
 */

import type { ParserOptions } from "../../types";

/**
 * FASTQ parser configuration options
 */
export interface FastqParserOptions extends ParserOptions {
  /** Reject records whose sequence and quality lengths differ (default true) */
  requireMatchingLengths?: boolean;
}

/**
 * FASTQ writer configuration options
 */
export interface FastqWriterOptions {
  /** Write the description after the identifier (default true) */
  includeDescription?: boolean;
  /** Write separator lines as read instead of a bare '+' (default true) */
  preserveSeparator?: boolean;
}
