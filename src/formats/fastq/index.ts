/**
 * FASTQ format module
 *
 * @module fastq
 */

export { FastqParser } from "./parser";
export { FastqWriter } from "./writer";
export {
  extractDescription,
  extractId,
  formatHeader,
  isValidHeader,
  isValidSeparator,
} from "./primitives";
export type { FastqParserOptions, FastqWriterOptions } from "./types";
