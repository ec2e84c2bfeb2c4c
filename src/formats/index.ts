/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FastaParser, GffParser } from "../formats";
 * ```
 */

export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
export {
  DelimitedParser,
  type DelimitedParserOptions,
  type DelimitedRow,
  type DelimitedTable,
  type DelimiterType,
} from "./dsv";
export { FastaParser, type FastaParserOptions, FastaWriter, type FastaWriterOptions } from "./fasta";
export { FastqParser, type FastqParserOptions, FastqWriter, type FastqWriterOptions } from "./fastq";
export {
  type AnnotationRecord,
  type GffEntry,
  GFF_LIMITS,
  GffParser,
  type GffParserOptions,
  isGffCommentOrBlank,
  isUnplaced,
  parseGffAttributes,
  parseGffStrand,
  type UnplacedFeature,
} from "./gff";
