/**
 * genefilters - streaming filters over genome annotation and sequence files
 *
 * The core is the intron scanner, which walks GFF3 features in file order
 * and reports the shortest intron, the longest intron and the longest
 * cumulative intron span of any transcript. Alongside it sit small
 * utilities for FASTQ tail trimming, table joins and averages, and FASTA
 * lengths and splitting.
 */

// Compression
export { CompressionDetector, GzipDecompressor } from "./compression";
// Errors
export {
  BufferError,
  ColumnAverageError,
  CompressionError,
  FileError,
  GeneFiltersError,
  JoinError,
  ParseError,
  SplitError,
  StreamError,
  ValidationError,
} from "./errors";
// Formats
export {
  AbstractParser,
  type AnnotationRecord,
  type GffEntry,
  DelimitedParser,
  type DelimitedParserOptions,
  type DelimitedRow,
  type DelimitedTable,
  FastaParser,
  FastaWriter,
  FastqParser,
  FastqWriter,
  GffParser,
  type GffParserOptions,
  isUnplaced,
  parseGffAttributes,
} from "./formats";
// I/O
export { createStream, exists, FileReader, getSize, readToString } from "./io/file-reader";
export { ensureDirectory, writeString } from "./io/file-writer";
export { openSource, readInputLines } from "./io/input";
export { linesOf, readLines, StreamUtils } from "./io/stream-utils";
// Operations
export * from "./operations";
// Core types
export type {
  AbstractSequence,
  CompressionFormat,
  FastaSequence,
  FastqSequence,
  FileReaderOptions,
  InputLine,
  InputSource,
  ParserOptions,
  Strand,
} from "./types";
