/**
 * GFF3 record type definitions
 *
 * @module gff/types
 */

import type { ParserOptions, Strand } from "../../types";

/**
 * One feature line of a GFF3 file
 *
 * Coordinates are 1-based inclusive, as written in the file. `attributes`
 * is kept as raw text; decode it with `parseGffAttributes` when needed.
 *
 * @public
 */
export interface AnnotationRecord {
  /** Reference sequence / chromosome name (column 1) */
  readonly sequenceId: string;
  /** Annotation source (column 2) */
  readonly source: string;
  /** Feature type, e.g. "gene", "mRNA", "CDS", "exon" (column 3) */
  readonly featureType: string;
  /** Start coordinate (column 4) */
  readonly start: number;
  /** End coordinate (column 5) */
  readonly end: number;
  /** Score, or null for "." */
  readonly score: number | null;
  /** Strand (column 7); unknown symbols are read as "." */
  readonly strand: Strand;
  /** CDS phase 0-2, or null for "." */
  readonly phase: number | null;
  /** Raw attribute column (column 9), empty when absent */
  readonly attributes: string;
  /** The source line exactly as read, for diagnostics */
  readonly line: string;
  /** Line number within its input, when tracked */
  readonly lineNumber?: number;
}

/**
 * A feature line the lenient reader could not place: too few columns or
 * unreadable coordinates. Only its type and text are kept.
 *
 * @public
 */
export interface UnplacedFeature {
  readonly unplaced: true;
  readonly featureType: string;
  readonly line: string;
  readonly lineNumber?: number;
}

/**
 * Anything `parseInputEntries` yields
 *
 * @public
 */
export type GffEntry = AnnotationRecord | UnplacedFeature;

/**
 * GFF3 parser configuration options
 *
 * @public
 */
export interface GffParserOptions extends ParserOptions {
  /** Only yield features whose type is in this list */
  includeFeatures?: string[];
}

/**
 * Field positions and limits
 */
export const GFF_LIMITS = {
  /** Columns in a well-formed feature line */
  FIELD_COUNT: 9,
  /** Columns needed to read the feature type */
  MIN_TYPED_FIELDS: 3,
  /** Columns needed to read type, coordinates and strand */
  MIN_USABLE_FIELDS: 7,
} as const;
