/**
 * Types for the intron-length scanner
 *
 * @module introns/types
 */

import type { AnnotationRecord } from "../../formats/gff";

/**
 * Starting value of the global minimum. It is printed as-is when no
 * positive gap is ever seen, so it must stay a plain number.
 */
export const MIN_INTRON_SENTINEL = 1_000_000_000;

/**
 * Feature types that open a new transcript group. `gene` covers
 * annotations whose genes carry their exons directly, without an mRNA.
 */
export const TRANSCRIPT_BOUNDARY_TYPES: ReadonlySet<string> = new Set(["mRNA", "gene"]);

/**
 * Trailing edge of the previous exonic feature, together with the feature
 * itself. On the reverse strand the edge is the feature's start, otherwise
 * its end.
 */
export interface TranscriptAnchor {
  readonly coordinate: number;
  readonly feature: AnnotationRecord;
}

/**
 * Per-transcript state, replaced (never mutated) by the reducer
 */
export interface TranscriptAggregate {
  /** Unset before the first exonic feature of the group */
  readonly anchor?: TranscriptAnchor;
  /** Sum of every gap measured in this transcript, non-positive ones included */
  readonly cumulativeIntronLength: number;
}

/**
 * The two exonic records on either side of a gap
 */
export interface FlankPair {
  readonly upstream: AnnotationRecord;
  readonly downstream: AnnotationRecord;
}

/**
 * One gap measurement produced by an exonic record
 */
export interface GapObservation {
  /** Bases strictly between the two features; 0 or less means no intron */
  readonly gapLength: number;
  /** Previous exonic record; absent for the first feature of a group */
  readonly upstream?: AnnotationRecord;
  readonly downstream: AnnotationRecord;
  /** Transcript state after this feature was applied */
  readonly transcript: TranscriptAggregate;
}

/**
 * Snapshot of the process-wide extrema
 */
export interface GlobalStats {
  readonly minIntronLength: number;
  readonly maxIntronLength: number;
  readonly maxCumulativeIntronLength: number;
  /** Number of strictly positive gaps seen; 0 means min is still the sentinel */
  readonly intronCount: number;
  readonly minFlank?: FlankPair;
  readonly maxFlank?: FlankPair;
}

/**
 * A gap outside the configured warning bounds
 */
export interface ThresholdEvent {
  readonly kind: "below" | "above";
  readonly gapLength: number;
  readonly threshold: number;
  readonly upstream?: AnnotationRecord;
  readonly downstream: AnnotationRecord;
}

/**
 * Scanner configuration
 */
export interface IntronScanOptions {
  /** Feature type whose records delimit introns (default "exon") */
  featureType?: string;
  /** Write min/max flanking records to the diagnostic sink at the end */
  reportFlanking?: boolean;
  /** Warn about every positive gap strictly shorter than this */
  warnBelow?: number;
  /** Warn about every gap strictly longer than this */
  warnAbove?: number;
  /** Emit the third (max cumulative) summary column (default true) */
  includeCumulative?: boolean;
  /** Receives each diagnostic line (default console.warn) */
  onDiagnostic?: (line: string) => void;
}

/**
 * Final result of a scan
 */
export interface IntronScanResult extends GlobalStats {
  readonly featureType: string;
  readonly includeCumulative: boolean;
}
