/**
 * Intron-length reduction over an ordered feature stream
 *
 * The transcript state is a value: every record maps the current
 * TranscriptAggregate to a new one, so nothing can leak from one transcript
 * into the next. The process-wide extrema live in GlobalStatsAggregator,
 * which is passed by reference and is the only mutable piece.
 *
 * Features inside a transcript are assumed to be in file order along the
 * strand: ascending starts on "+" (and unstranded), descending on "-".
 * Input that breaks this still reduces, it just measures whatever the
 * file order implies.
 *
 * @module introns/reducer
 */

import type { AnnotationRecord, GffEntry } from "../../formats/gff";
import { isUnplaced } from "../../formats/gff";
import type {
  FlankPair,
  GapObservation,
  GlobalStats,
  ThresholdEvent,
  TranscriptAggregate,
} from "./types";
import { MIN_INTRON_SENTINEL, TRANSCRIPT_BOUNDARY_TYPES } from "./types";

/**
 * Empty transcript state
 */
export function initialTranscript(): TranscriptAggregate {
  return { cumulativeIntronLength: 0 };
}

/**
 * Whether a record opens a new transcript group. Only the type counts, so
 * an unplaced boundary line still resets.
 */
export function isTranscriptBoundary(record: Pick<GffEntry, "featureType">): boolean {
  return TRANSCRIPT_BOUNDARY_TYPES.has(record.featureType);
}

/**
 * Measure the gap between the transcript's anchor and an exonic record
 *
 * "-" strand: `anchor - end - 1`, and the new anchor is the record's start.
 * Otherwise: `start - anchor - 1`, and the new anchor is the record's end.
 * Without an anchor the gap is 0.
 *
 * @example
 * ```typescript
 * // previous exon ended at 3629477, next starts at 3630569 on "+"
 * measureGap(aggregate, exon).gapLength; // 1091
 * ```
 */
export function measureGap(aggregate: TranscriptAggregate, record: AnnotationRecord): GapObservation {
  const { anchor } = aggregate;
  const reverse = record.strand === "-";

  let gapLength = 0;
  if (anchor !== undefined) {
    gapLength = reverse
      ? anchor.coordinate - record.end - 1
      : record.start - anchor.coordinate - 1;
  }

  const transcript: TranscriptAggregate = {
    ...aggregate,
    anchor: { coordinate: reverse ? record.start : record.end, feature: record },
    cumulativeIntronLength: aggregate.cumulativeIntronLength + gapLength,
  };

  return {
    gapLength,
    ...(anchor !== undefined && { upstream: anchor.feature }),
    downstream: record,
    transcript,
  };
}

/**
 * Apply one record to the transcript state
 *
 * A transcript-defining record resets the state; a placed record of the
 * measured feature type produces a gap observation; anything else passes
 * through. Both can happen for one record when the measured type is itself
 * a boundary type.
 */
export function reduceTranscript(
  aggregate: TranscriptAggregate,
  record: GffEntry,
  featureType: string
): { transcript: TranscriptAggregate; observation?: GapObservation } {
  const transcript = isTranscriptBoundary(record) ? initialTranscript() : aggregate;

  if (isUnplaced(record) || record.featureType !== featureType) {
    return { transcript };
  }

  const observation = measureGap(transcript, record);
  return { transcript: observation.transcript, observation };
}

/**
 * Gaps outside the warning bounds. Only positive gaps can fall below;
 * the upper bound compares the raw value.
 */
export function detectThresholdEvents(
  observation: GapObservation,
  bounds: { warnBelow?: number; warnAbove?: number }
): ThresholdEvent[] {
  const { gapLength, upstream, downstream } = observation;
  const events: ThresholdEvent[] = [];
  const context = {
    gapLength,
    downstream,
    ...(upstream !== undefined && { upstream }),
  };

  if (bounds.warnBelow !== undefined && gapLength > 0 && gapLength < bounds.warnBelow) {
    events.push({ kind: "below", threshold: bounds.warnBelow, ...context });
  }
  if (bounds.warnAbove !== undefined && gapLength > bounds.warnAbove) {
    events.push({ kind: "above", threshold: bounds.warnAbove, ...context });
  }

  return events;
}

/**
 * Process-wide extrema, updated in place from gap observations
 *
 * The minimum only moves on strictly positive gaps; the maximum and the
 * cumulative maximum compare raw values against their initial 0. Ties keep
 * the first flank pair seen.
 */
export class GlobalStatsAggregator {
  private minIntronLength = MIN_INTRON_SENTINEL;
  private maxIntronLength = 0;
  private maxCumulativeIntronLength = 0;
  private intronCount = 0;
  private minFlank: FlankPair | undefined;
  private maxFlank: FlankPair | undefined;

  observe(observation: GapObservation): void {
    const { gapLength, upstream, downstream, transcript } = observation;

    if (transcript.cumulativeIntronLength > this.maxCumulativeIntronLength) {
      this.maxCumulativeIntronLength = transcript.cumulativeIntronLength;
    }

    if (gapLength > 0) {
      this.intronCount++;
    }

    if (gapLength > 0 && gapLength < this.minIntronLength) {
      this.minIntronLength = gapLength;
      this.minFlank = upstream === undefined ? undefined : { upstream, downstream };
    }

    if (gapLength > this.maxIntronLength) {
      this.maxIntronLength = gapLength;
      this.maxFlank = upstream === undefined ? undefined : { upstream, downstream };
    }
  }

  snapshot(): GlobalStats {
    return {
      minIntronLength: this.minIntronLength,
      maxIntronLength: this.maxIntronLength,
      maxCumulativeIntronLength: this.maxCumulativeIntronLength,
      intronCount: this.intronCount,
      ...(this.minFlank !== undefined && { minFlank: this.minFlank }),
      ...(this.maxFlank !== undefined && { maxFlank: this.maxFlank }),
    };
  }
}
