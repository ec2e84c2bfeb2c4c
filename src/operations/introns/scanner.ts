/**
 * IntronScanner - min/max intron length over a GFF3 feature stream
 *
 * One scanner is one pass: it holds the live transcript state and the global
 * extrema, writes threshold warnings as soon as a gap crosses a bound, and
 * reports the flanking records at the end when asked to. Separate scanners
 * share nothing, so scanning the same input twice gives the same result.
 *
 * @module introns/scanner
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { GffEntry } from "../../formats/gff";
import {
  detectThresholdEvents,
  GlobalStatsAggregator,
  initialTranscript,
  reduceTranscript,
} from "./reducer";
import { formatFlankingReport, formatThresholdWarning } from "./report";
import type { IntronScanOptions, IntronScanResult, TranscriptAggregate } from "./types";

const IntronScanOptionsSchema = type({
  "featureType?": "string>0",
  "reportFlanking?": "boolean",
  "warnBelow?": "number.integer>=0",
  "warnAbove?": "number.integer>=0",
  "includeCumulative?": "boolean",
  "onDiagnostic?": "Function",
});

type ResolvedScanOptions = Required<
  Pick<IntronScanOptions, "featureType" | "reportFlanking" | "includeCumulative" | "onDiagnostic">
> &
  Pick<IntronScanOptions, "warnBelow" | "warnAbove">;

/**
 * Streaming intron scanner
 *
 * @example
 * ```typescript
 * const scanner = new IntronScanner({ featureType: "CDS", warnBelow: 60 });
 * for await (const record of new GffParser().parseFile("annotation.gff3")) {
 *   scanner.push(record);
 * }
 * console.log(formatIntronSummary(scanner.finish()));
 * ```
 */
export class IntronScanner {
  private readonly options: ResolvedScanOptions;
  private readonly stats = new GlobalStatsAggregator();
  private transcript: TranscriptAggregate = initialTranscript();
  private finished = false;

  constructor(options: IntronScanOptions = {}) {
    const validationResult = IntronScanOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid intron scan options: ${validationResult.summary}`);
    }

    this.options = {
      featureType: options.featureType ?? "exon",
      reportFlanking: options.reportFlanking ?? false,
      includeCumulative: options.includeCumulative ?? true,
      onDiagnostic: options.onDiagnostic ?? ((line: string) => console.warn(line)),
      ...(options.warnBelow !== undefined && { warnBelow: options.warnBelow }),
      ...(options.warnAbove !== undefined && { warnAbove: options.warnAbove }),
    };
  }

  /**
   * Feed the next record in stream order. Unplaced entries only matter
   * when they open a transcript.
   *
   * @throws {ValidationError} If called after finish()
   */
  push(record: GffEntry): void {
    if (this.finished) {
      throw new ValidationError("IntronScanner.push called after finish()");
    }

    const { transcript, observation } = reduceTranscript(
      this.transcript,
      record,
      this.options.featureType
    );
    this.transcript = transcript;
    if (observation === undefined) return;

    this.stats.observe(observation);
    for (const event of detectThresholdEvents(observation, this.options)) {
      this.emit(formatThresholdWarning(event));
    }
  }

  /**
   * Close the scan and return the totals; writes the flanking report when
   * enabled. Calling it again returns the same totals without re-reporting.
   */
  finish(): IntronScanResult {
    const stats = this.stats.snapshot();
    if (!this.finished && this.options.reportFlanking) {
      this.emit(formatFlankingReport(stats));
    }
    this.finished = true;

    return {
      ...stats,
      featureType: this.options.featureType,
      includeCumulative: this.options.includeCumulative,
    };
  }

  private emit(lines: readonly string[]): void {
    for (const line of lines) this.options.onDiagnostic(line);
  }
}

/**
 * Scan a whole record stream
 *
 * @example
 * ```typescript
 * const result = await scanIntrons(parser.parseString(gff3), { featureType: "CDS" });
 * result.minIntronLength; // smallest positive gap, or the sentinel
 * ```
 */
export async function scanIntrons(
  records: AsyncIterable<GffEntry> | Iterable<GffEntry>,
  options: IntronScanOptions = {}
): Promise<IntronScanResult> {
  const scanner = new IntronScanner(options);
  for await (const record of records) {
    scanner.push(record);
  }
  return scanner.finish();
}
