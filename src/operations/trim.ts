/**
 * TailTrimProcessor - strip a sentinel quality tail from FASTQ reads
 *
 * Illumina pipelines of the phred64 era marked unreliable read ends with a
 * run of 'B' quality characters. The run is cut from the quality string and
 * the same number of bases from the sequence.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { FastqSequence } from "../types";
import type { Processor, TailTrimOptions, TrimStats } from "./types";

const TailTrimOptionsSchema = type({
  "sentinel?": "string==1",
  "minLength?": "number.integer>=0",
});

/**
 * Length of the trailing run of `sentinel` in a quality string
 */
export function sentinelTailLength(quality: string, sentinel: string): number {
  let end = quality.length;
  while (end > 0 && quality[end - 1] === sentinel) {
    end--;
  }
  return quality.length - end;
}

/**
 * Trim the sentinel tail from one read
 *
 * Returns the read unchanged when there is no tail.
 *
 * @example
 * ```typescript
 * trimQualityTail({ ...read, sequence: "ACGTAC", quality: "IIIIBB" });
 * // sequence "ACGT", quality "IIII", length 4
 * ```
 */
export function trimQualityTail(read: FastqSequence, sentinel = "B"): FastqSequence {
  const tail = sentinelTailLength(read.quality, sentinel);
  if (tail === 0) return read;

  const keep = read.quality.length - tail;
  const sequence = read.sequence.slice(0, keep);
  return {
    ...read,
    sequence,
    quality: read.quality.slice(0, keep),
    length: sequence.length,
  };
}

/**
 * Processor trimming every read and dropping the ones left too short
 *
 * Counts accumulate across runs on the same instance.
 *
 * @example
 * ```typescript
 * const trimmer = new TailTrimProcessor();
 * for await (const read of trimmer.process(reads, { minLength: 20 })) {
 *   out.write(writer.formatRecord(read));
 * }
 * console.error(formatTrimStats(trimmer.stats));
 * ```
 */
export class TailTrimProcessor implements Processor<TailTrimOptions, FastqSequence> {
  private readonly counts: TrimStats = { readsIn: 0, basesIn: 0, readsOut: 0, basesOut: 0 };

  get stats(): TrimStats {
    return { ...this.counts };
  }

  async *process(
    source: AsyncIterable<FastqSequence>,
    options: TailTrimOptions = {}
  ): AsyncIterable<FastqSequence> {
    const validationResult = TailTrimOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid tail trim options: ${validationResult.summary}`);
    }
    const sentinel = options.sentinel ?? "B";
    const minLength = options.minLength ?? 0;

    for await (const read of source) {
      this.counts.readsIn++;
      this.counts.basesIn += read.sequence.length;

      const trimmed = trimQualityTail(read, sentinel);
      if (trimmed.sequence.length < minLength) continue;

      this.counts.readsOut++;
      this.counts.basesOut += trimmed.sequence.length;
      yield trimmed;
    }
  }
}

/**
 * Stats as `key\tvalue` lines
 */
export function formatTrimStats(stats: TrimStats): string[] {
  return [
    `reads_in\t${stats.readsIn}`,
    `bases_in\t${stats.basesIn}`,
    `reads_out\t${stats.readsOut}`,
    `bases_out\t${stats.basesOut}`,
  ];
}
