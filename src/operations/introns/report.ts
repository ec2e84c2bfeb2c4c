/**
 * Text rendering of scan results and diagnostics
 *
 * @module introns/report
 */

import type { FlankPair, GlobalStats, IntronScanResult, ThresholdEvent } from "./types";

/**
 * Tab-separated summary line: `MIN\tMAX[\tMAX_CUMULATIVE]`
 *
 * @example
 * ```typescript
 * formatIntronSummary(result); // "54\t1091\t2659"
 * ```
 */
export function formatIntronSummary(
  result: Pick<IntronScanResult, "minIntronLength" | "maxIntronLength" | "maxCumulativeIntronLength">,
  includeCumulative = true
): string {
  const fields = [result.minIntronLength, result.maxIntronLength];
  if (includeCumulative) fields.push(result.maxCumulativeIntronLength);
  return fields.join("\t");
}

/**
 * Warning header followed by the raw flanking records
 */
export function formatThresholdWarning(event: ThresholdEvent): string[] {
  const lines = [`Warning: intron length ${event.gapLength} ${event.kind} threshold ${event.threshold}`];
  if (event.upstream !== undefined) lines.push(event.upstream.line);
  lines.push(event.downstream.line);
  return lines;
}

/**
 * Minimum and maximum gaps with the records around them. A block whose
 * extremum never moved off its initial value is left out.
 */
export function formatFlankingReport(stats: GlobalStats): string[] {
  return [
    ...flankBlock("Minimum", stats.minIntronLength, stats.minFlank),
    ...flankBlock("Maximum", stats.maxIntronLength, stats.maxFlank),
  ];
}

function flankBlock(label: string, length: number, flank: FlankPair | undefined): string[] {
  if (flank === undefined) return [];
  return [`${label} intron length: ${length}`, flank.upstream.line, flank.downstream.line];
}
