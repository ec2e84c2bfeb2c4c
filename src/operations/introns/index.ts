/**
 * Intron-length scanning
 *
 * @module introns
 */

export {
  detectThresholdEvents,
  GlobalStatsAggregator,
  initialTranscript,
  isTranscriptBoundary,
  measureGap,
  reduceTranscript,
} from "./reducer";
export { formatFlankingReport, formatIntronSummary, formatThresholdWarning } from "./report";
export { IntronScanner, scanIntrons } from "./scanner";
export type {
  FlankPair,
  GapObservation,
  GlobalStats,
  IntronScanOptions,
  IntronScanResult,
  ThresholdEvent,
  TranscriptAggregate,
  TranscriptAnchor,
} from "./types";
export { MIN_INTRON_SENTINEL, TRANSCRIPT_BOUNDARY_TYPES } from "./types";
