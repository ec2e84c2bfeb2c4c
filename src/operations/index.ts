/**
 * Operations: intron scanning plus the small table and sequence utilities
 */

export * from "./introns";
export { averageColumns } from "./average";
export { formatTable, outerJoin } from "./join";
export { sequenceLengths } from "./lengths";
export { partitionLengths, splitSequence, splitSequences } from "./split";
export { formatTrimStats, sentinelTailLength, TailTrimProcessor, trimQualityTail } from "./trim";
export type {
  NamedTable,
  OuterJoinOptions,
  Processor,
  SplitOptions,
  SplitPiece,
  TableOutput,
  TailTrimOptions,
  TrimStats,
} from "./types";
