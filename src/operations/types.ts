/**
 * Shared types for the table and sequence utilities
 */

import type { DelimitedTable } from "../formats/dsv";

/**
 * Streaming transformation over records
 *
 * @template TOptions - Options the processor takes per run
 * @template TIn - Record type consumed
 * @template TOut - Record type produced
 */
export interface Processor<TOptions, TIn, TOut = TIn> {
  process(source: AsyncIterable<TIn>, options: TOptions): AsyncIterable<TOut>;
}

/**
 * Options for trimming a sentinel run off the end of the quality string
 */
export interface TailTrimOptions {
  /** Quality character marking the tail to strip (default "B") */
  sentinel?: string;
  /** Drop reads shorter than this after trimming (default 0) */
  minLength?: number;
}

/**
 * Read and base counts before and after tail trimming
 */
export interface TrimStats {
  readsIn: number;
  basesIn: number;
  readsOut: number;
  basesOut: number;
}

/**
 * A delimited table together with the name it was read from
 */
export interface NamedTable extends DelimitedTable {
  name: string;
}

/**
 * Table produced by join and average: a header and plain rows
 */
export interface TableOutput {
  header: string[];
  rows: string[][];
}

/**
 * Outer-join options
 */
export interface OuterJoinOptions {
  /** Cell value for keys a table lacks (default "NA") */
  placeholder?: string;
}

/**
 * Options for cutting sequences into near-equal pieces
 */
export interface SplitOptions {
  /** Number of pieces per sequence */
  parts: number;
  /** Directory receiving `<id>_<n>.fa` files */
  outputDir: string;
  /** Residues per FASTA line in the written pieces (default 60) */
  lineWidth?: number;
}

/**
 * One written piece of a split sequence
 */
export interface SplitPiece {
  id: string;
  start: number;
  end: number;
  outputFile: string;
}
