/**
 * Delimited table types
 */

import type { ParserOptions } from "../../types";

/**
 * Field delimiter; any single character is accepted
 */
export type DelimiterType = "\t" | "," | "|" | ";" | (string & {});

/**
 * One data row with the line it came from
 */
export interface DelimitedRow {
  fields: string[];
  lineNumber: number;
}

/**
 * A whole table: the header fields and every data row in file order
 *
 * Rows are not checked against the header width; callers decide what a
 * mismatch means.
 */
export interface DelimitedTable {
  header: string[];
  rows: DelimitedRow[];
}

/**
 * Delimited parser options
 */
export interface DelimitedParserOptions extends ParserOptions {
  /** Field delimiter (default tab) */
  delimiter?: DelimiterType;
}
