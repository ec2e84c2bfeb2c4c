/**
 * Delimited table module
 *
 * @module formats/dsv
 */

export { DelimitedParser } from "./parser";
export type { DelimitedParserOptions, DelimitedRow, DelimitedTable, DelimiterType } from "./types";
