/**
 * Full outer join of delimited tables on their first column
 */

import { type } from "arktype";
import { JoinError, ValidationError } from "../errors";
import type { NamedTable, OuterJoinOptions, TableOutput } from "./types";

const OuterJoinOptionsSchema = type({
  "placeholder?": "string",
});

/**
 * Join two or more tables on their first column
 *
 * The output header is the first table's key column name followed by every
 * table's non-key columns in argument order. Rows cover the union of keys,
 * sorted by plain string comparison; a table without a key contributes
 * placeholder cells.
 *
 * @throws {JoinError} On fewer than two tables, a headerless table, a row
 * whose width differs from its header, or a key repeated within one table
 *
 * @example
 * ```typescript
 * outerJoin([
 *   { name: "a.tsv", header: ["gene", "x"], rows: [{ fields: ["g1", "1"], lineNumber: 2 }] },
 *   { name: "b.tsv", header: ["gene", "y"], rows: [{ fields: ["g2", "2"], lineNumber: 2 }] },
 * ]);
 * // header: ["gene", "x", "y"]; rows: [["g1", "1", "NA"], ["g2", "NA", "2"]]
 * ```
 */
export function outerJoin(tables: readonly NamedTable[], options: OuterJoinOptions = {}): TableOutput {
  const validationResult = OuterJoinOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid join options: ${validationResult.summary}`);
  }
  if (tables.length < 2) {
    throw new JoinError(`at least two tables are required, got ${tables.length}`);
  }
  const placeholder = options.placeholder ?? "NA";

  const indexed = tables.map(indexTable);
  const [first] = tables;
  const header = [first?.header[0] ?? "", ...tables.flatMap((table) => table.header.slice(1))];

  const keys = new Set<string>();
  for (const index of indexed) {
    for (const key of index.keys()) keys.add(key);
  }
  const sortedKeys = [...keys].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const rows = sortedKeys.map((key) => [
    key,
    ...tables.flatMap((table, i) => {
      const values = indexed[i]?.get(key);
      return values ?? Array.from({ length: table.header.length - 1 }, () => placeholder);
    }),
  ]);

  return { header, rows };
}

/**
 * Key → non-key cells for one table
 */
function indexTable(table: NamedTable): Map<string, string[]> {
  if (table.header.length === 0) {
    throw new JoinError("table has no header line", table.name);
  }

  const index = new Map<string, string[]>();
  for (const { fields, lineNumber } of table.rows) {
    if (fields.length !== table.header.length) {
      throw new JoinError(
        `line ${lineNumber} has ${fields.length} fields, header has ${table.header.length}`,
        table.name,
        lineNumber
      );
    }
    const [key = "", ...values] = fields;
    if (index.has(key)) {
      throw new JoinError(`duplicate key '${key}' on line ${lineNumber}`, table.name, lineNumber);
    }
    index.set(key, values);
  }
  return index;
}

/**
 * Render a table as tab-separated lines, header first
 */
export function formatTable(table: TableOutput, delimiter = "\t"): string[] {
  return [table.header, ...table.rows].map((fields) => fields.join(delimiter));
}
