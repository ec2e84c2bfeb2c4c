/**
 * Cell-wise mean across tables of identical shape
 */

import { ColumnAverageError } from "../errors";
import type { NamedTable, TableOutput } from "./types";

/**
 * Average every non-key cell across tables
 *
 * All tables must share the header, the row count and the first-column
 * value of every row. Output rows keep the first table's label and hold the
 * arithmetic mean of each remaining column.
 *
 * @throws {ColumnAverageError} When the tables do not line up or a cell is
 * not numeric
 *
 * @example
 * ```typescript
 * averageColumns([
 *   { name: "r1.tsv", header: ["id", "n"], rows: [{ fields: ["a", "1"], lineNumber: 2 }] },
 *   { name: "r2.tsv", header: ["id", "n"], rows: [{ fields: ["a", "2"], lineNumber: 2 }] },
 * ]).rows; // [["a", "1.5"]]
 * ```
 */
export function averageColumns(tables: readonly NamedTable[]): TableOutput {
  const [first, ...rest] = tables;
  if (first === undefined) {
    throw new ColumnAverageError("at least one table is required");
  }

  for (const table of rest) {
    if (table.header.join("\t") !== first.header.join("\t")) {
      throw new ColumnAverageError(`header differs from ${first.name}`, table.name);
    }
    if (table.rows.length !== first.rows.length) {
      throw new ColumnAverageError(
        `has ${table.rows.length} rows, ${first.name} has ${first.rows.length}`,
        table.name
      );
    }
  }

  const width = first.header.length;
  const rows = first.rows.map((row, r) => {
    const label = row.fields[0] ?? "";
    const sums = new Array<number>(Math.max(width - 1, 0)).fill(0);

    for (const table of tables) {
      const current = table.rows[r];
      if (current === undefined) continue;
      const { fields, lineNumber } = current;

      if (fields.length !== width) {
        throw new ColumnAverageError(
          `line ${lineNumber} has ${fields.length} fields, header has ${width}`,
          table.name,
          lineNumber
        );
      }
      if (fields[0] !== label) {
        throw new ColumnAverageError(
          `line ${lineNumber} is labelled '${fields[0] ?? ""}', expected '${label}'`,
          table.name,
          lineNumber
        );
      }

      for (let c = 1; c < width; c++) {
        const value = parseCell(fields[c] ?? "");
        if (value === undefined) {
          throw new ColumnAverageError(
            `line ${lineNumber} column ${c + 1}: '${fields[c] ?? ""}' is not a number`,
            table.name,
            lineNumber
          );
        }
        sums[c - 1] = (sums[c - 1] ?? 0) + value;
      }
    }

    return [label, ...sums.map((sum) => String(sum / tables.length))];
  });

  return { header: [...first.header], rows };
}

function parseCell(cell: string): number | undefined {
  if (cell.trim() === "") return undefined;
  const value = Number(cell);
  return Number.isFinite(value) ? value : undefined;
}
