import { Command } from "commander";
import { DelimitedParser } from "../../formats/dsv";
import { averageColumns } from "../../operations/average";
import { formatTable } from "../../operations/join";
import type { NamedTable } from "../../operations/types";
import { resolveSources } from "../inputs";
import type { CliIO } from "../terminal";

export function averageCommand(io: CliIO): Command {
  return new Command("average")
    .description("Cell-wise mean across tab-separated tables of the same shape")
    .argument("<files...>", "Tables with identical headers and row labels")
    .action(async (files: string[]) => {
      const parser = new DelimitedParser();
      const tables: NamedTable[] = [];
      for (const source of resolveSources(files, io)) {
        tables.push(await parser.readSource(source));
      }

      for (const line of formatTable(averageColumns(tables))) io.stdout(line);
    });
}
