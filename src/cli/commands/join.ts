import { Command } from "commander";
import { DelimitedParser } from "../../formats/dsv";
import { formatTable, outerJoin } from "../../operations/join";
import type { NamedTable } from "../../operations/types";
import { resolveSources } from "../inputs";
import type { CliIO } from "../terminal";

type JoinFlags = {
  placeholder: string;
};

export function joinCommand(io: CliIO): Command {
  return new Command("join")
    .description("Full outer join of tab-separated tables on their first column")
    .argument("<files...>", "Two or more tables with a header line")
    .option("--placeholder <text>", "Value for cells a table has no row for", "NA")
    .action(async (files: string[], options: JoinFlags) => {
      const parser = new DelimitedParser();
      const tables: NamedTable[] = [];
      for (const source of resolveSources(files, io)) {
        tables.push(await parser.readSource(source));
      }

      const joined = outerJoin(tables, { placeholder: options.placeholder });
      for (const line of formatTable(joined)) io.stdout(line);
    });
}
