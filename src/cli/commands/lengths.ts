import { Command } from "commander";
import { FastaParser } from "../../formats/fasta";
import { sequenceLengths } from "../../operations/lengths";
import { parseSources, resolveSources, warningsTo } from "../inputs";
import type { CliIO } from "../terminal";

export function lengthsCommand(io: CliIO): Command {
  return new Command("lengths")
    .description("Print id and length of every FASTA record")
    .argument("[files...]", "FASTA files (none or - for stdin)")
    .action(async (files: string[]) => {
      const parser = new FastaParser({ onWarning: warningsTo(io, "FASTA") });
      const records = parseSources(parser, resolveSources(files, io));
      for await (const line of sequenceLengths(records)) io.stdout(line);
    });
}
