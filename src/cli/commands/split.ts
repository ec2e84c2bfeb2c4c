import { Command } from "commander";
import { FastaParser } from "../../formats/fasta";
import { splitSequences } from "../../operations/split";
import { parseCount, parseSources, resolveSources, warningsTo } from "../inputs";
import type { CliIO } from "../terminal";

type SplitFlags = {
  outputDir: string;
  lineWidth: string;
};

export function splitCommand(io: CliIO): Command {
  return new Command("split")
    .description("Cut every FASTA record into near-equal pieces, one file per piece")
    .argument("<parts>", "Number of pieces per record")
    .argument("[files...]", "FASTA files (none or - for stdin)")
    .option("-o, --output-dir <dir>", "Directory for <id>_<n>.fa files", ".")
    .option("--line-width <width>", "Residues per line in written files (0 = one line)", "60")
    .action(async (parts: string, files: string[], options: SplitFlags) => {
      const parser = new FastaParser({ onWarning: warningsTo(io, "FASTA") });
      const records = parseSources(parser, resolveSources(files, io));
      const splitOptions = {
        parts: parseCount("parts", parts),
        outputDir: options.outputDir,
        lineWidth: parseCount("--line-width", options.lineWidth),
      };

      for await (const piece of splitSequences(records, splitOptions)) {
        io.stdout(`${piece.id}\t${piece.start}\t${piece.end}\t${piece.outputFile}`);
      }
    });
}
