import { Command } from "commander";
import { FastqParser, FastqWriter } from "../../formats/fastq";
import { formatTrimStats, TailTrimProcessor } from "../../operations/trim";
import { parseCount, parseSources, resolveSources, warningsTo } from "../inputs";
import type { CliIO } from "../terminal";

type TrimTailFlags = {
  sentinel: string;
  minLength: string;
  stats?: boolean;
};

export function trimTailCommand(io: CliIO): Command {
  return new Command("trim-tail")
    .description("Strip the trailing run of a quality sentinel from FASTQ reads")
    .argument("[files...]", "FASTQ files (none or - for stdin)")
    .option("--sentinel <char>", "Quality character marking the tail", "B")
    .option("--min-length <length>", "Drop reads shorter than this after trimming", "0")
    .option("--stats", "Print read and base counts to stderr")
    .action(async (files: string[], options: TrimTailFlags) => {
      const parser = new FastqParser({ onWarning: warningsTo(io, "FASTQ") });
      const writer = new FastqWriter();
      const trimmer = new TailTrimProcessor();

      const reads = parseSources(parser, resolveSources(files, io));
      const trimOptions = {
        sentinel: options.sentinel,
        minLength: parseCount("--min-length", options.minLength),
      };
      for await (const read of trimmer.process(reads, trimOptions)) {
        io.stdout(writer.formatRecord(read).replace(/\n$/, ""));
      }

      if (options.stats === true) {
        for (const line of formatTrimStats(trimmer.stats)) io.stderr(line);
      }
    });
}
