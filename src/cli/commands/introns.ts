import { Command } from "commander";
import { GffParser } from "../../formats/gff";
import { readInputLines } from "../../io/input";
import { formatIntronSummary, IntronScanner } from "../../operations/introns";
import { type ScanSettings, setThreshold, splitAssignments } from "../assignments";
import { parseCount, resolveSources, warningsTo } from "../inputs";
import type { CliIO } from "../terminal";

type IntronsFlags = {
  type?: string;
  showFlanking?: boolean;
  warnBelow?: string;
  warnAbove?: string;
  cumulative: boolean;
  strict?: boolean;
};

export function intronsCommand(io: CliIO): Command {
  return new Command("introns")
    .description(
      "Report minimum, maximum and maximum cumulative intron length of GFF3 features"
    )
    .argument("[args...]", "KEY=VALUE settings and GFF3 files (none or - for stdin)")
    .option("--type <type>", "Feature type to measure gaps between (default exon)")
    .option("--show-flanking", "Print the records around the shortest and longest intron")
    .option("--warn-below <length>", "Warn on introns shorter than this (0 = off)")
    .option("--warn-above <length>", "Warn on introns longer than this (0 = off)")
    .option("--no-cumulative", "Leave the cumulative column out of the summary")
    .option("--strict", "Fail on malformed feature lines instead of skipping them")
    .action(async (args: string[], options: IntronsFlags) => {
      const { settings, files } = splitAssignments(args);
      applyFlags(settings, options);

      const parser = new GffParser({
        strict: options.strict ?? false,
        onWarning: warningsTo(io, "GFF3"),
      });
      const scanner = new IntronScanner({
        ...settings,
        includeCumulative: options.cumulative,
        onDiagnostic: io.stderr,
      });

      const lines = readInputLines(resolveSources(files, io));
      for await (const record of parser.parseInputEntries(lines)) {
        scanner.push(record);
      }

      const result = scanner.finish();
      io.stdout(formatIntronSummary(result, result.includeCumulative));
    });
}

/**
 * Flags win over assignments given in the same invocation
 */
function applyFlags(settings: ScanSettings, options: IntronsFlags): void {
  if (options.type !== undefined) settings.featureType = options.type;
  if (options.showFlanking !== undefined) settings.reportFlanking = options.showFlanking;
  if (options.warnBelow !== undefined) {
    setThreshold(settings, "warnBelow", parseCount("--warn-below", options.warnBelow));
  }
  if (options.warnAbove !== undefined) {
    setThreshold(settings, "warnAbove", parseCount("--warn-above", options.warnAbove));
  }
}
