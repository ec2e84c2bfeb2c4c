import { Command } from "commander";
import { averageCommand } from "./commands/average";
import { intronsCommand } from "./commands/introns";
import { joinCommand } from "./commands/join";
import { lengthsCommand } from "./commands/lengths";
import { splitCommand } from "./commands/split";
import { trimTailCommand } from "./commands/trim-tail";
import { type CliIO, processIO } from "./terminal";

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("genefilters")
    .description("Streaming filters over genome annotation and sequence files")
    .version("0.1.0");

  program.addCommand(intronsCommand(io));
  program.addCommand(trimTailCommand(io));
  program.addCommand(joinCommand(io));
  program.addCommand(averageCommand(io));
  program.addCommand(lengthsCommand(io));
  program.addCommand(splitCommand(io));

  return program;
}
