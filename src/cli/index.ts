import { createProgram } from "./program";
import { writeStderr } from "./terminal";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    writeStderr(`error: ${message}`);
    process.exit(1);
  });
