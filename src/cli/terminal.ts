import { Readable } from "node:stream";

/**
 * Where a command reads and writes; the process streams by default,
 * in-memory buffers in tests
 */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  stdin(): ReadableStream<Uint8Array>;
}

export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
  stdin: () => Readable.toWeb(process.stdin),
};
