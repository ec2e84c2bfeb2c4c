/**
 * Argument helpers shared by the commands
 */

import { ValidationError } from "../errors";
import type { AbstractParser } from "../formats/abstract-parser";
import { openSource } from "../io/input";
import { isStdinPath } from "../io/runtime";
import type { InputSource } from "../types";
import type { CliIO } from "./terminal";

/**
 * File arguments as input sources; none means standard input
 */
export function resolveSources(files: readonly string[], io: CliIO): InputSource[] {
  const paths = files.length === 0 ? ["-"] : files;
  return paths.map((path) => (isStdinPath(path) ? { name: "<stdin>", stream: io.stdin() } : path));
}

/**
 * Records of every source in order, through one parser
 */
export async function* parseSources<T>(
  parser: Pick<AbstractParser<T>, "parse">,
  sources: readonly InputSource[]
): AsyncIterable<T> {
  for (const source of sources) {
    const { stream } = await openSource(source);
    yield* parser.parse(stream);
  }
}

/**
 * Parse a non-negative decimal integer argument
 *
 * @throws {ValidationError} On anything else
 */
export function parseCount(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${name} must be a non-negative integer, got '${value}'`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${name} is too large: ${value}`);
  }
  return parsed;
}

/**
 * Parser warning sink writing `FORMAT Warning (line N): message` to stderr
 */
export function warningsTo(io: CliIO, format: string): (warning: string, lineNumber?: number) => void {
  return (warning, lineNumber) => {
    io.stderr(
      lineNumber === undefined
        ? `${format} Warning: ${warning}`
        : `${format} Warning (line ${lineNumber}): ${warning}`
    );
  };
}
