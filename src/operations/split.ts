/**
 * Split utilities - cut sequences into near-equal pieces
 *
 * Each piece is written as its own FASTA file named after the record and
 * the piece number.
 */

import { type } from "arktype";
import { SplitError, ValidationError } from "../errors";
import { FastaWriter } from "../formats/fasta";
import { writeString } from "../io/file-writer";
import type { FastaSequence } from "../types";
import type { SplitOptions, SplitPiece } from "./types";

const SplitOptionsSchema = type({
  parts: "number.integer",
  outputDir: "string>0",
  "lineWidth?": "number.integer>=0",
});

/**
 * Piece lengths for a sequence of `length` bases cut into `parts`
 *
 * The first `length % parts` pieces are one base longer.
 *
 * @example
 * ```typescript
 * partitionLengths(10, 3); // [4, 3, 3]
 * ```
 */
export function partitionLengths(length: number, parts: number): number[] {
  if (!Number.isInteger(parts) || parts < 1) {
    throw new ValidationError(`parts must be a positive integer, got ${parts}`);
  }
  const base = Math.floor(length / parts);
  const remainder = length % parts;
  return Array.from({ length: parts }, (_, i) => (i < remainder ? base + 1 : base));
}

/**
 * Cut one sequence and write `<outputDir>/<id>_<n>.fa` for n = 1..parts
 *
 * @throws {SplitError} If `parts < 1` or `parts` exceeds the sequence length
 * @throws {FileError} When a piece cannot be written
 */
export async function splitSequence(
  sequence: Pick<FastaSequence, "id" | "sequence">,
  options: SplitOptions
): Promise<SplitPiece[]> {
  const validationResult = SplitOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid split options: ${validationResult.summary}`);
  }

  const { parts } = options;
  const length = sequence.sequence.length;
  if (parts < 1) {
    throw new SplitError(`cannot split into ${parts} parts`, sequence.id, parts);
  }
  if (parts > length) {
    throw new SplitError(
      `cannot split ${length} bases into ${parts} parts`,
      sequence.id,
      parts
    );
  }

  const writer = new FastaWriter({ lineWidth: options.lineWidth ?? 60 });
  const outputDir = options.outputDir.replace(/\/+$/, "") || "/";
  const pieces: SplitPiece[] = [];

  let offset = 0;
  for (const [i, pieceLength] of partitionLengths(length, parts).entries()) {
    const id = `${sequence.id}_${i + 1}`;
    const outputFile = outputDir === "/" ? `/${id}.fa` : `${outputDir}/${id}.fa`;
    const residues = sequence.sequence.slice(offset, offset + pieceLength);

    await writeString(outputFile, writer.formatSequence({ id, sequence: residues }));
    pieces.push({ id, start: offset + 1, end: offset + pieceLength, outputFile });
    offset += pieceLength;
  }

  return pieces;
}

/**
 * Split every sequence in a stream
 */
export async function* splitSequences(
  sequences: AsyncIterable<FastaSequence>,
  options: SplitOptions
): AsyncIterable<SplitPiece> {
  for await (const sequence of sequences) {
    yield* await splitSequence(sequence, options);
  }
}
