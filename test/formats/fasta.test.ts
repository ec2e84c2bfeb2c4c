/**
 * Tests for FASTA format parsing and writing
 */

import { describe, expect, test } from "vitest";
import { ParseError, ValidationError } from "../../src/errors";
import { FastaParser, FastaWriter } from "../../src/formats/fasta";
import { collect, streamOf } from "../utils/helpers";

describe("FastaParser", () => {
  const parser = new FastaParser();

  test("should parse simple FASTA sequence", async () => {
    const sequences = await collect(parser.parseString(">seq1\nATCG"));

    expect(sequences).toEqual([
      { format: "fasta", id: "seq1", sequence: "ATCG", length: 4, lineNumber: 1 },
    ]);
  });

  test("should split identifier and description", async () => {
    const [seq] = await collect(parser.parseString(">seq1  Sample sequence description\nATCG"));

    expect(seq?.id).toBe("seq1");
    expect(seq?.description).toBe("Sample sequence description");
  });

  test("should join multiline sequences and skip blank lines", async () => {
    const sequences = await collect(parser.parseString(">a\nATCG\n\nAT CG\n>b\n\nGG\n"));

    expect(sequences.map((s) => [s.id, s.sequence, s.lineNumber])).toEqual([
      ["a", "ATCGATCG", 1],
      ["b", "GG", 5],
    ]);
  });

  test("should keep records with no sequence", async () => {
    const sequences = await collect(parser.parseString(">empty\n>next\nA"));

    expect(sequences.map((s) => s.length)).toEqual([0, 1]);
  });

  test("should parse from a chunked byte stream", async () => {
    const sequences = await collect(parser.parse(streamOf(">x\r\nAC\r\nGT\r\n", 3)));

    expect(sequences[0]?.sequence).toBe("ACGT");
  });

  test("should warn on sequence before the first header", async () => {
    const warnings: string[] = [];
    const lenient = new FastaParser({ onWarning: (w) => warnings.push(w) });
    const sequences = await collect(lenient.parseString("ACGT\n>s\nA"));

    expect(sequences).toHaveLength(1);
    expect(warnings).toEqual(["sequence data before the first header; line skipped"]);
  });

  test("should reject a header without identifier in strict mode", async () => {
    const strict = new FastaParser({ strict: true });
    await expect(collect(strict.parseString(">\nACGT"))).rejects.toThrow(ParseError);
  });
});

describe("FastaWriter", () => {
  test("should wrap at 60 by default", () => {
    const sequence = "A".repeat(61);
    const text = new FastaWriter().formatSequence({ id: "s", sequence });

    expect(text).toBe(`>s\n${"A".repeat(60)}\nA\n`);
  });

  test("should wrap at a custom width", () => {
    const text = new FastaWriter({ lineWidth: 4 }).formatSequence({ id: "chr1", sequence: "ACGTAC" });
    expect(text).toBe(">chr1\nACGT\nAC\n");
  });

  test("should write one line when width is 0", () => {
    const writer = new FastaWriter({ lineWidth: 0 });
    expect(writer.formatSequence({ id: "chr1", sequence: "ACGTAC" })).toBe(">chr1\nACGTAC\n");
  });

  test("should include or drop the description", () => {
    const seq = { id: "chr1", description: "assembled", sequence: "AC" };

    expect(new FastaWriter().formatSequence(seq)).toBe(">chr1 assembled\nAC\n");
    expect(new FastaWriter({ includeDescription: false }).formatSequence(seq)).toBe(">chr1\nAC\n");
  });

  test("should format several records", () => {
    const text = new FastaWriter().formatSequences([
      { id: "a", sequence: "A" },
      { id: "b", sequence: "" },
    ]);
    expect(text).toBe(">a\nA\n>b\n");
  });

  test("should reject a negative width", () => {
    expect(() => new FastaWriter({ lineWidth: -1 })).toThrow(ValidationError);
  });
});
