/**
 * Tests for GFF3 feature reading
 */

import { describe, expect, test } from "vitest";
import { ParseError, ValidationError } from "../../src/errors";
import {
  GffParser,
  isGffCommentOrBlank,
  isUnplaced,
  parseGffAttributes,
  parseGffStrand,
} from "../../src/formats/gff";
import { linesOf } from "../../src/io/stream-utils";
import type { InputLine } from "../../src/types";
import { collect, fromArray } from "../utils/helpers";

const EXON = "chr1\tHAVANA\texon\t100\t200\t.\t+\t.\tID=exon1;Parent=tx1";

function lenient(): { parser: GffParser; warnings: string[] } {
  const warnings: string[] = [];
  const parser = new GffParser({ onWarning: (warning) => warnings.push(warning) });
  return { parser, warnings };
}

describe("parseGffAttributes", () => {
  test("splits tags and comma-separated values", () => {
    expect(parseGffAttributes("ID=mRNA1;Parent=gene1,gene2")).toEqual({
      ID: ["mRNA1"],
      Parent: ["gene1", "gene2"],
    });
  });

  test("percent-decodes values and ignores malformed parts", () => {
    expect(parseGffAttributes("Note=a%3Bb; ;novalue;=x;Bad=%E0")).toEqual({
      Note: ["a;b"],
      Bad: ["%E0"],
    });
  });

  test("empty and placeholder columns give no attributes", () => {
    expect(parseGffAttributes("")).toEqual({});
    expect(parseGffAttributes(".")).toEqual({});
  });
});

describe("GFF3 helpers", () => {
  test("strand symbols", () => {
    expect(parseGffStrand("+")).toBe("+");
    expect(parseGffStrand("-")).toBe("-");
    expect(parseGffStrand("?")).toBe(".");
    expect(parseGffStrand("x")).toBeUndefined();
  });

  test("comments and blank lines", () => {
    expect(isGffCommentOrBlank("##gff-version 3")).toBe(true);
    expect(isGffCommentOrBlank("   ")).toBe(true);
    expect(isGffCommentOrBlank(EXON)).toBe(false);
  });
});

describe("GffParser", () => {
  test("parses a feature line", async () => {
    const [record] = await collect(new GffParser().parseString(`##gff-version 3\n${EXON}\n`));

    expect(record).toEqual({
      sequenceId: "chr1",
      source: "HAVANA",
      featureType: "exon",
      start: 100,
      end: 200,
      score: null,
      strand: "+",
      phase: null,
      attributes: "ID=exon1;Parent=tx1",
      line: EXON,
      lineNumber: 2,
    });
  });

  test("reads score and phase", async () => {
    const line = "chr1\tsrc\tCDS\t1\t9\t0.5\t-\t2\tID=c1";
    const [record] = await collect(new GffParser().parseString(line));

    expect(record?.score).toBe(0.5);
    expect(record?.phase).toBe(2);
    expect(record?.strand).toBe("-");
  });

  test("line numbers can be left out", async () => {
    const [record] = await collect(new GffParser({ trackLineNumbers: false }).parseString(EXON));
    expect(record?.lineNumber).toBeUndefined();
  });

  test("skips short lines with a warning", async () => {
    const { parser, warnings } = lenient();
    const records = await collect(parser.parseString(`chr1\tsrc\texon\t1\n${EXON}`));

    expect(records).toHaveLength(1);
    expect(warnings).toEqual([
      "feature line has 4 tab-separated fields, expected 9; line skipped",
    ]);
  });

  test("keeps eight-field lines with a warning", async () => {
    const { parser, warnings } = lenient();
    const records = await collect(parser.parseString("chr1\tsrc\texon\t1\t9\t.\t+\t."));

    expect(records).toHaveLength(1);
    expect(records[0]?.attributes).toBe("");
    expect(warnings).toEqual(["feature line has 8 tab-separated fields, expected 9"]);
  });

  test("skips non-numeric coordinates", async () => {
    const { parser, warnings } = lenient();
    const records = await collect(parser.parseString("chr1\tsrc\texon\t1e3\t9\t.\t+\t.\t."));

    expect(records).toEqual([]);
    expect(warnings).toEqual(["invalid coordinates start=1e3 end=9; line skipped"]);
  });

  test("keeps reversed coordinates with a warning", async () => {
    const { parser, warnings } = lenient();
    const records = await collect(parser.parseString("chr1\tsrc\texon\t50\t10\t.\t+\t.\t."));

    expect(records[0]?.start).toBe(50);
    expect(warnings).toEqual(["start 50 is greater than end 10"]);
  });

  test("unknown strand reads as unstranded", async () => {
    const { parser, warnings } = lenient();
    const [record] = await collect(parser.parseString("chr1\tsrc\texon\t1\t9\t.\tx\t.\t."));

    expect(record?.strand).toBe(".");
    expect(warnings).toEqual(["invalid strand 'x', read as '.'"]);
  });

  test("strict mode turns anomalies into ParseError", async () => {
    const parser = new GffParser({ strict: true });
    await expect(collect(parser.parseString("chr1\tsrc\texon\t1\n"))).rejects.toThrow(ParseError);
  });

  test("##FASTA ends the feature section", async () => {
    const records = await collect(new GffParser().parseString(`${EXON}\n##FASTA\n>chr1\nACGT`));
    expect(records).toHaveLength(1);
  });

  test("includeFeatures filters by type", async () => {
    const cds = "chr1\tsrc\tCDS\t120\t180\t.\t+\t0\tParent=tx1";
    const parser = new GffParser({ includeFeatures: ["CDS"] });
    const records = await collect(parser.parseLines(linesOf(`${EXON}\n${cds}`)));

    expect(records.map((r) => r.featureType)).toEqual(["CDS"]);
  });

  test("rejects invalid options", () => {
    expect(() => new GffParser({ maxLineLength: 0 })).toThrow(ValidationError);
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const parser = new GffParser({ signal: controller.signal });

    await expect(collect(parser.parseString(EXON))).rejects.toThrow("GFF3 parsing was aborted");
  });
});

describe("GffParser.parseInputLines", () => {
  test("##FASTA only ends its own source", async () => {
    const lines: InputLine[] = [
      { text: EXON, source: "a.gff3", lineNumber: 1 },
      { text: "##FASTA", source: "a.gff3", lineNumber: 2 },
      { text: "ACGT", source: "a.gff3", lineNumber: 3 },
      { text: EXON, source: "b.gff3", lineNumber: 1 },
    ];
    const records = await collect(new GffParser().parseInputLines(fromArray(lines)));

    expect(records).toHaveLength(2);
    expect(records[1]?.lineNumber).toBe(1);
  });

  test("warnings name the source", async () => {
    const warnings: string[] = [];
    const parser = new GffParser({ onWarning: (warning) => warnings.push(warning) });
    const lines: InputLine[] = [{ text: "chr1\tsrc", source: "b.gff3", lineNumber: 7 }];
    await collect(parser.parseInputLines(fromArray(lines)));

    expect(warnings).toEqual([
      "b.gff3: feature line has 2 tab-separated fields, expected 9; line skipped",
    ]);
  });
});

describe("GffParser.parseInputEntries", () => {
  test("keeps the type of lines it cannot place", async () => {
    const lines: InputLine[] = [
      { text: "chr1\tsrc\tmRNA\t1000\t2000", source: "a.gff3", lineNumber: 1 },
      { text: "chr1\tsrc", source: "a.gff3", lineNumber: 2 },
      { text: "chr1\tsrc\tgene\t.\t.\t.\t+\t.\t.", source: "a.gff3", lineNumber: 3 },
      { text: EXON, source: "a.gff3", lineNumber: 4 },
    ];
    const entries = await collect(new GffParser({ onWarning: () => {} }).parseInputEntries(fromArray(lines)));

    expect(entries.map(isUnplaced)).toEqual([true, true, false]);
    expect(entries[0]).toEqual({
      unplaced: true,
      featureType: "mRNA",
      line: "chr1\tsrc\tmRNA\t1000\t2000",
      lineNumber: 1,
    });
    expect(entries[1]?.featureType).toBe("gene");
  });

  test("parseInputLines leaves them out", async () => {
    const lines: InputLine[] = [
      { text: "chr1\tsrc\tmRNA\t1000\t2000", source: "a.gff3", lineNumber: 1 },
      { text: EXON, source: "a.gff3", lineNumber: 2 },
    ];
    const records = await collect(new GffParser({ onWarning: () => {} }).parseInputLines(fromArray(lines)));

    expect(records.map((record) => record.featureType)).toEqual(["exon"]);
  });

  test("includeFeatures applies to unplaced lines", async () => {
    const lines: InputLine[] = [{ text: "chr1\tsrc\tmRNA\t1000", source: "a.gff3", lineNumber: 1 }];
    const parser = new GffParser({ includeFeatures: ["exon"], onWarning: () => {} });

    expect(await collect(parser.parseInputEntries(fromArray(lines)))).toEqual([]);
  });
});
