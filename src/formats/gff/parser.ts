/**
 * GFF3 feature reader
 *
 * Lenient by default: annotation files from real pipelines carry stray
 * columns, missing attribute fields and odd strand symbols, and the
 * downstream scanners only need type, coordinates and strand. Anything the
 * reader cannot use is reported through `onWarning` and skipped; `strict`
 * turns the same conditions into ParseErrors. A skipped line whose type is
 * still readable comes out of `parseInputEntries` as an UnplacedFeature, so
 * transcript boundaries survive broken coordinates.
 *
 * @module gff/parser
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { InputLine, Strand } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { AnnotationRecord, GffEntry, GffParserOptions, UnplacedFeature } from "./types";
import { GFF_LIMITS } from "./types";

const GffParserOptionsSchema = type({
  "strict?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "includeFeatures?": "string[]",
  "signal?": "unknown",
  "onWarning?": "Function",
});

/**
 * Decode a GFF3 attribute column into tag → values
 *
 * Values are comma-separated lists and percent-encoded per GFF3; a value
 * that fails to decode is kept as written.
 *
 * @example
 * ```typescript
 * parseGffAttributes("ID=mRNA1;Parent=gene1;Note=a%3Bb");
 * // { ID: ["mRNA1"], Parent: ["gene1"], Note: ["a;b"] }
 * ```
 *
 * @public
 */
export function parseGffAttributes(raw: string): Record<string, string[]> {
  const attributes: Record<string, string[]> = {};

  for (const part of raw.split(";")) {
    const trimmed = part.trim();
    if (trimmed === "") continue;

    const separator = trimmed.indexOf("=");
    if (separator <= 0) continue;

    const key = decodeField(trimmed.slice(0, separator));
    const values = trimmed
      .slice(separator + 1)
      .split(",")
      .map(decodeField);
    attributes[key] = [...(attributes[key] ?? []), ...values];
  }

  return attributes;
}

/**
 * Strand column to Strand; "?" (relevant but unknown) reads as "."
 *
 * @public
 */
export function parseGffStrand(strandStr: string): Strand | undefined {
  if (strandStr === "+" || strandStr === "-" || strandStr === ".") return strandStr;
  if (strandStr === "?") return ".";
  return undefined;
}

/**
 * Whether an entry is a line the reader could not place
 *
 * @public
 */
export function isUnplaced(entry: GffEntry): entry is UnplacedFeature {
  return "unplaced" in entry;
}

/**
 * Whether a line carries no feature: blank, comment or pragma
 *
 * @public
 */
export function isGffCommentOrBlank(line: string): boolean {
  return line.trim() === "" || line.startsWith("#");
}

/**
 * Streaming GFF3 parser
 *
 * @example
 * ```typescript
 * const parser = new GffParser({ includeFeatures: ["CDS"] });
 * for await (const cds of parser.parseFile("annotation.gff3")) {
 *   console.log(`${cds.sequenceId}:${cds.start}-${cds.end} (${cds.strand})`);
 * }
 * ```
 *
 * @public
 */
export class GffParser extends AbstractParser<AnnotationRecord, GffParserOptions> {
  constructor(options: GffParserOptions = {}) {
    const validationResult = GffParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid GFF3 parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "GFF3";
  }

  /**
   * Parse features from a sequence of lines. A `##FASTA` pragma ends the
   * feature section.
   */
  async *parseLines(lines: AsyncIterable<string>): AsyncIterable<AnnotationRecord> {
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();
      if (line.startsWith("##FASTA")) return;

      const record = this.parseLine(line, lineNumber);
      if (record !== null && this.isIncluded(record)) yield record;
    }
  }

  /**
   * Parse features from concatenated multi-file input. Warnings name the
   * source the line came from, and `##FASTA` ends only its own source.
   */
  async *parseInputLines(lines: AsyncIterable<InputLine>): AsyncIterable<AnnotationRecord> {
    for await (const entry of this.parseInputEntries(lines)) {
      if (!isUnplaced(entry)) yield entry;
    }
  }

  /**
   * Like parseInputLines, but also yields the lines skipped for missing
   * columns or bad coordinates whose feature type could still be read
   */
  async *parseInputEntries(lines: AsyncIterable<InputLine>): AsyncIterable<GffEntry> {
    let sequenceSectionOf: string | undefined;
    for await (const { text, source, lineNumber } of lines) {
      this.checkAborted();
      if (source === sequenceSectionOf) continue;
      if (text.startsWith("##FASTA")) {
        sequenceSectionOf = source;
        continue;
      }

      const entry = this.parseEntry(text, lineNumber, source);
      if (entry !== null && this.isIncluded(entry)) yield entry;
    }
  }

  /**
   * Parse one line. Returns null for comments, blank lines and lines the
   * lenient reader had to skip.
   *
   * @throws {ParseError} In strict mode, for any malformed field
   */
  parseLine(line: string, lineNumber: number, source?: string): AnnotationRecord | null {
    const entry = this.parseEntry(line, lineNumber, source);
    return entry === null || isUnplaced(entry) ? null : entry;
  }

  private parseEntry(line: string, lineNumber: number, source?: string): GffEntry | null {
    if (isGffCommentOrBlank(line)) return null;

    const where = source === undefined ? "" : `${source}: `;
    const fields = line.split("\t");
    const [sequenceId = "", annotationSource = "", featureType = "", startStr = "", endStr = ""] = fields;
    const unplaced = (): UnplacedFeature | null =>
      fields.length < GFF_LIMITS.MIN_TYPED_FIELDS || featureType === ""
        ? null
        : {
            unplaced: true,
            featureType,
            line,
            ...(this.options.trackLineNumbers && { lineNumber }),
          };

    if (fields.length < GFF_LIMITS.MIN_USABLE_FIELDS) {
      this.reportAnomaly(
        `${where}feature line has ${fields.length} tab-separated fields, expected ${GFF_LIMITS.FIELD_COUNT}; line skipped`,
        lineNumber,
        line
      );
      return unplaced();
    }
    if (fields.length !== GFF_LIMITS.FIELD_COUNT) {
      this.reportAnomaly(
        `${where}feature line has ${fields.length} tab-separated fields, expected ${GFF_LIMITS.FIELD_COUNT}`,
        lineNumber,
        line
      );
    }

    const start = parseCoordinate(startStr);
    const end = parseCoordinate(endStr);
    if (start === undefined || end === undefined) {
      this.reportAnomaly(
        `${where}invalid coordinates start=${startStr} end=${endStr}; line skipped`,
        lineNumber,
        line
      );
      return unplaced();
    }
    if (start > end) {
      this.reportAnomaly(`${where}start ${start} is greater than end ${end}`, lineNumber, line);
    }

    return {
      sequenceId,
      source: annotationSource,
      featureType,
      start,
      end,
      score: this.parseScore(fields[5] ?? ".", lineNumber, where),
      strand: this.parseStrand(fields[6] ?? ".", lineNumber, where),
      phase: this.parsePhase(fields[7] ?? ".", lineNumber, where),
      attributes: fields[8] ?? "",
      line,
      ...(this.options.trackLineNumbers && { lineNumber }),
    };
  }

  private isIncluded(entry: GffEntry): boolean {
    const { includeFeatures } = this.options;
    return includeFeatures === undefined || includeFeatures.includes(entry.featureType);
  }

  private parseStrand(strandStr: string, lineNumber: number, where: string): Strand {
    const strand = parseGffStrand(strandStr);
    if (strand !== undefined) return strand;
    this.reportAnomaly(`${where}invalid strand '${strandStr}', read as '.'`, lineNumber);
    return ".";
  }

  private parseScore(scoreStr: string, lineNumber: number, where: string): number | null {
    if (scoreStr === "." || scoreStr === "") return null;
    const score = Number(scoreStr);
    if (Number.isNaN(score)) {
      this.reportAnomaly(`${where}invalid score '${scoreStr}'`, lineNumber);
      return null;
    }
    return score;
  }

  private parsePhase(phaseStr: string, lineNumber: number, where: string): number | null {
    if (phaseStr === "." || phaseStr === "") return null;
    if (phaseStr === "0" || phaseStr === "1" || phaseStr === "2") return Number(phaseStr);
    this.reportAnomaly(`${where}invalid phase '${phaseStr}' (must be 0, 1, 2, or '.')`, lineNumber);
    return null;
  }
}

function parseCoordinate(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function decodeField(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
