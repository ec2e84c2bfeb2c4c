/**
 * GFF3 module exports
 *
 * @example
 * ```typescript
 * import { GffParser } from './formats/gff';
 *
 * const parser = new GffParser();
 * for await (const feature of parser.parseString(gff3Text)) {
 *   console.log(`${feature.sequenceId}:${feature.start}-${feature.end}`);
 * }
 * ```
 *
 * @module gff
 */

export {
  GffParser,
  isGffCommentOrBlank,
  isUnplaced,
  parseGffAttributes,
  parseGffStrand,
} from "./parser";

export type { AnnotationRecord, GffEntry, GffParserOptions, UnplacedFeature } from "./types";
export { GFF_LIMITS } from "./types";
