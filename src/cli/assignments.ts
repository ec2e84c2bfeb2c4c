/**
 * Legacy `KEY=VALUE` configuration for the intron scanner
 *
 * Older wrappers invoke the scanner with assignments among the file
 * arguments, e.g. `introns TYPE=CDS WARN_INTRON_LESS_THAN=20 a.gff3`. A
 * threshold of 0 leaves the bound unset.
 */

import { ValidationError } from "../errors";
import type { IntronScanOptions } from "../operations/introns";
import { parseCount } from "./inputs";

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

export const ASSIGNMENT_KEYS = [
  "TYPE",
  "SHOW_FLANKING",
  "WARN_INTRON_LESS_THAN",
  "WARN_INTRON_GREATER_THAN",
] as const;

type AssignmentKey = (typeof ASSIGNMENT_KEYS)[number];

function isAssignmentKey(key: string): key is AssignmentKey {
  return ASSIGNMENT_KEYS.some((known) => known === key);
}

/**
 * Scanner settings that assignments and flags can set
 */
export type ScanSettings = Pick<
  IntronScanOptions,
  "featureType" | "reportFlanking" | "warnBelow" | "warnAbove"
>;

/**
 * Split positional arguments into assignments and input files
 *
 * @throws {ValidationError} On an unknown key or an invalid value
 *
 * @example
 * ```typescript
 * splitAssignments(["TYPE=CDS", "SHOW_FLANKING=1", "a.gff3"]);
 * // { settings: { featureType: "CDS", reportFlanking: true }, files: ["a.gff3"] }
 * ```
 */
export function splitAssignments(args: readonly string[]): { settings: ScanSettings; files: string[] } {
  const settings: ScanSettings = {};
  const files: string[] = [];

  for (const arg of args) {
    const match = ASSIGNMENT.exec(arg);
    if (match === null) {
      files.push(arg);
      continue;
    }
    const [, key = "", value = ""] = match;
    if (!isAssignmentKey(key)) {
      throw new ValidationError(
        `unknown setting '${key}' (expected one of ${ASSIGNMENT_KEYS.join(", ")})`
      );
    }
    applyAssignment(settings, key, value);
  }

  return { settings, files };
}

function applyAssignment(settings: ScanSettings, key: AssignmentKey, value: string): void {
  switch (key) {
    case "TYPE":
      if (value === "") throw new ValidationError("TYPE must not be empty");
      settings.featureType = value;
      break;
    case "SHOW_FLANKING":
      if (value !== "0" && value !== "1") {
        throw new ValidationError(`SHOW_FLANKING must be 0 or 1, got '${value}'`);
      }
      settings.reportFlanking = value === "1";
      break;
    case "WARN_INTRON_LESS_THAN":
      setThreshold(settings, "warnBelow", parseCount(key, value));
      break;
    case "WARN_INTRON_GREATER_THAN":
      setThreshold(settings, "warnAbove", parseCount(key, value));
      break;
  }
}

/**
 * Set or clear a bound; 0 clears it
 */
export function setThreshold(
  settings: ScanSettings,
  bound: "warnBelow" | "warnAbove",
  value: number
): void {
  if (value === 0) {
    delete settings[bound];
  } else {
    settings[bound] = value;
  }
}
