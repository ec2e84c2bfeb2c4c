/**
 * Tests for legacy KEY=VALUE settings
 */

import { describe, expect, test } from "vitest";
import { setThreshold, splitAssignments } from "../../src/cli/assignments";
import { ValidationError } from "../../src/errors";

describe("splitAssignments", () => {
  test("separates settings from files", () => {
    expect(splitAssignments(["TYPE=CDS", "a.gff3", "SHOW_FLANKING=1", "-"])).toEqual({
      settings: { featureType: "CDS", reportFlanking: true },
      files: ["a.gff3", "-"],
    });
  });

  test("thresholds parse as integers and 0 leaves them unset", () => {
    const { settings } = splitAssignments([
      "WARN_INTRON_LESS_THAN=20",
      "WARN_INTRON_GREATER_THAN=0",
    ]);
    expect(settings).toEqual({ warnBelow: 20 });
  });

  test("a later 0 clears an earlier threshold", () => {
    const { settings } = splitAssignments(["WARN_INTRON_LESS_THAN=20", "WARN_INTRON_LESS_THAN=0"]);
    expect(settings).toEqual({});
  });

  test("paths that only contain '=' after a slash stay files", () => {
    expect(splitAssignments(["data/run=1.gff3"]).files).toEqual(["data/run=1.gff3"]);
  });

  test("rejects unknown keys", () => {
    expect(() => splitAssignments(["COLOR=red"])).toThrow(
      "unknown setting 'COLOR' (expected one of TYPE, SHOW_FLANKING, WARN_INTRON_LESS_THAN, WARN_INTRON_GREATER_THAN)"
    );
  });

  test("rejects bad values", () => {
    expect(() => splitAssignments(["SHOW_FLANKING=yes"])).toThrow(ValidationError);
    expect(() => splitAssignments(["WARN_INTRON_LESS_THAN=-5"])).toThrow(ValidationError);
    expect(() => splitAssignments(["WARN_INTRON_LESS_THAN=abc"])).toThrow(ValidationError);
    expect(() => splitAssignments(["TYPE="])).toThrow(ValidationError);
  });
});

describe("setThreshold", () => {
  test("sets positive bounds", () => {
    const settings = {};
    setThreshold(settings, "warnAbove", 500);
    expect(settings).toEqual({ warnAbove: 500 });
  });
});
