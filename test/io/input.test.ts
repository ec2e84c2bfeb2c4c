/**
 * Tests for concatenated multi-source input
 */

import { rmSync, writeFileSync } from "fs";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { readInputLines } from "../../src/io/input";
import { collect, makeTempDir, streamOf } from "../utils/helpers";

describe("readInputLines", () => {
  let dir: string;

  beforeAll(() => {
    dir = makeTempDir();
    writeFileSync(join(dir, "a.txt"), "a1\na2\n");
    writeFileSync(join(dir, "b.txt"), "b1");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("numbers lines per source, in argument order", async () => {
    const a = join(dir, "a.txt");
    const b = join(dir, "b.txt");
    const lines = await collect(readInputLines([a, { name: "piped", stream: streamOf("p1\n") }, b]));

    expect(lines).toEqual([
      { text: "a1", source: a, lineNumber: 1 },
      { text: "a2", source: a, lineNumber: 2 },
      { text: "p1", source: "piped", lineNumber: 1 },
      { text: "b1", source: b, lineNumber: 1 },
    ]);
  });

  test("a missing later file fails after earlier lines", async () => {
    const seen: string[] = [];
    const run = async () => {
      for await (const line of readInputLines([join(dir, "a.txt"), join(dir, "none.txt")])) {
        seen.push(line.text);
      }
    };

    await expect(run()).rejects.toThrow(FileError);
    expect(seen).toEqual(["a1", "a2"]);
  });
});
