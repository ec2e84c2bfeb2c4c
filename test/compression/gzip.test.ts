/**
 * Tests for compression detection and gzip streaming
 */

import { gzipSync, strToU8 } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionDetector, GzipDecompressor } from "../../src/compression";
import { CompressionError } from "../../src/errors";
import { readLines } from "../../src/io/stream-utils";
import { collect, streamOf } from "../utils/helpers";

describe("CompressionDetector", () => {
  test("detects gzip by extension", () => {
    expect(CompressionDetector.fromExtension("reads.fastq.gz")).toBe("gzip");
    expect(CompressionDetector.fromExtension("ANNOT.GFF3.GZIP")).toBe("gzip");
    expect(CompressionDetector.fromExtension("annotation.gff3")).toBe("none");
  });

  test("rejects an empty path", () => {
    expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
  });

  test("detects gzip by magic bytes", () => {
    expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]))).toBe("gzip");
    expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x3e, 0x73]))).toBe("none");
    expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f]))).toBe("none");
  });
});

describe("GzipDecompressor", () => {
  test("inflates a stream delivered in small chunks", async () => {
    const text = Array.from({ length: 200 }, (_, i) => `line ${i}`).join("\n");
    const packed = gzipSync(strToU8(text));
    const lines = await collect(readLines(GzipDecompressor.wrapStream(streamOf(packed, 7))));

    expect(lines).toHaveLength(200);
    expect(lines[0]).toBe("line 0");
    expect(lines[199]).toBe("line 199");
  });
});
