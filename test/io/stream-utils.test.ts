/**
 * Tests for line splitting over byte streams
 */

import { describe, expect, test } from "vitest";
import { BufferError, StreamError } from "../../src/errors";
import { linesOf, processBuffer, readLines } from "../../src/io/stream-utils";
import { collect, streamOf } from "../utils/helpers";

describe("processBuffer", () => {
  test("splits complete lines and keeps the remainder", () => {
    expect(processBuffer("a\nb\r\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
  });

  test("treats a bare carriage return as a line ending", () => {
    expect(processBuffer("a\rb\n")).toEqual({ lines: ["a", "b"], remainder: "" });
  });

  test("holds back a trailing carriage return", () => {
    expect(processBuffer("a\r")).toEqual({ lines: [], remainder: "a\r" });
  });

  test("keeps blank lines", () => {
    expect(processBuffer("a\n\nb\n").lines).toEqual(["a", "", "b"]);
  });

  test("rejects over-long lines", () => {
    expect(() => processBuffer("abcdef\n", 3)).toThrow(BufferError);
    expect(() => processBuffer("abcdef", 3)).toThrow(BufferError);
  });
});

describe("readLines", () => {
  test("yields a final line without a newline", async () => {
    expect(await collect(readLines(streamOf("one\ntwo")))).toEqual(["one", "two"]);
  });

  test("joins CRLF split across chunks", async () => {
    expect(await collect(readLines(streamOf("ab\r\ncd\r\n", 3)))).toEqual(["ab", "cd"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode("é\nü\n");
    expect(await collect(readLines(streamOf(bytes, 1)))).toEqual(["é", "ü"]);
  });

  test("empty stream yields nothing", async () => {
    expect(await collect(readLines(streamOf("")))).toEqual([]);
  });

  test("wraps read failures in StreamError", async () => {
    const failing = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("disk gone"));
      },
    });
    await expect(collect(readLines(failing))).rejects.toThrow(StreamError);
  });
});

describe("linesOf", () => {
  test("splits a string with the same rules", async () => {
    expect(await collect(linesOf("x\r\ny\rz\r"))).toEqual(["x", "y", "z"]);
  });
});
