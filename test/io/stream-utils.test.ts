/**
 * Tests for byte stream to line conversion
 */

import { describe, expect, test } from "vitest";
import { BufferError, StreamError } from "../../src/errors";
import { processBuffer, readLines } from "../../src/io/stream-utils";

function byteStream(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

function textStream(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return byteStream(...chunks.map((chunk) => encoder.encode(chunk)));
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const result: string[] = [];
  for await (const line of lines) {
    result.push(line);
  }
  return result;
}

describe("processBuffer", () => {
  test("splits complete lines and keeps the tail", () => {
    expect(processBuffer("a\r\nb\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
  });

  test("a bare CRLF is one empty line", () => {
    expect(processBuffer("\r\n")).toEqual({ lines: [""], remainder: "" });
  });

  test("guards line length", () => {
    expect(() => processBuffer("abcdef\n", 3)).toThrow(BufferError);
    expect(() => processBuffer("abcdef\n", 3)).toThrow(
      "Line too long: 6 characters exceeds maximum 3"
    );
    expect(() => processBuffer("abcdef", 3)).toThrow(
      "Incomplete line too long: 6 characters exceeds maximum 3"
    );
  });
});

describe("readLines", () => {
  test("joins lines across chunk boundaries", async () => {
    expect(await collect(readLines(textStream("ab", "c\nde", "f\n")))).toEqual(["abc", "def"]);
  });

  test("yields a final line without a terminator", async () => {
    expect(await collect(readLines(textStream("one\ntwo")))).toEqual(["one", "two"]);
  });

  test("strips CR before LF", async () => {
    expect(await collect(readLines(textStream("one\r", "\ntwo\r\n")))).toEqual(["one", "two"]);
  });

  test("an empty stream has no lines", async () => {
    expect(await collect(readLines(byteStream()))).toEqual([]);
  });

  test("decodes UTF-8 split inside a character", async () => {
    const stream = byteStream(new Uint8Array([0x61, 0xc3]), new Uint8Array([0xa9, 0x0a]));
    expect(await collect(readLines(stream))).toEqual(["aé"]);
  });

  test("binary mode maps each byte to one character", async () => {
    const stream = byteStream(new Uint8Array([0xe9, 0x0a]));
    expect(await collect(readLines(stream, "binary"))).toEqual(["é"]);
  });

  test("wraps a failing stream in StreamError", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error("disk gone"));
      },
    });
    await expect(collect(readLines(stream))).rejects.toThrow(StreamError);
  });

  test("reports the failure message", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error("disk gone"));
      },
    });
    await expect(collect(readLines(stream))).rejects.toThrow("Line reading failed: disk gone");
  });

  test("cancels the stream when the consumer stops early", async () => {
    const encoder = new TextEncoder();
    let cancelled = false;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(encoder.encode("line\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const line of readLines(stream)) {
      expect(line).toBe("line");
      break;
    }
    expect(cancelled).toBe(true);
    expect(stream.locked).toBe(false);
  });

  test("leaves a drained stream alone", async () => {
    let cancelled = false;
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("a\nb\n"));
        controller.close();
      },
      cancel() {
        cancelled = true;
      },
    });

    expect(await collect(readLines(stream))).toEqual(["a", "b"]);
    expect(cancelled).toBe(false);
  });

  test("applies the line length limit", async () => {
    await expect(collect(readLines(textStream("abcdef\n"), "utf8", 3))).rejects.toThrow(
      BufferError
    );
  });
});
