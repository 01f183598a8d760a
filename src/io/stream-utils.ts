/**
 * Stream processing utilities for line-oriented text
 *
 * Turns byte streams into lines with proper buffering across chunk
 * boundaries.
 */

import { BufferError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 10_000_000;
const MAX_BUFFER_SIZE = 67_108_864; // 64MB

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Line terminators (`\n` or `\r\n`) are removed. A final line without a
 * terminator is still yielded. Leaving the loop early cancels the stream.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line is too long
 *
 * @example
 * ```typescript
 * const stream = await createStream("alignments.sam");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("@SQ")) {
 *     console.log("Reference:", line);
 *   }
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "binary" = "utf8",
  maxLineLength: number = MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  // latin1 maps every byte to one character
  const decoder = new TextDecoder(encoding === "binary" ? "latin1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  // set once the source is drained or has failed; otherwise it is cancelled on exit
  let settled = false;

  try {
    for (;;) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          totalBytesProcessed
        );
      });

      if (chunk.done) {
        settled = true;
        buffer += decoder.decode();
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length
        );
      }
    }

    const result = processBuffer(buffer, maxLineLength);
    yield* result.lines;
    if (result.remainder.length > 0) {
      yield result.remainder;
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n` and `\r\n` endings and keeps the incomplete tail for the
 * next chunk.
 *
 * @throws {BufferError} If a single line exceeds `maxLineLength`
 *
 * @example
 * ```typescript
 * processBuffer("a\r\nb\nc"); // { lines: ["a", "b"], remainder: "c" }
 * ```
 */
export function processBuffer(
  buffer: string,
  maxLineLength: number = MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const lineEnd =
      newline > lineStart && buffer.charAt(newline - 1) === "\r" ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);

    if (line.length > maxLineLength) {
      throw new BufferError(
        `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
        line.length,
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }

    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > maxLineLength) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      remainder.length,
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}
