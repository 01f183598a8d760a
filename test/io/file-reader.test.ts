/**
 * Tests for file reading through the Effect platform layer
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import {
  createStream,
  exists,
  FileReader,
  getMetadata,
  readToString,
} from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";

const FIXTURES_DIR = join(process.cwd(), "test", "io", "fixtures", "read");
const TEST_FILES = {
  small: join(FIXTURES_DIR, "small.txt"),
  medium: join(FIXTURES_DIR, "medium.txt"),
  utf8: join(FIXTURES_DIR, "utf8.txt"),
  lines: join(FIXTURES_DIR, "lines.sam"),
  nonexistent: join(FIXTURES_DIR, "nonexistent.txt"),
  directory: join(FIXTURES_DIR, "test-directory"),
};

beforeAll(() => {
  mkdirSync(FIXTURES_DIR, { recursive: true });
  writeFileSync(TEST_FILES.small, "Hello, World!");
  writeFileSync(TEST_FILES.medium, "A".repeat(1000) + "\n" + "B".repeat(1000));
  writeFileSync(TEST_FILES.utf8, "Hello, 世界!");
  writeFileSync(TEST_FILES.lines, "Line 1\nLine 2\r\nLine 3\r\nLine 4\n");
  mkdirSync(TEST_FILES.directory, { recursive: true });
});

afterAll(() => {
  rmSync(FIXTURES_DIR, { recursive: true, force: true });
});

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const result: string[] = [];
  for await (const line of lines) {
    result.push(line);
  }
  return result;
}

describe("FileReader", () => {
  describe("exists", () => {
    test("true for a regular file", async () => {
      expect(await exists(TEST_FILES.small)).toBe(true);
    });

    test("false for a directory or a missing path", async () => {
      expect(await exists(TEST_FILES.directory)).toBe(false);
      expect(await exists(TEST_FILES.nonexistent)).toBe(false);
    });

    test("rejects path traversal", async () => {
      await expect(exists("../etc/passwd")).rejects.toThrow(FileError);
      await expect(exists("")).rejects.toThrow(/^Invalid file path/);
    });
  });

  describe("getMetadata", () => {
    test("reports size and extension", async () => {
      const metadata = await getMetadata(TEST_FILES.small);
      expect(metadata.path).toBe(TEST_FILES.small);
      expect(metadata.size).toBe(13);
      expect(metadata.extension).toBe(".txt");
      expect(metadata.lastModified).toBeInstanceOf(Date);
    });

    test("a missing file is a stat FileError", async () => {
      await expect(getMetadata(TEST_FILES.nonexistent)).rejects.toMatchObject({
        name: "FileError",
        operation: "stat",
      });
    });
  });

  test("readToString decodes UTF-8", async () => {
    expect(await readToString(TEST_FILES.utf8)).toBe("Hello, 世界!");
  });

  describe("createStream", () => {
    test("streams lines of a file", async () => {
      const stream = await createStream(TEST_FILES.lines, { bufferSize: 1024 });
      expect(await collect(readLines(stream))).toEqual(["Line 1", "Line 2", "Line 3", "Line 4"]);
    });

    test("a missing file is rejected before opening", async () => {
      await expect(createStream(TEST_FILES.nonexistent)).rejects.toThrow(
        "File does not exist or is not accessible"
      );
    });

    test("enforces maxFileSize", async () => {
      await expect(createStream(TEST_FILES.medium, { maxFileSize: 10 })).rejects.toThrow(
        "File too large: 2001 bytes exceeds limit of 10 bytes"
      );
    });

    test("validates options", async () => {
      await expect(createStream(TEST_FILES.small, { bufferSize: 10 })).rejects.toThrow(
        /^Invalid file reader options/
      );
      await expect(createStream(TEST_FILES.small, { bufferSize: 2_000_000 })).rejects.toThrow(
        FileError
      );
    });
  });

  test("namespace exposes the functions", () => {
    expect(FileReader.exists).toBe(exists);
    expect(FileReader.createStream).toBe(createStream);
  });
});
