/**
 * Shared type definitions for parsers, writers, and file I/O
 *
 * SAM record types live with the format in `formats/sam/types.ts`; this
 * module holds the configuration surface common to every reader and writer.
 */

import { type } from "arktype";

/**
 * Base parser configuration
 */
export interface ParserOptions {
  /** Skip record-level validation (field grammar is always enforced) */
  skipValidation?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to attach original line numbers to records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * File reading configuration options with sensible defaults
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary";
  /** Maximum file size to accept (default: unlimited) */
  readonly maxFileSize?: number;
}

/**
 * File metadata for validation and diagnostics
 */
export interface FileMetadata {
  readonly path: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * Line processing result for streaming text files
 * Handles incomplete lines and buffer management
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

/**
 * File path validation: non-empty, no null bytes, no traversal
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  const normalized = path.replace(/[\\/]+/g, "/");
  if (normalized.split("/").includes("..")) {
    return ctx.reject({
      expected: "a path without '..' segments",
      actual: path,
    });
  }
  return true;
});

export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": '"utf8"|"binary"',
  "maxFileSize?": "number>=0",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && options.bufferSize > 1_048_576) {
    return ctx.reject({
      expected: "bufferSize <= 1MB",
      actual: `${options.bufferSize}`,
      path: ["bufferSize"],
    });
  }
  return true;
});
