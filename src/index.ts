/**
 * sam-kit - reading and writing SAM alignment text
 *
 * Parses header and alignment lines into typed records, streams them from
 * files or web streams, and writes them back as SAM text.
 */

// Error types
export {
  BufferError,
  CigarValidationError,
  FileError,
  ParseError,
  SamError,
  SamKitError,
  StreamError,
  ValidationError,
} from "./errors";
export type { SamErrorKind, SamErrorLocation } from "./errors";

// SAM format
export * from "./formats/sam";
export { AbstractParser, InterruptHandler } from "./formats/abstract-parser";

// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { openForWriting, writeString } from "./io/file-writer";
export type { FileWriteHandle } from "./io/file-writer";
export { processBuffer, readLines } from "./io/stream-utils";

// Core types
export type { FileMetadata, FileReaderOptions, LineProcessingResult, ParserOptions } from "./types";
export { FilePathSchema, FileReaderOptionsSchema } from "./types";
