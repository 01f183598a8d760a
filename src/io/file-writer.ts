/**
 * File writing operations using Effect Platform
 *
 * All Effect machinery is hidden behind Promise-based APIs. Failures are
 * rethrown as the original error rather than Effect's fiber wrapper, so a
 * callback's own error reaches the caller unchanged.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Cause, Effect, Exit } from "effect";
import { FileError } from "../errors";
import { getPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file as UTF-8
   */
  writeString(content: string): Promise<void>;
}

async function runOrThrow<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("header.sam", "@HD\tVN:1.6\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await runOrThrow(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is created (or truncated) with 644 permissions and closed
 * through Effect's scoped resource management when the callback settles,
 * whether it resolves or throws. An error thrown by the callback is
 * rethrown as is.
 *
 * @throws {FileError} When the file cannot be opened or written
 *
 * @example
 * ```typescript
 * await openForWriting("out.sam", async (handle) => {
 *   await handle.writeString("@HD\tVN:1.6\n");
 *   await handle.writeString("r1\t4\t*\t0\t255\t*\t*\t0\t0\t*\t*\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const handle: FileWriteHandle = {
      writeString: async (content: string): Promise<void> => {
        try {
          await runOrThrow(file.writeAll(encoder.encode(content)));
        } catch (error) {
          throw FileError.fromSystemError("write", path, error);
        }
      },
    };

    // The scope closes the file once this settles
    return yield* Effect.promise(() => callback(handle));
  });

  return runOrThrow(program.pipe(Effect.scoped, Effect.provide(getPlatform())));
}
