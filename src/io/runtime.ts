/**
 * Effect platform layer for file I/O
 *
 * File access goes through `@effect/platform`'s `FileSystem` service; this
 * module supplies the Node.js implementation of it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Effect platform layer providing FileSystem, Path, and the other platform
 * services
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const fs = yield* FileSystem.FileSystem;
 *   return yield* fs.exists("alignments.sam");
 * });
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
