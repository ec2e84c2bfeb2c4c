/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing is hidden behind Promise-based functions, mirroring
 * file-reader.ts.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * Missing parent directories are created.
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("parts/chr1_1.fa", ">chr1_1\nACGT\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const parentDir = pathService.dirname(path);
    if (!(yield* fs.exists(parentDir))) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }

    yield* fs.writeFileString(path, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Create a directory and any missing parents
 *
 * @throws {FileError} When the directory cannot be created
 */
export async function ensureDirectory(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("mkdir", path, error);
  }
}
