import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import { splitArgLines } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: expand @file arguments into the lines of the named file
// WHY: long key and path lists are easier to keep in a file than on the command line
// QUOTE(TZ): n/a
// REF: req-arg-files-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a: expand([..., "@f", ...]) = [..., ...lines(f), ...]
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, AppError, FileSystem>
// INVARIANT: expansion is not recursive; a bare "@" stays as it is
// COMPLEXITY: O(n)

const isArgFile = (arg: string): boolean => arg.startsWith("@") && arg.length > 1

const readArgFile = (
  fs: FileSystemService,
  path: string
): Effect.Effect<ReadonlyArray<string>, AppError> =>
  fs.readFileString(path).pipe(
    Effect.map(splitArgLines),
    Effect.mapError((error) => fileError(`Cannot read argument file ${path}: ${String(error)}`))
  )

export const expandArgFiles = (
  args: ReadonlyArray<string>
): Effect.Effect<ReadonlyArray<string>, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const expanded = yield* _(
      Effect.forEach(args, (arg) => isArgFile(arg) ? readArgFile(fs, arg.slice(1)) : Effect.succeed([arg]))
    )
    return expanded.flat()
  })
