import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { fileError, parseFileError } from "../core/errors.js"
import { parseDocument } from "../core/parse.js"
import type { TreeNode } from "../core/tree.js"
import { serializeTree } from "../core/tree.js"

// CHANGE: provide document read/write helpers with validation
// WHY: isolate filesystem IO while handing the core a typed tree
// QUOTE(TZ): n/a
// REF: req-tree-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: write(p, t); read(p) = Right(t') → serializeTree(t') = serializeTree(t)
// PURITY: SHELL
// EFFECT: Effect<TreeNode, AppError, FileSystem>
// INVARIANT: the document is parsed in full before any of it is used
// COMPLEXITY: O(n)

export const readTreeFile = (
  path: string
): Effect.Effect<TreeNode, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const parsed = parseDocument(raw)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(parseFileError(path, parsed.left)))
    }
    yield* _(Effect.logDebug(`read ${path} (${raw.length} characters)`))
    return parsed.right
  })

export const writeTreeFile = (
  path: string,
  tree: TreeNode
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const payload = serializeTree(tree) + "\n"
    yield* _(
      fs.writeFileString(path, payload).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`wrote ${path}`))
  })
