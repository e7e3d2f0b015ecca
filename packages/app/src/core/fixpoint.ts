import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { collectIdentifiers } from "./collect.js"
import type { OccurrenceCounts } from "./count.js"
import { countOccurrences, orphanedValues, totalOccurrences } from "./count.js"
import type { CleanError } from "./errors.js"
import { invalidRoot } from "./errors.js"
import type { PruneRule } from "./prune.js"
import { pruneTree } from "./prune.js"
import type { Scalar, TreeNode } from "./tree.js"
import { arrayNode, copyTree, objectNode } from "./tree.js"

// CHANGE: drive count/prune passes until the tree stops shrinking
// WHY: removing one orphan can orphan the values it referenced
// QUOTE(TZ): n/a
// REF: req-fixpoint-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i: total(pass_i.after) < total(pass_i.before) ∨ pass_i is the last pass
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: passes ≤ |candidates| + 1; the input tree is never aliased into the result
// COMPLEXITY: O(p * (n + |C| * |text|)) where p = number of passes

export interface CleanSettings {
  readonly searchKeys: ReadonlyArray<string>
  readonly cleanKeys: ReadonlyArray<string>
  readonly ignorePaths: ReadonlyArray<string>
}

export interface PassSummary {
  readonly orphaned: ReadonlyArray<Scalar>
  readonly removed: ReadonlyArray<Scalar>
  readonly totalBefore: number
  readonly totalAfter: number
}

export interface CleanOutcome {
  readonly tree: TreeNode
  readonly candidates: ReadonlyArray<Scalar>
  readonly passes: ReadonlyArray<PassSummary>
}

const emptyLike = (node: TreeNode): TreeNode => node._tag === "Array" ? arrayNode([]) : objectNode([])

const removedBetween = (
  orphaned: ReadonlySet<Scalar>,
  before: OccurrenceCounts,
  after: OccurrenceCounts
): ReadonlyArray<Scalar> =>
  [...orphaned].filter((value) => (after.get(value) ?? 0) < (before.get(value) ?? 0))

/**
 * Run the fixpoint and keep a summary of every pass.
 *
 * @param tree - Parsed document; its root must be an object or an array.
 * @returns Cleaned deep copy with pass summaries, or a CleanError.
 *
 * @pure true
 * @invariant counts at the start of a pass are fresh counts of the current tree
 * @complexity O(p * (n + |C| * |text|))
 */
export const runFixpoint = (
  tree: TreeNode,
  settings: CleanSettings
): Either.Either<CleanOutcome, CleanError> => {
  if (tree._tag === "Scalar") {
    return Either.left(invalidRoot(tree.value === null ? "null" : typeof tree.value))
  }
  const collected = collectIdentifiers(tree, settings.searchKeys)
  if (Either.isLeft(collected)) {
    return Either.left(collected.left)
  }
  const candidates = collected.right
  const onKeys = new Set(settings.cleanKeys)
  const ignorePaths = new Set(settings.ignorePaths)
  const passes: Array<PassSummary> = []

  let working = copyTree(tree)
  let counts = countOccurrences(working, candidates)
  let orphaned = orphanedValues(counts)
  while (orphaned.size > 0) {
    const rule: PruneRule = { onKeys, forValues: orphaned, ignorePaths }
    const pruned = Option.getOrElse(pruneTree(working, rule), () => emptyLike(working))
    const nextCounts = countOccurrences(pruned, candidates)
    const totalBefore = totalOccurrences(counts)
    const totalAfter = totalOccurrences(nextCounts)
    passes.push({
      orphaned: [...orphaned],
      removed: removedBetween(orphaned, counts, nextCounts),
      totalBefore,
      totalAfter
    })
    working = pruned
    counts = nextCounts
    orphaned = totalAfter < totalBefore ? orphanedValues(counts) : new Set<Scalar>()
  }

  return Either.right({ tree: working, candidates: [...candidates.keys()], passes })
}

/**
 * Remove items whose identifying value is no longer referenced anywhere else.
 *
 * Values found under `searchKeys` that occur exactly once in the serialized
 * tree are orphaned; every object holding such a value under one of
 * `cleanKeys` is removed, and the count is repeated until nothing changes.
 * Nodes at or below a dot-joined path in `ignorePaths` are left untouched.
 *
 * @pure true
 * @invariant clean(clean(x)) = clean(x)
 * @complexity O(p * (n + |C| * |text|))
 */
export const clean = (
  tree: TreeNode,
  searchKeys: ReadonlyArray<string>,
  cleanKeys: ReadonlyArray<string>,
  ignorePaths: ReadonlyArray<string> = []
): Either.Either<TreeNode, CleanError> =>
  Either.map(runFixpoint(tree, { searchKeys, cleanKeys, ignorePaths }), (outcome) => outcome.tree)
