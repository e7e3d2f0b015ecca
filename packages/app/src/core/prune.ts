import { Match } from "effect"
import * as Option from "effect/Option"

import type { ArrayNode, ObjectEntry, ObjectNode, Scalar, TreeNode } from "./tree.js"
import { arrayNode, isTruthy, objectNode } from "./tree.js"

// CHANGE: implement the recursive pruning pass
// WHY: drop every object that carries a clean key holding an orphaned value
// QUOTE(TZ): n/a
// REF: req-prune-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o ∈ prune(t): ¬∃(k,v) ∈ o: k ∈ onKeys ∧ v ∈ forValues, unless o lies under an ignored path
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: falsy values are kept verbatim; arrays are filtered, never discarded
// COMPLEXITY: O(n) where n = number of nodes

export interface PruneRule {
  readonly onKeys: ReadonlySet<string>
  readonly forValues: ReadonlySet<Scalar>
  readonly ignorePaths: ReadonlySet<string>
}

export type TreePath = ReadonlyArray<string>

const isIgnored = (path: TreePath, ignorePaths: ReadonlySet<string>): boolean =>
  path.length > 0 && ignorePaths.has(path.join("."))

const isRemovalMarker = (key: string, value: TreeNode, rule: PruneRule): boolean =>
  rule.onKeys.has(key) && value._tag === "Scalar" && rule.forValues.has(value.value)

const pruneObject = (
  node: ObjectNode,
  rule: PruneRule,
  path: TreePath
): Option.Option<TreeNode> => {
  const kept: Array<ObjectEntry> = []
  for (const [key, value] of node.entries) {
    if (isRemovalMarker(key, value, rule)) {
      return Option.none()
    }
    if (isTruthy(value)) {
      const pruned = pruneTree(value, rule, [...path, key])
      if (Option.isSome(pruned)) {
        kept.push([key, pruned.value])
      }
    } else {
      kept.push([key, value])
    }
  }
  return Option.some(objectNode(kept))
}

const pruneArray = (node: ArrayNode, rule: PruneRule, path: TreePath): ArrayNode => {
  const kept: Array<TreeNode> = []
  for (const item of node.items) {
    if (isTruthy(item)) {
      const pruned = pruneTree(item, rule, path)
      if (Option.isSome(pruned)) {
        kept.push(pruned.value)
      }
    } else {
      kept.push(item)
    }
  }
  return arrayNode(kept)
}

/**
 * Remove every object holding `onKeys[k] ∈ forValues`, recursively.
 *
 * @param path - Keys from the root to `node`; array items share their parent's path.
 * @returns `none` when `node` itself is discarded.
 *
 * @pure true
 * @invariant a node whose dot-joined path is in ignorePaths is returned untouched
 * @complexity O(n)
 */
export const pruneTree = (
  node: TreeNode,
  rule: PruneRule,
  path: TreePath = []
): Option.Option<TreeNode> => {
  if (isIgnored(path, rule.ignorePaths)) {
    return Option.some(node)
  }
  return Match.value(node).pipe(
    Match.tag("Object", (object) => pruneObject(object, rule, path)),
    Match.tag("Array", (array): Option.Option<TreeNode> => Option.some(pruneArray(array, rule, path))),
    Match.tag("Scalar", (scalar): Option.Option<TreeNode> => Option.some(scalar)),
    Match.exhaustive
  )
}
