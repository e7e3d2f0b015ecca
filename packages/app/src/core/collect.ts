import { Match } from "effect"
import * as Either from "effect/Either"

import type { UnhashableCandidate } from "./errors.js"
import { unhashableCandidate } from "./errors.js"
import type { Scalar, TreeNode } from "./tree.js"
import { isTruthy } from "./tree.js"

// CHANGE: collect identifying values found under the search keys
// WHY: the candidate set is fixed once from the untouched input tree
// QUOTE(TZ): n/a
// REF: req-collect-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ collect(t,K): ∃ entry (k,v) in t with k ∈ K ∧ v is a truthy scalar
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a matched value is a leaf; nothing below it is searched
// COMPLEXITY: O(n) where n = number of nodes

// candidate value -> JSON text of its first occurrence, in first-seen order
export type Candidates = ReadonlyMap<Scalar, string>

type Visit = Either.Either<void, UnhashableCandidate>

interface CollectContext {
  readonly searchKeys: ReadonlySet<string>
  readonly found: Map<Scalar, string>
}

const done: Visit = Either.right(undefined)

const collectValue = (
  value: TreeNode,
  context: CollectContext,
  path: ReadonlyArray<string>
): Visit =>
  Match.value(value).pipe(
    Match.tag("Scalar", (scalar): Visit => {
      if (isTruthy(scalar) && !context.found.has(scalar.value)) {
        context.found.set(scalar.value, scalar.text)
      }
      return done
    }),
    Match.tag("Array", (): Visit => Either.left(unhashableCandidate(path.join(".")))),
    Match.tag("Object", (): Visit => Either.left(unhashableCandidate(path.join(".")))),
    Match.exhaustive
  )

const visitNode = (
  node: TreeNode,
  context: CollectContext,
  path: ReadonlyArray<string>
): Visit =>
  Match.value(node).pipe(
    Match.tag("Scalar", (): Visit => done),
    Match.tag("Array", (array): Visit => {
      for (const item of array.items) {
        const visited = visitNode(item, context, path)
        if (Either.isLeft(visited)) {
          return visited
        }
      }
      return done
    }),
    Match.tag("Object", (object): Visit => {
      for (const [key, value] of object.entries) {
        const childPath = [...path, key]
        const visited = context.searchKeys.has(key)
          ? collectValue(value, context, childPath)
          : visitNode(value, context, childPath)
        if (Either.isLeft(visited)) {
          return visited
        }
      }
      return done
    }),
    Match.exhaustive
  )

/**
 * Collect every scalar stored under one of `searchKeys`, at any depth.
 *
 * Falsy scalars are skipped; a container under a search key fails fast.
 * Each value keeps the text it was first written with, so `1.0` is searched
 * for as `1.0`.
 *
 * @pure true
 * @invariant result keeps first-seen order and holds no duplicates
 * @complexity O(n)
 */
export const collectIdentifiers = (
  tree: TreeNode,
  searchKeys: Iterable<string>
): Either.Either<Candidates, UnhashableCandidate> => {
  const context: CollectContext = { searchKeys: new Set(searchKeys), found: new Map() }
  if (context.searchKeys.size === 0) {
    return Either.right(context.found)
  }
  return Either.map(visitNode(tree, context, []), () => context.found)
}
