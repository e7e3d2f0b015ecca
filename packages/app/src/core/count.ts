import type { Candidates } from "./collect.js"
import type { Scalar, TreeNode } from "./tree.js"
import { serializeScalar, serializeTree } from "./tree.js"

// CHANGE: count textual occurrences of candidate values in the canonical text
// WHY: a value referenced only where it is defined occurs exactly once
// QUOTE(TZ): n/a
// REF: req-count-1
// SOURCE: n/a
// FORMAT THEOREM: ∀(c,s) ∈ C: count(t,C)(c) = |nonOverlapping(s, serializeTree(t))|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: counting is textual; 4 is found inside 42 and inside "x4"
// COMPLEXITY: O(|C| * |text|)

export type OccurrenceCounts = ReadonlyMap<Scalar, number>

export const candidatesOf = (values: Iterable<Scalar>): Candidates =>
  new Map([...values].map((value): [Scalar, string] => [value, serializeScalar(value)]))

export const countSubstring = (haystack: string, needle: string): number => {
  if (needle.length === 0) {
    return haystack.length + 1
  }
  let count = 0
  let index = haystack.indexOf(needle)
  while (index !== -1) {
    count += 1
    index = haystack.indexOf(needle, index + needle.length)
  }
  return count
}

/**
 * Count every candidate against one serialization of the tree.
 *
 * @returns One entry per candidate, in candidate order.
 *
 * @pure true
 * @complexity O(|C| * |text|)
 */
export const countOccurrences = (
  tree: TreeNode,
  candidates: Candidates
): OccurrenceCounts => {
  const text = serializeTree(tree)
  const counts = new Map<Scalar, number>()
  for (const [candidate, needle] of candidates) {
    counts.set(candidate, countSubstring(text, needle))
  }
  return counts
}

export const totalOccurrences = (counts: OccurrenceCounts): number => {
  let total = 0
  for (const count of counts.values()) {
    total += count
  }
  return total
}

export const orphanedValues = (counts: OccurrenceCounts): ReadonlySet<Scalar> => {
  const orphaned = new Set<Scalar>()
  for (const [value, count] of counts) {
    if (count === 1) {
      orphaned.add(value)
    }
  }
  return orphaned
}
