// CHANGE: introduce a JSON domain type for the decoded input document
// WHY: keep the boundary value closed before it is lifted into the tree model
// QUOTE(TZ): n/a
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isFiniteJson(x) → isFiniteJson(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)
