import type { Scalar } from "./tree.js"

// CHANGE: define report types for a cleaning run
// WHY: keep IO-free data structures reusable across output formats and tests
// QUOTE(TZ): n/a
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ Report: r.removedValues ⊆ ⋃ r.passes[i].orphaned
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: passes are numbered from 1 in execution order
// COMPLEXITY: O(1)/O(1)

export interface PassReport {
  readonly pass: number
  readonly orphaned: ReadonlyArray<Scalar>
  readonly removed: ReadonlyArray<Scalar>
  readonly occurrencesBefore: number
  readonly occurrencesAfter: number
}

export interface Report {
  readonly input: string
  readonly output: string
  readonly written: boolean
  readonly candidates: number
  readonly passes: ReadonlyArray<PassReport>
  readonly removedValues: ReadonlyArray<Scalar>
}
