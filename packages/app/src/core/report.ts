import type { CleanOutcome } from "./fixpoint.js"
import type { Scalar } from "./tree.js"
import { serializeScalar } from "./tree.js"
import type { PassReport, Report } from "./types.js"

// CHANGE: build structured reports and render output formats
// WHY: keep reporting pure and deterministic across output modes
// QUOTE(TZ): n/a
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: report(r).removedValues lists values in removal order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Report.removedValues is unique
// COMPLEXITY: O(n)

export interface ReportTarget {
  readonly input: string
  readonly output: string
  readonly written: boolean
}

/**
 * Build a Report from the fixpoint outcome and the files involved.
 *
 * @pure true
 * @complexity O(n)
 */
export const buildReport = (target: ReportTarget, outcome: CleanOutcome): Report => {
  const passes: ReadonlyArray<PassReport> = outcome.passes.map((summary, index) => ({
    pass: index + 1,
    orphaned: summary.orphaned,
    removed: summary.removed,
    occurrencesBefore: summary.totalBefore,
    occurrencesAfter: summary.totalAfter
  }))
  return {
    ...target,
    candidates: outcome.candidates.length,
    passes,
    removedValues: [...new Set(passes.flatMap((pass) => pass.removed))]
  }
}

const formatList = (title: string, values: ReadonlyArray<Scalar>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${serializeScalar(value)}`)]
}

const formatPass = (pass: PassReport): string =>
  `Pass ${pass.pass}: orphaned=${pass.orphaned.length}, removed=${pass.removed.length}, ` +
  `occurrences ${pass.occurrencesBefore} -> ${pass.occurrencesAfter}`

/**
 * Render a human-readable report.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report): string => {
  const outputLine = report.written
    ? `Output: ${report.output}`
    : `Output: ${report.output} (dry run, not written)`
  return [
    `Input: ${report.input}`,
    outputLine,
    `Candidates: ${report.candidates}`,
    ...report.passes.map((pass) => formatPass(pass)),
    ...formatList("Removed values", report.removedValues)
  ].join("\n")
}

export const renderJsonReport = (report: Report): string => JSON.stringify(report, null, 2)
