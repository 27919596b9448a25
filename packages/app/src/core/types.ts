import type { EmptySummary, LeafSummary } from "./classify.js"
import type { VerificationResult } from "./verify.js"

// CHANGE: define the analysis outputs handed to the reporter
// WHY: keep IO-free data structures reusable across CLI modes and tests
// QUOTE(TZ): "the core must supply all data the Reporter needs without the Reporter re-deriving them"
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o ∈ AnalysisOutput: o.mode ∈ {"leaves","empty","verify"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: verify outputs carry the list source and the column width
// COMPLEXITY: O(1)/O(1)

export type AnalysisOutput =
  | { readonly mode: "leaves"; readonly summary: LeafSummary }
  | { readonly mode: "empty"; readonly summary: EmptySummary }
  | {
    readonly mode: "verify"
    readonly source: string
    readonly nameWidth: number
    readonly result: VerificationResult
  }
