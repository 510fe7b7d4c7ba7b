// CHANGE: define report types shared by the CLI modes
// WHY: keep IO-free data structures reusable across commands and tests
// FORMAT THEOREM: ∀r ∈ Report: r.totals.parsed + r.totals.failed = |r.files|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: outcome._tag ∈ {"Parsed","Failed"}
// COMPLEXITY: O(1)/O(1)

export interface ValueStats {
  readonly objects: number
  readonly arrays: number
  readonly strings: number
  readonly numbers: number
  readonly booleans: number
  readonly nulls: number
  readonly keys: number
  readonly maxDepth: number
}

export type FileOutcome =
  | { readonly _tag: "Parsed"; readonly file: string; readonly stats: ValueStats }
  | { readonly _tag: "Failed"; readonly file: string; readonly error: string }

export interface ReportTotals {
  readonly parsed: number
  readonly failed: number
}

export interface Report {
  readonly files: ReadonlyArray<FileOutcome>
  readonly totals: ReportTotals
}
