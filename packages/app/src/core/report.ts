import { Match } from "effect"

import type { CliCommand } from "./cli.js"
import type { FileOutcome, Report, ValueStats } from "./types.js"

// CHANGE: build structured reports and render output formats
// WHY: keep reporting pure and deterministic across CLI modes
// FORMAT THEOREM: ∀o: report(o).files = o (same order)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: totals match the outcome tags
// COMPLEXITY: O(n)

/**
 * Build a Report from per-file outcomes.
 *
 * @param outcomes - Outcomes in the order the files were read.
 * @returns Report with totals.
 *
 * @pure true
 * @invariant totals.parsed + totals.failed = outcomes.length
 * @complexity O(n)
 */
export const buildReport = (outcomes: ReadonlyArray<FileOutcome>): Report => ({
  files: outcomes,
  totals: {
    parsed: outcomes.filter((outcome) => outcome._tag === "Parsed").length,
    failed: outcomes.filter((outcome) => outcome._tag === "Failed").length
  }
})

export const hasFailures = (report: Report): boolean => report.totals.failed > 0

const formatStats = (stats: ValueStats): string =>
  `objects=${stats.objects}, arrays=${stats.arrays}, strings=${stats.strings}, ` +
  `numbers=${stats.numbers}, booleans=${stats.booleans}, nulls=${stats.nulls}, ` +
  `keys=${stats.keys}, maxDepth=${stats.maxDepth}`

const formatOutcome = (outcome: FileOutcome, command: CliCommand): ReadonlyArray<string> =>
  Match.value(outcome).pipe(
    Match.when({ _tag: "Parsed" }, (value) =>
      command === "stats"
        ? [`ok ${value.file}`, `  ${formatStats(value.stats)}`]
        : [`ok ${value.file}`]),
    Match.when({ _tag: "Failed" }, (value) => [`error ${value.file} ${value.error}`]),
    Match.exhaustive
  )

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @param command - `stats` adds a counts line under every parsed file.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report, command: CliCommand): string => {
  const lines = report.files.flatMap((outcome) => formatOutcome(outcome, command))
  return [
    ...lines,
    `Totals: parsed=${report.totals.parsed}, failed=${report.totals.failed}`
  ].join("\n")
}

export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      files: report.files.map((outcome) =>
        outcome._tag === "Parsed"
          ? { file: outcome.file, status: "parsed", stats: outcome.stats }
          : { file: outcome.file, status: "failed", error: outcome.error }
      ),
      totals: report.totals
    },
    null,
    2
  )
