import { Match } from "effect"

import type { EmptySummary, LeafSummary } from "./classify.js"
import type { AnalysisOutput } from "./types.js"
import type { MissingDependencies, VerificationEntry, VerificationResult } from "./verify.js"

// CHANGE: render analysis outputs as text and JSON
// WHY: keep reporting pure and deterministic across CLI modes
// QUOTE(TZ): "textual rendering ... is an external Reporter concern"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o: lines(renderHuman(o)) follow the order of o's lists
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rendering never recomputes counts or ratios
// COMPLEXITY: O(n)

export const OBJ_FILE_HEADER = "OBJ_FILE"

const formatList = (values: ReadonlyArray<string>): ReadonlyArray<string> => values.map((value) => `- ${value}`)

const renderLeaves = (summary: LeafSummary): ReadonlyArray<string> => [
  `Non-empty object files in '${summary.libraryName}' that do not depend on any others are:`,
  ...formatList(summary.leaves),
  "",
  "This represents:",
  `- ${summary.leafCount}/${summary.nonEmptyCount} of all non-empty object files or about ${summary.percentOfNonEmpty}%.`,
  `- ${summary.leafCount}/${
    summary.nonEmptyCount + summary.emptyCount
  } of all object files or about ${summary.percentOfAll}%.`
]

const renderEmpty = (summary: EmptySummary): ReadonlyArray<string> => {
  if (summary.emptyCount === 0) {
    return [`There is no empty object file in ${summary.libraryName}`]
  }
  return [
    `Empty object files in '${summary.libraryName}' are:`,
    ...formatList(summary.empty),
    "",
    `This represents ${summary.emptyCount}/${
      summary.emptyCount + summary.nonEmptyCount
    } of all object files or about ${summary.percentOfAll}%.`
  ]
}

const columnHeader = (nameWidth: number, label: string): string =>
  `  ${OBJ_FILE_HEADER.padEnd(nameWidth)} <- ${label}`

const row = (nameWidth: number, name: string, value: string): string => `- ${name.padEnd(nameWidth)} <- ${value}`

const describeDependencies = (entry: Extract<VerificationEntry, { readonly _tag: "Found" }>): string => {
  if (entry.empty) {
    return "Empty object file"
  }
  return entry.dependencies.length === 0 ? "No dependencies" : entry.dependencies.join(", ")
}

const renderEntry = (nameWidth: number) => (entry: VerificationEntry): string =>
  Match.value(entry).pipe(
    Match.tag("Found", (found) => row(nameWidth, found.name, describeDependencies(found))),
    Match.tag("NotFound", (absent) => `- No object file '${absent.name}' found`),
    Match.exhaustive
  )

const renderMissing = (nameWidth: number, missing: ReadonlyArray<MissingDependencies>): ReadonlyArray<string> => [
  "",
  "This list of object files is INCOMPLETE:",
  columnHeader(nameWidth, "MISSING_DEPENDENCIES"),
  ...missing.map((item) => row(nameWidth, item.name, item.dependencies.join(", ")))
]

const renderVerification = (
  result: VerificationResult,
  source: string,
  nameWidth: number
): ReadonlyArray<string> => {
  const width = Math.max(nameWidth, OBJ_FILE_HEADER.length)
  return [
    `Dependencies in '${result.libraryName}' of the ${result.entries.length} object files from '${source}':`,
    columnHeader(width, "DEPENDENCIES"),
    ...result.entries.map(renderEntry(width)),
    ...(result.complete ? ["This list of object files is COMPLETE"] : renderMissing(width, result.missing))
  ]
}

/**
 * Render an analysis output as human-readable text.
 *
 * @param output - Structured result of one CLI mode.
 * @returns Multi-line string for stdout, without a trailing newline.
 *
 * @pure true
 * @invariant list lines keep the order of the structured result
 * @complexity O(n)
 */
export const renderHuman = (output: AnalysisOutput): string => {
  const lines = Match.value(output).pipe(
    Match.when({ mode: "leaves" }, (value) => renderLeaves(value.summary)),
    Match.when({ mode: "empty" }, (value) => renderEmpty(value.summary)),
    Match.when({ mode: "verify" }, (value) => renderVerification(value.result, value.source, value.nameWidth)),
    Match.exhaustive
  )
  return lines.join("\n")
}

const verificationJson = (result: VerificationResult, source: string) => ({
  mode: "verify",
  libraryName: result.libraryName,
  source,
  complete: result.complete,
  entries: result.entries.map((entry) =>
    entry._tag === "Found"
      ? { name: entry.name, found: true, empty: entry.empty, dependencies: entry.dependencies }
      : { name: entry.name, found: false }
  ),
  missing: result.missing
})

/**
 * Render an analysis output as JSON text.
 *
 * @pure true
 * @invariant every payload carries a mode field
 * @complexity O(n)
 */
export const renderJson = (output: AnalysisOutput): string => {
  const payload = Match.value(output).pipe(
    Match.when({ mode: "leaves" }, (value) => ({ mode: "leaves", ...value.summary })),
    Match.when({ mode: "empty" }, (value) => ({ mode: "empty", ...value.summary })),
    Match.when({ mode: "verify" }, (value) => verificationJson(value.result, value.source)),
    Match.exhaustive
  )
  return JSON.stringify(payload, null, 2)
}
