import * as Either from "effect/Either"

import type { DivisionUndefined } from "./errors.js"
import { divisionUndefined } from "./errors.js"
import type { DependencyReport } from "./model.js"

// CHANGE: classify object files into leaves, non-empty and empty sets
// WHY: answer "which object files stand alone" and "which are empty" with ratios
// QUOTE(TZ): "partitions object files into empty vs. non-empty, and within non-empty, identifies leaves"
// REF: req-classify-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: |leaves(r)| ≤ nonEmpty(r) ∧ nonEmpty(r) + empty(r) = |objects(r)|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: percentages are never computed over an empty population
// COMPLEXITY: O(n)

export interface LeafSet {
  readonly leaves: ReadonlyArray<string>
  readonly nonEmptyCount: number
}

export interface EmptySet {
  readonly empty: ReadonlyArray<string>
  readonly emptyCount: number
  readonly nonEmptyCount: number
}

export interface LeafSummary {
  readonly libraryName: string
  readonly leaves: ReadonlyArray<string>
  readonly leafCount: number
  readonly nonEmptyCount: number
  readonly emptyCount: number
  readonly percentOfNonEmpty: number
  readonly percentOfAll: number
}

export interface EmptySummary {
  readonly libraryName: string
  readonly empty: ReadonlyArray<string>
  readonly emptyCount: number
  readonly nonEmptyCount: number
  readonly percentOfAll: number
}

/**
 * List non-empty object files without dependencies.
 *
 * @pure true
 * @invariant leaves follow the report's lexicographic order
 * @complexity O(n)
 */
export const findLeaves = (report: DependencyReport): LeafSet => {
  const leaves: Array<string> = []
  let nonEmptyCount = 0
  for (const [name, entry] of report.objects) {
    if (entry._tag === "WithDependencies") {
      nonEmptyCount += 1
      if (entry.dependencies.length === 0) {
        leaves.push(name)
      }
    }
  }
  return { leaves, nonEmptyCount }
}

/**
 * Partition object files by variant and list the empty ones.
 *
 * @pure true
 * @invariant emptyCount + nonEmptyCount = |objects|
 * @complexity O(n)
 */
export const findEmpty = (report: DependencyReport): EmptySet => {
  const empty: Array<string> = []
  for (const [name, entry] of report.objects) {
    if (entry._tag === "Empty") {
      empty.push(name)
    }
  }
  return {
    empty,
    emptyCount: empty.length,
    nonEmptyCount: report.objects.size - empty.length
  }
}

/**
 * Integer percentage of part over whole; halves round up.
 *
 * @param label - Names the population in the DivisionUndefined message.
 *
 * @pure true
 * @invariant Right(p) → whole > 0
 * @complexity O(1)
 */
export const percentOf = (
  part: number,
  whole: number,
  label = "objects"
): Either.Either<number, DivisionUndefined> =>
  whole === 0
    ? Either.left(divisionUndefined(part, whole, label))
    : Either.right(Math.floor((200 * part + whole) / (2 * whole)))

/**
 * Leaves with both ratios: over non-empty object files and over all of them.
 *
 * @pure true
 * @invariant Left when the report has no non-empty object file
 * @complexity O(n)
 */
export const summarizeLeaves = (
  report: DependencyReport
): Either.Either<LeafSummary, DivisionUndefined> => {
  const { leaves, nonEmptyCount } = findLeaves(report)
  const emptyCount = report.objects.size - nonEmptyCount
  const leafCount = leaves.length
  return Either.all({
    percentOfNonEmpty: percentOf(leafCount, nonEmptyCount, "non-empty object files"),
    percentOfAll: percentOf(leafCount, nonEmptyCount + emptyCount, "object files")
  }).pipe(
    Either.map((ratios) => ({
      libraryName: report.libraryName,
      leaves,
      leafCount,
      nonEmptyCount,
      emptyCount,
      ...ratios
    }))
  )
}

/**
 * Empty object files with their share of the whole library.
 *
 * @pure true
 * @invariant Left only when the report has no object file at all
 * @complexity O(n)
 */
export const summarizeEmpty = (
  report: DependencyReport
): Either.Either<EmptySummary, DivisionUndefined> => {
  const { empty, emptyCount, nonEmptyCount } = findEmpty(report)
  return Either.map(
    percentOf(emptyCount, emptyCount + nonEmptyCount, "object files"),
    (percentOfAll) => ({
      libraryName: report.libraryName,
      empty,
      emptyCount,
      nonEmptyCount,
      percentOfAll
    })
  )
}
