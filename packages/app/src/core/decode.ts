import * as Either from "effect/Either"

import type { FormatError } from "./errors.js"
import { formatError } from "./errors.js"
import type { UnknownObject } from "./json.js"
import { hasKey, isJsonArray, isJsonObject, ownValue } from "./json.js"
import type { DependencyReport, ObjectEntry } from "./model.js"
import { emptyObject, makeDependencyReport, objectWithDependencies } from "./model.js"

// CHANGE: decode the slib_analysis document into a DependencyReport
// WHY: reject foreign documents early and keep sentinels out of downstream logic
// QUOTE(TZ): "reject documents lacking the slib_analysis marker as a format error"
// REF: req-decode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: decode(d) = Right(r) → "slib_analysis" ∈ keys(d)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: "EMPTY" never survives decoding as a string
// COMPLEXITY: O(n log n) where n = number of object files

export const ANALYSIS_MARKER = "slib_analysis"
export const LIBRARY_KEY = "Static library"
export const CONTENT_KEY = "Content"
export const DEPENDENCIES_KEY = "Dependencies"
export const EMPTY_SENTINEL = "EMPTY"

const notAnAnalysis = (detail: string): FormatError => formatError(`Not an analysis result: ${detail}`)

const readStringArray = (
  objectName: string,
  value: unknown
): Either.Either<ReadonlyArray<string>, FormatError> => {
  if (!isJsonArray(value)) {
    return Either.left(notAnAnalysis(`"${objectName}" has no ${DEPENDENCIES_KEY} array`))
  }
  const result: Array<string> = []
  for (const item of value) {
    if (typeof item !== "string") {
      return Either.left(notAnAnalysis(`"${objectName}" lists a dependency that is not a string`))
    }
    result.push(item)
  }
  return Either.right(result)
}

const decodeEntry = (
  objectName: string,
  value: unknown
): Either.Either<ObjectEntry, FormatError> => {
  if (value === EMPTY_SENTINEL) {
    return Either.right(emptyObject)
  }
  if (!isJsonObject(value)) {
    return Either.left(
      notAnAnalysis(`"${objectName}" must be "${EMPTY_SENTINEL}" or an object with ${DEPENDENCIES_KEY}`)
    )
  }
  return Either.map(readStringArray(objectName, ownValue(value, DEPENDENCIES_KEY)), objectWithDependencies)
}

const decodeContent = (
  content: UnknownObject
): Either.Either<ReadonlyArray<readonly [string, ObjectEntry]>, FormatError> => {
  const entries: Array<readonly [string, ObjectEntry]> = []
  for (const [name, value] of Object.entries(content)) {
    const decoded = decodeEntry(name, value)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    entries.push([name, decoded.right])
  }
  return Either.right(entries)
}

/**
 * Decode a parsed JSON document into a typed DependencyReport.
 *
 * @param document - Raw JSON.parse result; object keys are read as own properties.
 * @returns Either with the report or a FormatError naming the first defect.
 *
 * @pure true
 * @invariant Right(report) → report.objects is sorted by name
 * @complexity O(n log n)
 */
export const decodeDependencyReport = (
  document: unknown
): Either.Either<DependencyReport, FormatError> => {
  if (!isJsonObject(document)) {
    return Either.left(notAnAnalysis("the document is not an object"))
  }
  if (!hasKey(document, ANALYSIS_MARKER)) {
    return Either.left(notAnAnalysis(`missing "${ANALYSIS_MARKER}" marker`))
  }
  const libraryName = ownValue(document, LIBRARY_KEY)
  if (typeof libraryName !== "string") {
    return Either.left(notAnAnalysis(`"${LIBRARY_KEY}" must be a string`))
  }
  const content = ownValue(document, CONTENT_KEY)
  if (!isJsonObject(content)) {
    return Either.left(notAnAnalysis(`"${CONTENT_KEY}" must be an object`))
  }
  return Either.map(decodeContent(content), (entries) => makeDependencyReport(libraryName, entries))
}
