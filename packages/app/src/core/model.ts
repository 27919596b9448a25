// CHANGE: define the typed dependency report of a static library
// WHY: replace the "EMPTY" sentinel with a tagged variant once, at the model boundary
// QUOTE(TZ): "ObjectEntry — polymorphic over two variants: Empty | WithDependencies"
// REF: req-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ObjectEntry: e._tag ∈ {"Empty","WithDependencies"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: DependencyReport.objects iterates in lexicographic key order
// COMPLEXITY: O(1)/O(1)

export type EmptyObject = { readonly _tag: "Empty" }

export type ObjectWithDependencies = {
  readonly _tag: "WithDependencies"
  readonly dependencies: ReadonlyArray<string>
}

export type ObjectEntry = EmptyObject | ObjectWithDependencies

export interface DependencyReport {
  readonly libraryName: string
  readonly objects: ReadonlyMap<string, ObjectEntry>
}

export const emptyObject: EmptyObject = { _tag: "Empty" }

export const objectWithDependencies = (
  dependencies: ReadonlyArray<string>
): ObjectWithDependencies => ({
  _tag: "WithDependencies",
  dependencies
})

export const compareNames = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

/**
 * Build a report whose object map iterates in lexicographic name order.
 *
 * @param libraryName - Name of the analyzed static library.
 * @param entries - Object entries in any order; later duplicates win.
 * @returns Immutable DependencyReport.
 *
 * @pure true
 * @invariant keys(objects) are sorted by UTF-16 code units
 * @complexity O(n log n)
 */
export const makeDependencyReport = (
  libraryName: string,
  entries: Iterable<readonly [string, ObjectEntry]>
): DependencyReport => {
  const byName = new Map<string, ObjectEntry>(entries)
  const names = [...byName.keys()].toSorted(compareNames)
  const objects = new Map<string, ObjectEntry>()
  for (const name of names) {
    const entry = byName.get(name)
    if (entry !== undefined) {
      objects.set(name, entry)
    }
  }
  return { libraryName, objects }
}

export const dependenciesOf = (entry: ObjectEntry): ReadonlyArray<string> =>
  entry._tag === "Empty" ? [] : entry.dependencies

export const longestObjectName = (report: DependencyReport, minimum = 0): number => {
  let width = minimum
  for (const name of report.objects.keys()) {
    width = Math.max(width, name.length)
  }
  return width
}
