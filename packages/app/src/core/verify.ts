import type { DependencyReport } from "./model.js"
import { dependenciesOf } from "./model.js"

// CHANGE: verify that a list of object files is dependency-complete
// WHY: tell the caller exactly which declared dependencies a candidate subset lacks
// QUOTE(TZ): "missing is empty iff the input list is self-contained"
// REF: req-verify-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o ∈ missing: o.dependencies = deps(o) \ names ≠ ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: entries.length = names.length and entries keep input order
// COMPLEXITY: O(n + d) where n = names, d = total declared dependencies

export type VerificationEntry =
  | {
    readonly _tag: "Found"
    readonly name: string
    readonly dependencies: ReadonlyArray<string>
    readonly empty: boolean
  }
  | { readonly _tag: "NotFound"; readonly name: string }

export interface MissingDependencies {
  readonly name: string
  readonly dependencies: ReadonlyArray<string>
}

export interface VerificationResult {
  readonly libraryName: string
  readonly entries: ReadonlyArray<VerificationEntry>
  readonly missing: ReadonlyArray<MissingDependencies>
  readonly complete: boolean
}

const lookupEntry = (report: DependencyReport, name: string): VerificationEntry => {
  const entry = report.objects.get(name)
  if (entry === undefined) {
    return { _tag: "NotFound", name }
  }
  return {
    _tag: "Found",
    name,
    dependencies: dependenciesOf(entry),
    empty: entry._tag === "Empty"
  }
}

const absentFrom = (
  members: ReadonlySet<string>,
  dependencies: ReadonlyArray<string>
): ReadonlyArray<string> => [...new Set(dependencies)].filter((dependency) => !members.has(dependency))

/**
 * Check a candidate list of object files against the report.
 *
 * @param report - Decoded dependency report.
 * @param names - Candidate names; duplicates and unknown names are allowed.
 * @returns Per-name listing plus the members with missing dependencies.
 *
 * @pure true
 * @invariant complete ⇔ missing.length = 0
 * @complexity O(n + d)
 */
export const verify = (
  report: DependencyReport,
  names: ReadonlyArray<string>
): VerificationResult => {
  const members: ReadonlySet<string> = new Set(names)
  const entries = names.map((name) => lookupEntry(report, name))
  const checked = new Set<string>()
  const missing: Array<MissingDependencies> = []
  for (const entry of entries) {
    if (entry._tag === "NotFound" || checked.has(entry.name)) {
      continue
    }
    checked.add(entry.name)
    const absent = absentFrom(members, entry.dependencies)
    if (absent.length > 0) {
      missing.push({ name: entry.name, dependencies: absent })
    }
  }
  return {
    libraryName: report.libraryName,
    entries,
    missing,
    complete: missing.length === 0
  }
}
