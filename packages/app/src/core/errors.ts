import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the static library analyzer
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): "FormatError and I/O-level errors abort the run with a user-facing message"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly path: string; readonly reason: string }
export type FormatError = { readonly _tag: "FormatError"; readonly message: string }
export type DivisionUndefined = {
  readonly _tag: "DivisionUndefined"
  readonly part: number
  readonly whole: number
  readonly message: string
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | FormatError
  | DivisionUndefined

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (path: string, reason: string): FileError => ({
  _tag: "FileError",
  path,
  reason
})

export const formatError = (message: string): FormatError => ({
  _tag: "FormatError",
  message
})

export const divisionUndefined = (part: number, whole: number, label: string): DivisionUndefined => ({
  _tag: "DivisionUndefined",
  part,
  whole,
  message: `cannot compute ${part}/${whole} as a percentage: there are no ${label}`
})

/**
 * Render an error as the single line printed on stderr.
 *
 * @pure true
 * @invariant output never ends with a newline
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `Invalid arguments: ${value.message}`),
    Match.tag("ConfigError", (value) => `Invalid configuration: ${value.message}`),
    Match.tag("FileError", (value) => `I/O error on '${value.path}': ${value.reason}`),
    Match.tag("FormatError", (value) => value.message),
    Match.tag("DivisionUndefined", (value) => `Statistics unavailable: ${value.message}`),
    Match.exhaustive
  )
