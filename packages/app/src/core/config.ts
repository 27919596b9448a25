import * as Either from "effect/Either"

import type { CliArgs } from "./cli.js"
import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Precedence: CLI > file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved reportPath is always defined
// COMPLEXITY: O(1)/O(1)

export const DEFAULT_CONFIG_PATH = "./.slib-deps.json"

export interface FileConfig {
  readonly report?: string
  readonly json?: boolean
  readonly failOnIncomplete?: boolean
}

export interface ResolvedConfig {
  readonly reportPath: string
  readonly json: boolean
  readonly failOnIncomplete: boolean
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .slib-deps.json.
 * @returns Resolved configuration, or ConfigError when no report path is known.
 *
 * @pure true
 * @invariant Right(c) → c.reportPath.length > 0
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<ResolvedConfig, ConfigError> => {
  const reportPath = cli.reportPath ?? fileConfig?.report
  if (reportPath === undefined || reportPath.length === 0) {
    return Either.left(configError("no report given: pass <report.json>, --report, or set \"report\" in the config file"))
  }
  return Either.right({
    reportPath,
    json: cli.json ?? fileConfig?.json ?? false,
    failOnIncomplete: cli.failOnIncomplete ?? fileConfig?.failOnIncomplete ?? false
  })
}
