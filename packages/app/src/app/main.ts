#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "FormatError and I/O-level errors abort the run with a user-facing message"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult, or 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${renderAppError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer), { disablePrettyLogger: true })
