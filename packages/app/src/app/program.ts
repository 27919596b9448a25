import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { summarizeEmpty, summarizeLeaves } from "../core/classify.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import type { DependencyReport } from "../core/model.js"
import { longestObjectName } from "../core/model.js"
import { renderHuman, renderJson } from "../core/render.js"
import type { AnalysisOutput } from "../core/types.js"
import { verify } from "../core/verify.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readObjectList } from "../shell/object-list-file.js"
import { readDependencyReport } from "../shell/report-file.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "raw report → Report Model → Classifier or Verifier → Reporter"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: AnalysisOutput
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

// stdout carries only the rendered output
const stderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.stringLogger))

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitOutput = (output: AnalysisOutput, json: boolean, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  return writeStdout(json ? renderJson(output) : renderHuman(output))
}

const handleLeaves = (report: DependencyReport): Effect.Effect<AnalysisOutput, AppError> =>
  Effect.map(fromEither(summarizeLeaves(report)), (summary) => ({ mode: "leaves" as const, summary }))

const handleEmpty = (report: DependencyReport): Effect.Effect<AnalysisOutput, AppError> =>
  Effect.map(fromEither(summarizeEmpty(report)), (summary) => ({ mode: "empty" as const, summary }))

const handleVerify = (
  report: DependencyReport,
  listPath: string
): Effect.Effect<AnalysisOutput, AppError, FileSystemService> =>
  Effect.map(readObjectList(listPath), (names) => ({
    mode: "verify" as const,
    source: listPath,
    nameWidth: longestObjectName(report),
    result: verify(report, names)
  }))

const analyze = (
  cli: CliArgs,
  report: DependencyReport
): Effect.Effect<AnalysisOutput, AppError, FileSystemService> =>
  Match.value(cli.task).pipe(
    Match.when({ command: "leaves" }, () => handleLeaves(report)),
    Match.when({ command: "empty" }, () => handleEmpty(report)),
    Match.when({ command: "verify" }, (task) => handleVerify(report, task.listPath)),
    Match.exhaustive
  )

const exitCodeFor = (output: AnalysisOutput, config: ResolvedConfig): number =>
  config.failOnIncomplete && output.mode === "verify" && !output.result.complete ? 2 : 0

const runParsed = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath ?? DEFAULT_CONFIG_PATH, cli.configPathExplicit))
    const config = yield* _(fromEither(resolveConfig(cli, configFile)))
    const report = yield* _(readDependencyReport(config.reportPath))
    const output = yield* _(analyze(cli, report))
    yield* _(emitOutput(output, config.json, cli.silent))
    return { output, exitCode: exitCodeFor(output, config) }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the structured output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console (output on stdout, diagnostics on stderr)
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const level = cli.verbose ? LogLevel.Debug : LogLevel.Info
    return yield* _(runParsed(cli).pipe(Logger.withMinimumLogLevel(level), Effect.provide(stderrLogger)))
  })
