import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for slib-deps
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "print non-empty object files that do not depend on any others (default behavior)"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.task.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "leaves" | "empty" | "verify"

export type CliTask =
  | { readonly command: "leaves" }
  | { readonly command: "empty" }
  | { readonly command: "verify"; readonly listPath: string }

export interface CliArgs {
  readonly task: CliTask
  readonly reportPath: string | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly json: boolean | undefined
  readonly silent: boolean
  readonly verbose: boolean
  readonly failOnIncomplete: boolean | undefined
}

interface RawCliArgs extends Omit<CliArgs, "task"> {
  readonly command: CliCommand
  readonly listPath: string | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("leaves", () => Either.right<CliCommand>("leaves")),
    Match.when("empty", () => Either.right<CliCommand>("empty")),
    Match.when("verify", () => Either.right<CliCommand>("verify")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): RawCliArgs => ({
  command,
  reportPath: undefined,
  listPath: undefined,
  configPath: undefined,
  configPathExplicit: false,
  json: undefined,
  silent: false,
  verbose: false,
  failOnIncomplete: undefined
})

interface ParsedFlag {
  readonly next: RawCliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: RawCliArgs): Either.Either<ParsedFlag, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = (
  flagName: string,
  current: RawCliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: RawCliArgs, value: string) => RawCliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

type FlagParser = (
  current: RawCliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }),
  silent: (current) => setParsedFlag({ ...current, silent: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  "fail-on-incomplete": (current) => setParsedFlag({ ...current, failOnIncomplete: true }),
  report: (current, inlineValue, nextValue) =>
    parseValueFlag("report", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      reportPath: value
    })),
  list: (current, inlineValue, nextValue) =>
    parseValueFlag("list", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      listPath: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: RawCliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parsePositional = (
  value: string,
  current: RawCliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (current.reportPath !== undefined) {
    return Either.left(cliError(`Unexpected positional argument: ${value}`))
  }
  return setParsedFlag({ ...current, reportPath: value })
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): ParsedCommand => {
  const first = rawArgs[0]
  const command = first === undefined ? undefined : Either.getRight(parseCommand(first))
  if (command === undefined || command._tag === "None") {
    return { command: "leaves", startIndex: 0 }
  }
  return { command: command.value, startIndex: 1 }
}

const parseArgs = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: RawCliArgs
): Either.Either<RawCliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    const parsed = isFlag(current)
      ? parseFlag(current, rawArgs[index + 1], args)
      : parsePositional(current, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const toTask = (args: RawCliArgs): Either.Either<CliTask, CliError> => {
  if (args.command === "verify") {
    return args.listPath === undefined
      ? Either.left(cliError("verify requires --list <object_list>"))
      : Either.right<CliTask>({ command: "verify", listPath: args.listPath })
  }
  if (args.listPath !== undefined) {
    return Either.left(cliError(`--list is only accepted by verify, not ${args.command}`))
  }
  return Either.right<CliTask>({ command: args.command })
}

const checkCommandFlags = (args: RawCliArgs): Either.Either<CliArgs, CliError> =>
  Either.map(toTask(args), (task) => ({
    task,
    reportPath: args.reportPath,
    configPath: args.configPath,
    configPathExplicit: args.configPathExplicit,
    json: args.json,
    silent: args.silent,
    verbose: args.verbose,
    failOnIncomplete: args.failOnIncomplete
  }))

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant task defaults to leaves when omitted; a verify task always carries its list path
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const parsed = parseCommandFromArgs(rawArgs)
  return Either.flatMap(
    parseArgs(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
    checkCommandFlags
  )
}
