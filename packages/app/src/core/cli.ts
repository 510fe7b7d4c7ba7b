import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_DEPTH_LIMIT } from "./parser.js"

// CHANGE: deterministic CLI parsing for json-tree-reader
// WHY: keep CLI decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "stats"

export interface CliArgs {
  readonly command: CliCommand
  readonly files: ReadonlyArray<string>
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly maxDepth: number | undefined
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_CONFIG_PATH = "./.json-tree-reader.json"

const isFlag = (value: string): boolean => value.startsWith("-")

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const parsePositiveInteger = (flagName: string, value: string): Either.Either<number, CliError> => {
  const parsed = Number(value)
  if (!/^\d+$/u.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    return Either.left(cliError(`--${flagName} must be a positive integer, got: ${value}`))
  }
  if (parsed > MAX_DEPTH_LIMIT) {
    return Either.left(cliError(`--${flagName} must not exceed ${MAX_DEPTH_LIMIT}, got: ${value}`))
  }
  return Either.right(parsed)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("stats", () => Either.right<CliCommand>("stats")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  files: [],
  configPath: DEFAULT_CONFIG_PATH,
  configPathExplicit: false,
  maxDepth: undefined,
  json: false,
  silent: false,
  verbose: false
})

interface ParsedFlag {
  readonly next: CliArgs
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

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        files: [...args.files, ...splitList(value)]
      })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parsePositiveInteger("max-depth", value), (maxDepth) => ({
        ...args,
        maxDepth
      })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
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

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "check", startIndex: 0 })
  }
  const commandEither = parseCommand(first)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  return Either.right({ command: commandEither.right, startIndex: 1 })
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to check when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
}
