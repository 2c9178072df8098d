import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: deterministic CLI parsing for the themed JSON renderer
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "render" | "themes"

export interface CliArgs {
  readonly command: CliCommand
  readonly inputPath: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly theme: string | undefined
  readonly format: string | undefined
  readonly locale: string | undefined
  readonly width: number | undefined
  readonly display: boolean | undefined
  readonly dictionaries: boolean | undefined
  readonly lines: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const stdinPath = "-"

export const defaultConfigPath = "./.themed-json.json"

const isFlag = (value: string): boolean => value.startsWith("--")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseWidth = (value: string): Either.Either<number, CliError> => {
  const width = Number(value)
  return Number.isSafeInteger(width) && width >= 0
    ? Either.right(width)
    : Either.left(cliError(`Invalid width: ${value}`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("render", () => Either.right<CliCommand>("render")),
    Match.when("themes", () => Either.right<CliCommand>("themes")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  inputPath: stdinPath,
  configPath: defaultConfigPath,
  configPathExplicit: false,
  theme: undefined,
  format: undefined,
  locale: undefined,
  width: undefined,
  display: undefined,
  dictionaries: undefined,
  lines: false,
  silent: false,
  verbose: false
})

type FlagStep = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const setParsedFlag = (next: CliArgs, consumed: number): FlagStep => Either.right({ next, consumed })

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

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): FlagStep =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): FlagStep => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue) &&
    Either.isRight(parseBoolean(nextValue))
  const resolved = inlineValue ?? (useNext && nextValue !== undefined ? nextValue : "true")
  return Either.map(parseBoolean(resolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagStep

const flagParsers: Record<string, FlagParser> = {
  lines: (current) => setParsedFlag({ ...current, lines: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  display: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({ ...args, display: value })),
  dictionaries: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({ ...args, dictionaries: value })),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, inputPath: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  theme: (current, inlineValue, nextValue) =>
    parseValueFlag("theme", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, theme: value })),
  format: (current, inlineValue, nextValue) =>
    parseValueFlag("format", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, format: value })),
  locale: (current, inlineValue, nextValue) =>
    parseValueFlag("locale", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, locale: value })),
  width: (current, inlineValue, nextValue) =>
    parseValueFlag("width", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseWidth(value), (width) => ({ ...args, width })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): FlagStep => {
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
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
    return Either.right({ command: "render", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
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
 * @invariant command defaults to render when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
  )
}
