import { Data, Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: error algebra for the renderer core and the CLI boundary
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// INVARIANT: InvalidArgument is the only error the rendering core raises
// COMPLEXITY: O(1)/O(1)

export class InvalidArgument extends Data.TaggedError("InvalidArgument")<{
  readonly argument: string
  readonly message: string
}> {}

export const invalidArgument = (argument: string): InvalidArgument =>
  new InvalidArgument({ argument, message: `Value cannot be absent: ${argument}` })

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type InputError = {
  readonly _tag: "InputError"
  readonly line: number | undefined
  readonly message: string
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | InputError
  | InvalidArgument

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const inputError = (message: string, line?: number): InputError => ({
  _tag: "InputError",
  line,
  message
})

/**
 * Render an AppError as a single human-readable line.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `Invalid arguments: ${value.message}`),
    Match.tag("ConfigError", (value) => `Invalid configuration: ${value.message}`),
    Match.tag("FileError", (value) => `File error: ${value.message}`),
    Match.tag("InputError", (value) =>
      value.line === undefined
        ? `Invalid input: ${value.message}`
        : `Invalid input at line ${value.line}: ${value.message}`),
    Match.tag("InvalidArgument", (value) => value.message),
    Match.exhaustive
  )
