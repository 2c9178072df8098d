import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { makeFormatter, resolveConfig } from "../core/config.js"
import { type AppError, formatAppError } from "../core/errors.js"
import { valueFromJson } from "../core/from-json.js"
import type { Json } from "../core/json.js"
import type { Rendered } from "../core/render.js"
import { padRendered, renderValue } from "../core/render.js"
import { builtinThemes } from "../core/theme.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocuments } from "../shell/input.js"
import { loggerLayer } from "../shell/logging.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, never, FileSystem>
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0, 1}
// INVARIANT: stdout receives one line per rendered value; errors go to stderr
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly rendered: ReadonlyArray<Rendered>
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(`${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitLines = (lines: ReadonlyArray<string>, silent: boolean): Effect.Effect<void> =>
  silent || lines.length === 0 ? Effect.void : writeStdout(lines.join("\n"))

const renderDocument = (
  config: ResolvedConfig,
  document: Json
): Effect.Effect<Rendered, AppError> =>
  Effect.gen(function*(_) {
    const formatter = makeFormatter(config)
    const value = valueFromJson(document, { objects: config.objects })
    const rendered = yield* _(fromEither(renderValue(formatter, value, config.format)))
    yield* _(
      Effect.logDebug("rendered value").pipe(
        Effect.annotateLogs({ length: rendered.text.length, invisible: rendered.invisible })
      )
    )
    return config.width === undefined ? rendered : padRendered(rendered, config.width)
  })

const handleRender = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = yield* _(fromEither(resolveConfig(cli, fileConfig)))
    yield* _(
      Effect.logDebug("resolved configuration").pipe(
        Effect.annotateLogs({ theme: config.theme.name, mode: config.mode, locale: config.formatProvider.locale })
      )
    )
    const documents = yield* _(readDocuments(cli.inputPath, cli.lines))
    const rendered = yield* _(Effect.forEach(documents, (document) => renderDocument(config, document)))
    yield* _(emitLines(rendered.map((line) => line.text), cli.silent))
    return { rendered, exitCode: 0 }
  })

const handleThemes = (cli: CliArgs): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    yield* _(emitLines(builtinThemes.map((theme) => theme.name), cli.silent))
    return { rendered: [], exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("render", () => handleRender(cli)),
    Match.when("themes", () => handleThemes(cli)),
    Match.exhaustive
  )

const reportFailure = (error: AppError): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    yield* _(writeStderr(formatAppError(error)))
    return { rendered: [], exitCode: 1 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered values and exit code.
 *
 * @pure false
 * @effect FileSystem, stdin, stdout, stderr
 * @invariant failures are reported on stderr and yield exitCode 1
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const parsed = parseCliArgs(argv)
    if (parsed._tag === "Left") {
      return yield* _(reportFailure(parsed.left))
    }
    const cli = parsed.right
    return yield* _(
      executeCommand(cli).pipe(
        Effect.catchAll(reportFailure),
        Effect.provide(loggerLayer(cli.verbose))
      )
    )
  })
