import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "./cli.js"
import type { FormatProvider } from "./display-formatter.js"
import { invariantProvider, makeDisplayValueFormatter, makeFormatProvider } from "./display-formatter.js"
import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"
import type { ThemedValueFormatter } from "./formatter.js"
import type { ObjectMode } from "./from-json.js"
import { makeJsonValueFormatter } from "./json-formatter.js"
import type { AnsiStyles, ConsoleTheme } from "./theme.js"
import { builtinThemes, findTheme, literateTheme, withStyleOverrides } from "./theme.js"

// CHANGE: define config merging rules and defaults
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// INVARIANT: the resolved theme is always a known theme, optionally with style overrides
// INVARIANT: the resolved locale is a well-formed BCP 47 tag
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly theme?: string
  readonly styles?: AnsiStyles
  readonly locale?: string
  readonly format?: string
  readonly width?: number
  readonly display?: boolean
  readonly dictionaries?: boolean
}

export type RenderMode = "json" | "display"

export interface ResolvedConfig {
  readonly theme: ConsoleTheme
  readonly formatProvider: FormatProvider
  readonly format: string | undefined
  readonly width: number | undefined
  readonly mode: RenderMode
  readonly objects: ObjectMode
}

const resolveTheme = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<ConsoleTheme, ConfigError> => {
  const name = cli.theme ?? fileConfig?.theme
  const base = name === undefined ? Option.some(literateTheme) : findTheme(name)
  if (Option.isNone(base)) {
    const known = builtinThemes.map((theme) => theme.name).join(", ")
    return Either.left(configError(`Unknown theme: ${name ?? ""} (expected one of ${known})`))
  }
  const styles = fileConfig?.styles
  return Either.right(styles === undefined ? base.value : withStyleOverrides(base.value, styles))
}

const resolveFormatProvider = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<FormatProvider, ConfigError> => {
  const locale = cli.locale ?? fileConfig?.locale
  if (locale === undefined) {
    return Either.right(invariantProvider)
  }
  return Either.try({
    try: () => {
      Intl.getCanonicalLocales(locale)
      return makeFormatProvider(locale)
    },
    catch: () => configError(`Invalid locale: ${locale}`)
  })
}

const resolveMode = (cli: CliArgs, fileConfig: FileConfig | undefined): RenderMode =>
  (cli.display ?? fileConfig?.display ?? false) ? "display" : "json"

const resolveObjects = (cli: CliArgs, fileConfig: FileConfig | undefined): ObjectMode =>
  (cli.dictionaries ?? fileConfig?.dictionaries ?? false) ? "dictionary" : "structure"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .themed-json.json.
 * @returns Resolved configuration, or a ConfigError for an unknown theme or a malformed locale tag.
 *
 * @pure true
 * @invariant CLI flags override the file; the file overrides defaults
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<ResolvedConfig, ConfigError> =>
  Either.flatMap(resolveTheme(cli, fileConfig), (theme) =>
    Either.map(resolveFormatProvider(cli, fileConfig), (formatProvider) => ({
      theme,
      formatProvider,
      format: cli.format ?? fileConfig?.format,
      width: cli.width ?? fileConfig?.width,
      mode: resolveMode(cli, fileConfig),
      objects: resolveObjects(cli, fileConfig)
    })))

export const makeFormatter = (config: ResolvedConfig): ThemedValueFormatter =>
  config.mode === "display"
    ? makeDisplayValueFormatter(config.theme, config.formatProvider)
    : makeJsonValueFormatter(config.theme, config.formatProvider)
