import { Match } from "effect"

import type { FormatterState, ThemedValueFormatter } from "./formatter.js"
import { makeThemedValueFormatter, nestState, requirePresent } from "./formatter.js"
import { quoteJsonString } from "./json.js"
import { formatDecimal, isNonFinite, literalText, wallClockDate } from "./literal.js"
import type { Output } from "./output.js"
import { applyStyle, makeCounter } from "./style.js"
import type { StyleCounter } from "./style.js"
import type { ConsoleTheme, ThemeStyle } from "./theme.js"
import type { Literal, ScalarValue, Value } from "./value.js"

// CHANGE: human-oriented rendering for values carrying an explicit presentation format
// PURITY: CORE
// EFFECT: writes to FormatterState.output
// INVARIANT: the format provider is consulted only here; JSON output never depends on it
// INVARIANT: unrecognised format strings fall back to the invariant literal text
// COMPLEXITY: O(n) in the size of the value tree

export interface FormatProvider {
  readonly locale: string
}

export const invariantProvider: FormatProvider = { locale: "en-US" }

export const makeFormatProvider = (locale: string): FormatProvider => ({ locale })

export interface DisplayValueFormatter extends ThemedValueFormatter {
  readonly formatLiteral: (scalar: ScalarValue, output: Output, format: string | undefined) => number
}

type NumericLiteral = Extract<Literal, { readonly _tag: "Integer" | "Decimal" | "Float32" | "Float64" }>
type DateLiteral = Extract<Literal, { readonly _tag: "DateTime" | "DateTimeOffset" }>

const literalFormat = "l"

const numericFormat = /^([DdFfNnPpXx])(\d{0,2})$/u

const numericValue = (literal: NumericLiteral): number | bigint =>
  Match.value(literal).pipe(
    Match.tag("Integer", (value) => value.value),
    Match.tag("Decimal", (value) => Number(formatDecimal(value.coefficient, value.scale))),
    Match.tag("Float32", (value) => value.value),
    Match.tag("Float64", (value) => value.value),
    Match.exhaustive
  )

const fractionDigits = (digits: number): Intl.NumberFormatOptions => ({
  minimumFractionDigits: digits,
  maximumFractionDigits: digits
})

const formatIntegerOnly = (
  literal: NumericLiteral,
  fallback: string,
  render: (value: bigint) => string | undefined
): string => literal._tag === "Integer" ? render(literal.value) ?? fallback : fallback

const padInteger = (value: bigint, digits: number): string => {
  const negative = value < 0n
  const magnitude = (negative ? -value : value).toString().padStart(digits, "0")
  return negative ? `-${magnitude}` : magnitude
}

const hexInteger = (value: bigint, digits: number, upper: boolean): string | undefined => {
  if (value < 0n) {
    return undefined
  }
  const hex = value.toString(16).padStart(digits, "0")
  return upper ? hex.toUpperCase() : hex
}

/**
 * Format a number with a standard numeric format string (`F2`, `N0`, `P1`, `D5`, `X8`).
 *
 * @pure true
 * @invariant unrecognised formats and non-finite values yield the invariant text
 * @complexity O(n)
 */
export const formatNumber = (
  literal: NumericLiteral,
  format: string | undefined,
  provider: FormatProvider
): string => {
  const fallback = literalText(literal)
  const match = format === undefined ? null : numericFormat.exec(format)
  if (match === null) {
    return fallback
  }
  const value = numericValue(literal)
  if (typeof value === "number" && isNonFinite(value)) {
    return fallback
  }
  const [, specifier = "", digitsText = ""] = match
  const digits = digitsText.length === 0 ? undefined : Number(digitsText)
  const intl = (options: Intl.NumberFormatOptions): string =>
    new Intl.NumberFormat(provider.locale, options).format(value)
  return Match.value(specifier.toUpperCase()).pipe(
    Match.when("F", () => intl({ useGrouping: false, ...fractionDigits(digits ?? 2) })),
    Match.when("N", () => intl({ useGrouping: true, ...fractionDigits(digits ?? 2) })),
    Match.when("P", () => intl({ style: "percent", ...fractionDigits(digits ?? 2) })),
    Match.when("D", () => formatIntegerOnly(literal, fallback, (integer) => padInteger(integer, digits ?? 0))),
    Match.when("X", () =>
      formatIntegerOnly(literal, fallback, (integer) => hexInteger(integer, digits ?? 0, specifier === "X"))),
    Match.orElse(() => fallback)
  )
}

const dateFormats: Readonly<Record<string, Intl.DateTimeFormatOptions>> = {
  d: { dateStyle: "short" },
  D: { dateStyle: "full" },
  t: { timeStyle: "short" },
  T: { timeStyle: "medium" },
  g: { dateStyle: "short", timeStyle: "short" },
  G: { dateStyle: "short", timeStyle: "medium" }
}

/**
 * Format a date with a standard date format string, in the wall time the literal carries.
 *
 * @pure true
 * @invariant unrecognised formats, invalid dates and unrepresentable wall times yield the ISO-8601 text
 */
export const formatDate = (
  literal: DateLiteral,
  format: string | undefined,
  provider: FormatProvider
): string => {
  const iso = literalText(literal)
  const options = format === undefined ? undefined : dateFormats[format]
  if (options === undefined || Number.isNaN(literal.value.getTime())) {
    return iso
  }
  const wallClock = literal._tag === "DateTimeOffset"
    ? wallClockDate(literal.value, literal.offsetMinutes)
    : literal.value
  return wallClock === undefined
    ? iso
    : new Intl.DateTimeFormat(provider.locale, { ...options, timeZone: "UTC" }).format(wallClock)
}

interface StyledText {
  readonly style: ThemeStyle
  readonly text: string
}

const styled = (style: ThemeStyle, text: string): StyledText => ({ style, text })

const displayLiteral = (
  literal: Literal,
  format: string | undefined,
  raw: boolean,
  provider: FormatProvider
): StyledText =>
  Match.value(literal).pipe(
    Match.tag("Null", () => styled("Null", "null")),
    Match.tag("String", (value) => styled("String", raw ? value.value : quoteJsonString(value.value))),
    Match.tag("Boolean", (value) => styled("Boolean", value.value ? "true" : "false")),
    Match.tag("Integer", "Decimal", "Float32", "Float64", (value) =>
      styled("Number", formatNumber(value, format, provider))),
    Match.tag("DateTime", "DateTimeOffset", (value) => styled("Scalar", formatDate(value, format, provider))),
    Match.tag("Char", "Other", (value) => styled("Scalar", literalText(value))),
    Match.exhaustive
  )

/**
 * Create the display formatter: plain, locale-aware text rather than JSON.
 *
 * Strings are quoted unless the format is `l` or they are the top-level value rendered
 * with `literalTopLevel`; structures read `Tag {a=1}` and dictionaries `{["k"]=v}`.
 */
export const makeDisplayValueFormatter = (
  theme: ConsoleTheme,
  formatProvider: FormatProvider
): DisplayValueFormatter => {
  const formatScalar = (scalar: ScalarValue, output: Output, format: string | undefined, raw: boolean): number => {
    const counter = makeCounter()
    const literal = displayLiteral(scalar.literal, format, raw, formatProvider)
    applyStyle(output, theme, literal.style, counter, () => output.write(literal.text))
    return counter.count
  }

  const formatter = makeThemedValueFormatter(
    theme,
    ({ style, visit }) => {
      const punctuation = (output: Output, counter: StyleCounter, text: string): void =>
        style(output, "TertiaryText", counter, () => output.write(text))

      const separate = (output: Output, counter: StyleCounter, index: number): void => {
        if (index > 0) {
          punctuation(output, counter, ", ")
        }
      }

      const visitNested = (state: FormatterState, counter: StyleCounter, value: Value): void => {
        counter.count += visit(nestState(state), value)
      }

      return {
        visitScalar: (state, scalar) =>
          formatScalar(
            requirePresent(scalar, "scalar"),
            state.output,
            state.format,
            state.format === literalFormat || state.isTopLevel
          ),

        visitSequence: (state, sequence) => {
          const { elements } = requirePresent(sequence, "sequence")
          const counter = makeCounter()
          punctuation(state.output, counter, "[")
          elements.forEach((element, index) => {
            separate(state.output, counter, index)
            visitNested(state, counter, element)
          })
          punctuation(state.output, counter, "]")
          return counter.count
        },

        visitStructure: (state, structure) => {
          const { properties, typeTag } = requirePresent(structure, "structure")
          const counter = makeCounter()
          if (typeTag !== undefined) {
            style(state.output, "Name", counter, () => state.output.write(typeTag))
            state.output.write(" ")
          }
          punctuation(state.output, counter, "{")
          properties.forEach((property, index) => {
            separate(state.output, counter, index)
            style(state.output, "Name", counter, () => state.output.write(property.name))
            punctuation(state.output, counter, "=")
            visitNested(state, counter, property.value)
          })
          punctuation(state.output, counter, "}")
          return counter.count
        },

        visitDictionary: (state, dictionary) => {
          const { entries } = requirePresent(dictionary, "dictionary")
          const counter = makeCounter()
          punctuation(state.output, counter, "{")
          entries.forEach((entry, index) => {
            separate(state.output, counter, index)
            punctuation(state.output, counter, "[")
            visitNested(state, counter, entry.key)
            punctuation(state.output, counter, "]=")
            visitNested(state, counter, entry.value)
          })
          punctuation(state.output, counter, "}")
          return counter.count
        }
      }
    },
    (next) => makeDisplayValueFormatter(next, formatProvider)
  )

  return {
    ...formatter,
    formatLiteral: (scalar, output, format) => formatScalar(scalar, output, format, format === literalFormat)
  }
}
