import { Match } from "effect"

import type { FormatProvider } from "./display-formatter.js"
import { makeDisplayValueFormatter } from "./display-formatter.js"
import type { ThemedValueFormatter, ValueVisitors, VisitorContext } from "./formatter.js"
import { makeThemedValueFormatter, requirePresent } from "./formatter.js"
import { quoteJsonString } from "./json.js"
import {
  formatDateTime,
  formatDateTimeOffset,
  formatDecimal,
  formatFloat32,
  formatFloat64,
  formatInteger,
  isNonFinite,
  literalText,
  nonFiniteText
} from "./literal.js"
import type { Output } from "./output.js"
import type { StyleCounter } from "./style.js"
import { makeCounter } from "./style.js"
import type { ConsoleTheme, ThemeStyle } from "./theme.js"
import type { ScalarValue } from "./value.js"

// CHANGE: themed JSON rendering of structured values with invisible-character accounting
// PURITY: CORE
// EFFECT: writes to FormatterState.output
// FORMAT THEOREM: ∀v without explicit format: stripCodes(render(v)) is valid JSON
// INVARIANT: returned count = Σ (begin.length + end.length) over every style scope opened for v
// INVARIANT: properties and entries are emitted in the order given, never re-sorted
// COMPLEXITY: O(n) in the size of the value tree

interface StyledText {
  readonly style: ThemeStyle
  readonly text: string
}

const styled = (style: ThemeStyle, text: string): StyledText => ({ style, text })

const floatLiteral = (value: number, format: (value: number) => string): StyledText =>
  isNonFinite(value)
    ? styled("String", quoteJsonString(nonFiniteText(value)))
    : styled("Number", format(value))

const jsonLiteral = (scalar: ScalarValue): StyledText =>
  Match.value(scalar.literal).pipe(
    Match.tag("Null", () => styled("Null", "null")),
    Match.tag("String", (literal) => styled("String", quoteJsonString(literal.value))),
    Match.tag("Integer", (literal) => styled("Number", formatInteger(literal.value))),
    Match.tag("Decimal", (literal) => styled("Number", formatDecimal(literal.coefficient, literal.scale))),
    Match.tag("Float64", (literal) => floatLiteral(literal.value, formatFloat64)),
    Match.tag("Float32", (literal) => floatLiteral(literal.value, formatFloat32)),
    Match.tag("Boolean", (literal) => styled("Boolean", literal.value ? "true" : "false")),
    Match.tag("Char", (literal) => styled("String", quoteJsonString(literal.value))),
    Match.tag("DateTime", (literal) => styled("String", `"${formatDateTime(literal.value)}"`)),
    Match.tag(
      "DateTimeOffset",
      (literal) => styled("String", `"${formatDateTimeOffset(literal.value, literal.offsetMinutes)}"`)
    ),
    Match.tag("Other", (literal) => styled("String", quoteJsonString(literal.value.toString()))),
    Match.exhaustive
  )

const listSeparator = ", "
const memberSeparator = ": "
const typeTagMember = "$type"

export type FormatLiteral = (scalar: ScalarValue, output: Output, format: string | undefined) => number

const defineJsonVisitors = (
  { style, visit }: VisitorContext,
  formatLiteral: FormatLiteral
): ValueVisitors => {
  const punctuation = (output: Output, counter: StyleCounter, text: string): void =>
    style(output, "TertiaryText", counter, () => output.write(text))

  const quoted = (output: Output, counter: StyleCounter, category: ThemeStyle, text: string): void =>
    style(output, category, counter, () => output.write(quoteJsonString(text)))

  const separate = (output: Output, counter: StyleCounter, index: number): void => {
    if (index > 0) {
      punctuation(output, counter, listSeparator)
    }
  }

  return {
    visitScalar: (state, scalar) => formatLiteral(requirePresent(scalar, "scalar"), state.output, state.format),

    visitSequence: (state, sequence) => {
      const { elements } = requirePresent(sequence, "sequence")
      const counter = makeCounter()
      punctuation(state.output, counter, "[")
      elements.forEach((element, index) => {
        separate(state.output, counter, index)
        counter.count += visit(state, element)
      })
      punctuation(state.output, counter, "]")
      return counter.count
    },

    visitStructure: (state, structure) => {
      const { properties, typeTag } = requirePresent(structure, "structure")
      const counter = makeCounter()
      punctuation(state.output, counter, "{")
      properties.forEach((property, index) => {
        separate(state.output, counter, index)
        quoted(state.output, counter, "Name", property.name)
        punctuation(state.output, counter, memberSeparator)
        counter.count += visit(state, property.value)
      })
      if (typeTag !== undefined) {
        separate(state.output, counter, properties.length)
        quoted(state.output, counter, "Name", typeTagMember)
        punctuation(state.output, counter, memberSeparator)
        quoted(state.output, counter, "String", typeTag)
      }
      punctuation(state.output, counter, "}")
      return counter.count
    },

    visitDictionary: (state, dictionary) => {
      const { entries } = requirePresent(dictionary, "dictionary")
      const counter = makeCounter()
      punctuation(state.output, counter, "{")
      entries.forEach((entry, index) => {
        separate(state.output, counter, index)
        quoted(state.output, counter, "String", literalText(entry.key.literal))
        punctuation(state.output, counter, memberSeparator)
        counter.count += visit(state, entry.value)
      })
      punctuation(state.output, counter, "}")
      return counter.count
    }
  }
}

/**
 * Create a formatter that renders values as themed JSON.
 *
 * Scalars carrying an explicit format string are handed to the display formatter
 * instead, since a presentation format asks for human-oriented text.
 *
 * @param theme - Theme supplying the escape codes.
 * @param formatProvider - Locale used only by the display formatter; JSON text is always culture-invariant.
 *
 * @pure true
 * @invariant switchTheme(t).switchTheme(theme) renders identically to this formatter
 */
export const makeJsonValueFormatter = (
  theme: ConsoleTheme,
  formatProvider: FormatProvider
): ThemedValueFormatter => {
  const display = makeDisplayValueFormatter(theme, formatProvider)

  return makeThemedValueFormatter(
    theme,
    (context) => {
      const formatLiteral: FormatLiteral = (scalar, output, format) => {
        if (format !== undefined) {
          return display.formatLiteral(scalar, output, format)
        }
        const counter = makeCounter()
        const literal = jsonLiteral(scalar)
        context.style(output, literal.style, counter, () => output.write(literal.text))
        return counter.count
      }
      return defineJsonVisitors(context, formatLiteral)
    },
    (next) => makeJsonValueFormatter(next, formatProvider)
  )
}
