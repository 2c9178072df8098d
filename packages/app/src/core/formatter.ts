import { Match } from "effect"

import { invalidArgument } from "./errors.js"
import type { Output } from "./output.js"
import type { StyleCounter } from "./style.js"
import { applyStyle } from "./style.js"
import type { ConsoleTheme, ThemeStyle } from "./theme.js"
import type { DictionaryValue, ScalarValue, SequenceValue, StructureValue, Value } from "./value.js"

// CHANGE: theme-bound dispatcher routing values to per-variant visitors
// PURITY: CORE
// EFFECT: writes to FormatterState.output
// FORMAT THEOREM: ∀v ≠ absent: visit(s, v) = visitors[v._tag](s, v)
// INVARIANT: an absent value raises InvalidArgument before anything is written
// INVARIANT: switchTheme never mutates the receiving formatter
// COMPLEXITY: O(n) in the size of the value tree

export interface FormatterState {
  readonly output: Output
  readonly format: string | undefined
  readonly isTopLevel: boolean
}

export const nestState = (state: FormatterState): FormatterState =>
  state.isTopLevel ? { ...state, isTopLevel: false } : state

/** Absent input as it may arrive from an untyped producer. */
export type Maybe<A> = A | null | undefined

export interface ValueVisitors {
  readonly visitScalar: (state: FormatterState, scalar: Maybe<ScalarValue>) => number
  readonly visitSequence: (state: FormatterState, sequence: Maybe<SequenceValue>) => number
  readonly visitStructure: (state: FormatterState, structure: Maybe<StructureValue>) => number
  readonly visitDictionary: (state: FormatterState, dictionary: Maybe<DictionaryValue>) => number
}

export interface ThemedValueFormatter extends ValueVisitors {
  readonly theme: ConsoleTheme
  readonly visit: (state: FormatterState, value: Maybe<Value>) => number
  readonly switchTheme: (theme: ConsoleTheme) => ThemedValueFormatter
  /**
   * Render `value` into `output` and return the number of invisible style characters written.
   */
  readonly format: (
    value: Maybe<Value>,
    output: Output,
    format?: string,
    literalTopLevel?: boolean
  ) => number
}

export interface VisitorContext {
  readonly theme: ConsoleTheme
  readonly visit: (state: FormatterState, value: Maybe<Value>) => number
  readonly style: (output: Output, style: ThemeStyle, counter: StyleCounter, write: () => void) => void
}

export const requirePresent = <A>(value: Maybe<A>, argument: string): A => {
  if (value === null || value === undefined) {
    throw invalidArgument(argument)
  }
  return value
}

/**
 * Assemble a formatter from visitors that close over the dispatching `visit`.
 *
 * @param theme - Theme every style scope of this formatter resolves against.
 * @param defineVisitors - Builds the four variant visitors.
 * @param switchTheme - Rebuilds the same kind of formatter for another theme.
 *
 * @pure true
 * @invariant visit dispatch is exhaustive over Value._tag
 */
export const makeThemedValueFormatter = (
  theme: ConsoleTheme,
  defineVisitors: (context: VisitorContext) => ValueVisitors,
  switchTheme: (theme: ConsoleTheme) => ThemedValueFormatter
): ThemedValueFormatter => {
  const visit = (state: FormatterState, value: Maybe<Value>): number =>
    Match.value(requirePresent(value, "value")).pipe(
      Match.tag("Scalar", (scalar) => visitors.visitScalar(state, scalar)),
      Match.tag("Sequence", (sequence) => visitors.visitSequence(state, sequence)),
      Match.tag("Structure", (structure) => visitors.visitStructure(state, structure)),
      Match.tag("Dictionary", (dictionary) => visitors.visitDictionary(state, dictionary)),
      Match.exhaustive
    )

  const visitors = defineVisitors({
    theme,
    visit,
    style: (output, style, counter, write) => applyStyle(output, theme, style, counter, write)
  })

  return {
    theme,
    visit,
    ...visitors,
    switchTheme,
    format: (value, output, format, literalTopLevel = false) =>
      visit({ output, format, isTopLevel: literalTopLevel }, value)
  }
}
