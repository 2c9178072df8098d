import * as Either from "effect/Either"

import { InvalidArgument } from "./errors.js"
import type { Maybe, ThemedValueFormatter } from "./formatter.js"
import { makeStringOutput } from "./output.js"
import type { Value } from "./value.js"

// CHANGE: render entry point returning text plus invisible-character count, and width-aware padding
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀r: visibleWidth(r) = codePoints(r.text) - r.invisible
// INVARIANT: only InvalidArgument is mapped to Left; any other failure propagates
// COMPLEXITY: O(n)

export interface Rendered {
  readonly text: string
  readonly invisible: number
}

/**
 * Render a value into a fresh buffer.
 *
 * @param formatter - JSON or display formatter.
 * @param value - Root value; absent input yields InvalidArgument.
 * @param format - Optional presentation format passed to every scalar.
 * @param literalTopLevel - Render a top-level string without quotes (display formatter).
 *
 * @pure true
 * @invariant result.invisible equals the length of all style codes in result.text
 */
export const renderValue = (
  formatter: ThemedValueFormatter,
  value: Maybe<Value>,
  format?: string,
  literalTopLevel = false
): Either.Either<Rendered, InvalidArgument> =>
  Either.try({
    try: () => {
      const output = makeStringOutput()
      const invisible = formatter.format(value, output, format, literalTopLevel)
      return { text: output.contents(), invisible }
    },
    catch: (error) => {
      if (error instanceof InvalidArgument) {
        return error
      }
      throw error
    }
  })

/**
 * Visible columns of rendered text, counted in code points so a surrogate pair counts once.
 *
 * Style codes are expected to be BMP text, where `invisible` (UTF-16 units) equals their
 * code point count. Wide glyphs such as CJK ideographs and combining marks still count as
 * one column each.
 */
export const visibleWidth = (rendered: Rendered): number => Array.from(rendered.text).length - rendered.invisible

/**
 * Right-pad rendered text with spaces up to `width` visible columns.
 *
 * @pure true
 * @invariant visibleWidth(result) = max(width, visibleWidth(rendered))
 */
export const padRendered = (rendered: Rendered, width: number): Rendered => {
  const missing = width - visibleWidth(rendered)
  return missing <= 0 ? rendered : { text: rendered.text + " ".repeat(missing), invisible: rendered.invisible }
}
