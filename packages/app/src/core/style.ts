import type { Output } from "./output.js"
import type { ConsoleTheme, ThemeStyle } from "./theme.js"

// CHANGE: scoped style application with invisible-character accounting
// PURITY: CORE
// EFFECT: writes to the supplied Output only
// INVARIANT: every begin code written is followed by its end code, on normal and throwing exits
// INVARIANT: counter grows by exactly begin.length + end.length per application
// COMPLEXITY: O(1) beyond the nested write

export interface StyleCounter {
  count: number
}

export const makeCounter = (): StyleCounter => ({ count: 0 })

/**
 * Wrap the writes made by `write` in the theme's codes for `style`.
 *
 * @param output - Sink receiving codes and content.
 * @param theme - Theme resolving the style to escape codes.
 * @param style - Semantic category of the content.
 * @param counter - Running invisible-character counter of the current render call.
 * @param write - Nested writes; may throw.
 *
 * @pure false
 * @invariant the end code is written even when write throws
 */
export const applyStyle = (
  output: Output,
  theme: ConsoleTheme,
  style: ThemeStyle,
  counter: StyleCounter,
  write: () => void
): void => {
  const codes = theme.styleCodes(style)
  output.write(codes.begin)
  try {
    write()
  } finally {
    output.write(codes.end)
    counter.count += codes.begin.length + codes.end.length
  }
}
