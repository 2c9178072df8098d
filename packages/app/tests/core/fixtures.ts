import { invariantProvider } from "../../src/core/display-formatter.js"
import type { ThemedValueFormatter } from "../../src/core/formatter.js"
import { makeJsonValueFormatter } from "../../src/core/json-formatter.js"
import { makeStringOutput } from "../../src/core/output.js"
import type { ConsoleTheme } from "../../src/core/theme.js"
import { makeTheme, noColorTheme } from "../../src/core/theme.js"
import type { Value } from "../../src/core/value.js"

// Every begin tag is 3 characters and every end tag 4, so each style scope costs 7.
export const scopeCost = 7

export const tagTheme: ConsoleTheme = makeTheme("tags", {
  TertiaryText: { begin: "<t>", end: "</t>" },
  Name: { begin: "<n>", end: "</n>" },
  String: { begin: "<s>", end: "</s>" },
  Number: { begin: "<#>", end: "</#>" },
  Boolean: { begin: "<b>", end: "</b>" },
  Null: { begin: "<0>", end: "</0>" },
  Scalar: { begin: "<x>", end: "</x>" }
})

export const stripTags = (text: string): string => text.replaceAll(/<\/?[tns#b0x]>/gu, "")

export interface Captured {
  readonly text: string
  readonly invisible: number
}

export const capture = (
  formatter: ThemedValueFormatter,
  value: Value,
  format?: string,
  literalTopLevel?: boolean
): Captured => {
  const output = makeStringOutput()
  const invisible = formatter.format(value, output, format, literalTopLevel)
  return { text: output.contents(), invisible }
}

export const plainJson = makeJsonValueFormatter(noColorTheme, invariantProvider)

export const taggedJson = makeJsonValueFormatter(tagTheme, invariantProvider)
