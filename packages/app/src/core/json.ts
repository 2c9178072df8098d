import type { Output } from "./output.js"

// CHANGE: JSON domain type plus the shared quoted-string writer
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀s ∈ String: JSON.parse(quoteJsonString(s)) = s
// INVARIANT: output is wrapped in double quotes; "/" is never escaped
// COMPLEXITY: O(n)/O(n)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

const shortEscapes: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\b": "\\b",
  "\f": "\\f"
}

const escapeChar = (char: string): string => {
  const short = shortEscapes[char]
  if (short !== undefined) {
    return short
  }
  const code = char.charCodeAt(0)
  if (code < 0x20) {
    return `\\u${code.toString(16).toUpperCase().padStart(4, "0")}`
  }
  return char
}

const needsEscape = /["\\\u0000-\u001f]/u

/**
 * Quote and escape text as a JSON string literal.
 *
 * @pure true
 * @invariant result starts and ends with a double quote
 * @complexity O(n)
 */
export const quoteJsonString = (text: string): string => {
  if (!needsEscape.test(text)) {
    return `"${text}"`
  }
  let escaped = ""
  for (const char of text) {
    escaped += escapeChar(char)
  }
  return `"${escaped}"`
}

export const writeQuotedJsonString = (text: string, output: Output): void => {
  output.write(quoteJsonString(text))
}

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
