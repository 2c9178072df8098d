import * as Option from "effect/Option"

// CHANGE: console themes mapping semantic style categories to escape codes
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a theme never returns undefined codes; missing styles map to ("", "")
// COMPLEXITY: O(1)/O(1)

export type ThemeStyle =
  | "Name"
  | "String"
  | "Number"
  | "Boolean"
  | "Null"
  | "TertiaryText"
  | "Scalar"

export const themeStyles: ReadonlyArray<ThemeStyle> = [
  "Name",
  "String",
  "Number",
  "Boolean",
  "Null",
  "TertiaryText",
  "Scalar"
]

export interface StyleCodes {
  readonly begin: string
  readonly end: string
}

export interface ConsoleTheme {
  readonly name: string
  readonly styleCodes: (style: ThemeStyle) => StyleCodes
}

export type ThemeCodes = Partial<Record<ThemeStyle, StyleCodes>>

export type AnsiStyles = { readonly [Style in ThemeStyle]?: string | undefined }

const unstyled: StyleCodes = { begin: "", end: "" }

export const ansiReset = "\u001b[0m"

export const makeTheme = (name: string, codes: ThemeCodes): ConsoleTheme => ({
  name,
  styleCodes: (style) => codes[style] ?? unstyled
})

const toAnsiCodes = (begin: string): StyleCodes => begin.length === 0 ? unstyled : { begin, end: ansiReset }

/**
 * Build a theme from ANSI begin codes; every styled span is closed with the SGR reset.
 */
export const makeAnsiTheme = (name: string, styles: AnsiStyles): ConsoleTheme => {
  const codes: Partial<Record<ThemeStyle, StyleCodes>> = {}
  for (const style of themeStyles) {
    const begin = styles[style]
    if (begin !== undefined) {
      codes[style] = toAnsiCodes(begin)
    }
  }
  return makeTheme(name, codes)
}

/**
 * Replace the begin codes of selected styles, keeping the rest of the theme.
 *
 * @pure true
 * @invariant styles absent from overrides keep their original codes
 */
export const withStyleOverrides = (theme: ConsoleTheme, overrides: AnsiStyles): ConsoleTheme => ({
  name: theme.name,
  styleCodes: (style) => {
    const begin = overrides[style]
    return begin === undefined ? theme.styleCodes(style) : toAnsiCodes(begin)
  }
})

export const noColorTheme: ConsoleTheme = makeTheme("none", {})

export const literateTheme: ConsoleTheme = makeAnsiTheme("literate", {
  TertiaryText: "\u001b[38;5;0008m",
  Null: "\u001b[38;5;0027m",
  Name: "\u001b[38;5;0007m",
  String: "\u001b[38;5;0045m",
  Number: "\u001b[38;5;0200m",
  Boolean: "\u001b[38;5;0027m",
  Scalar: "\u001b[38;5;0085m"
})

export const codeTheme: ConsoleTheme = makeAnsiTheme("code", {
  TertiaryText: "\u001b[38;5;0242m",
  Null: "\u001b[38;5;0038m",
  Name: "\u001b[38;5;0081m",
  String: "\u001b[38;5;0216m",
  Number: "\u001b[38;5;151m",
  Boolean: "\u001b[38;5;0038m",
  Scalar: "\u001b[38;5;0079m"
})

export const grayscaleTheme: ConsoleTheme = makeAnsiTheme("grayscale", {
  TertiaryText: "\u001b[30;1m",
  Null: "\u001b[1m\u001b[37;1m",
  Name: "\u001b[37;1m",
  String: "\u001b[1m\u001b[37;1m",
  Number: "\u001b[1m\u001b[37;1m",
  Boolean: "\u001b[1m\u001b[37;1m",
  Scalar: "\u001b[1m\u001b[37;1m"
})

export const builtinThemes: ReadonlyArray<ConsoleTheme> = [
  literateTheme,
  codeTheme,
  grayscaleTheme,
  noColorTheme
]

export const findTheme = (name: string): Option.Option<ConsoleTheme> =>
  Option.fromNullable(builtinThemes.find((theme) => theme.name === name))
