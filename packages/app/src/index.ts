export { InvalidArgument } from "./core/errors.js"
export type { DisplayValueFormatter, FormatProvider } from "./core/display-formatter.js"
export {
  formatDate,
  formatNumber,
  invariantProvider,
  makeDisplayValueFormatter,
  makeFormatProvider
} from "./core/display-formatter.js"
export type { FormatterState, Maybe, ThemedValueFormatter } from "./core/formatter.js"
export type { FromJsonOptions, ObjectMode } from "./core/from-json.js"
export { valueFromJson } from "./core/from-json.js"
export type { Json } from "./core/json.js"
export { quoteJsonString, writeQuotedJsonString } from "./core/json.js"
export { makeJsonValueFormatter } from "./core/json-formatter.js"
export type { Output, StringOutput } from "./core/output.js"
export { makeStringOutput } from "./core/output.js"
export type { Rendered } from "./core/render.js"
export { padRendered, renderValue, visibleWidth } from "./core/render.js"
export type { AnsiStyles, ConsoleTheme, StyleCodes, ThemeCodes, ThemeStyle } from "./core/theme.js"
export {
  builtinThemes,
  codeTheme,
  findTheme,
  grayscaleTheme,
  literateTheme,
  makeAnsiTheme,
  makeTheme,
  noColorTheme,
  withStyleOverrides
} from "./core/theme.js"
export * from "./core/value.js"
