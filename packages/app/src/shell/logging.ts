import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: diagnostics go to stderr as logfmt so stdout carries only rendered values
// PURITY: SHELL
// EFFECT: Layer replacing the default logger
// INVARIANT: verbose lowers the minimum level to Debug, otherwise Warning

export const loggerLayer = (verbose: boolean): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger)),
    Logger.minimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Warning)
  )
