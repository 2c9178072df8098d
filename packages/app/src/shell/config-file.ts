import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .themed-json.json with schema validation
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing default config yields undefined; a missing explicit config fails
// COMPLEXITY: O(n)

const StylesSchema = S.partial(
  S.Struct({
    Name: S.String,
    String: S.String,
    Number: S.String,
    Boolean: S.String,
    Null: S.String,
    TertiaryText: S.String,
    Scalar: S.String
  })
)

const RawConfigSchema = S.partial(
  S.Struct({
    theme: S.String,
    styles: StylesSchema,
    locale: S.String,
    format: S.String,
    width: S.Int.pipe(S.nonNegative()),
    display: S.Boolean,
    dictionaries: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.theme === undefined ? {} : { theme: config.theme }),
      ...(config.styles === undefined ? {} : { styles: config.styles }),
      ...(config.locale === undefined ? {} : { locale: config.locale }),
      ...(config.format === undefined ? {} : { format: config.format }),
      ...(config.width === undefined ? {} : { width: config.width }),
      ...(config.display === undefined ? {} : { display: config.display }),
      ...(config.dictionaries === undefined ? {} : { dictionaries: config.dictionaries })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return
    }
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      yield* _(Effect.logDebug(`No config file at ${path}`))
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug(`Loaded config from ${path}`))
    return decoded
  })
