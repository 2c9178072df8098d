import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import { text } from "node:stream/consumers"

import { stdinPath } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError, inputError } from "../core/errors.js"
import type { Json } from "../core/json.js"

// CHANGE: read JSON documents from a file or stdin with validation
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<Json>, AppError, FileSystem>
// INVARIANT: JSON is validated before it reaches the renderer
// INVARIANT: in line mode blank lines are skipped and errors carry 1-based line numbers
// COMPLEXITY: O(n)

const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const JsonParseSchema = Schema.parseJson(JsonSchema)

export const parseJsonDocument = (raw: string, line?: number): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonParseSchema)(raw),
    Effect.mapError((error) => inputError(TreeFormatter.formatErrorSync(error), line))
  )

/**
 * Split newline-delimited JSON into documents.
 *
 * @pure false
 * @invariant result order follows line order
 */
export const parseJsonLines = (raw: string): Effect.Effect<ReadonlyArray<Json>, AppError> =>
  Effect.forEach(
    raw
      .split(/\r?\n/u)
      .map((content, index) => ({ content, line: index + 1 }))
      .filter(({ content }) => content.trim().length > 0),
    ({ content, line }) => parseJsonDocument(content, line)
  )

const readStdin: Effect.Effect<string, AppError> = Effect.tryPromise({
  try: () => text(process.stdin),
  catch: (error) => fileError(String(error))
})

export const readInput = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === stdinPath) {
      return yield* _(readStdin)
    }
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

export const readDocuments = (
  path: string,
  lines: boolean
): Effect.Effect<ReadonlyArray<Json>, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readInput(path))
    if (lines) {
      return yield* _(parseJsonLines(raw))
    }
    const document = yield* _(parseJsonDocument(raw))
    return [document]
  })
