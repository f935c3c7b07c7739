import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { AppError } from "../core/errors.js"
import { fileError, parseFileError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { isJson } from "../core/json.js"

// CHANGE: read JSON input files into the nested value domain
// WHY: isolate filesystem IO and JSON decoding from the pure renderer and resolver
// QUOTE(TZ): n/a
// REF: req-json-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(j) → j ∈ Json
// PURITY: SHELL
// EFFECT: Effect<Json, AppError, FileSystem>
// INVARIANT: JSON is validated in place, never rebuilt
// COMPLEXITY: O(n)

const JsonSchema: Schema.Schema<Json> = Schema.declare(isJson, { identifier: "Json" })

const JsonParseSchema = Schema.parseJson(JsonSchema)

const parseJson = (file: string, raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonParseSchema)(raw),
    Effect.mapError((error) => parseFileError(file, TreeFormatter.formatErrorSync(error)))
  )

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`read ${path}: ${new TextEncoder().encode(raw).byteLength} bytes`))
    return yield* _(parseJson(path, raw))
  })
