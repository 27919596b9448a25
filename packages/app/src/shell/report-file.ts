import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import { decodeDependencyReport } from "../core/decode.js"
import type { AppError } from "../core/errors.js"
import { fileError, formatError } from "../core/errors.js"
import type { DependencyReport } from "../core/model.js"

// CHANGE: load the JSON analysis document from disk into a DependencyReport
// WHY: isolate filesystem IO while keeping the report typed
// QUOTE(TZ): "Retrieve the JSON analysis"
// REF: req-report-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: load(p) = Right(r) → r = decode(parse(read(p)))
// PURITY: SHELL
// EFFECT: Effect<DependencyReport, AppError, FileSystem>
// INVARIANT: JSON is validated before use
// COMPLEXITY: O(n)

// the JSON.parse result as is, own "__proto__" keys included
const JsonParseSchema = Schema.parseJson()

export const mapPlatformError = (path: string) => (error: PlatformError): AppError => fileError(path, error.message)

export const parseJsonDocument = (raw: string): Effect.Effect<unknown, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonParseSchema)(raw),
    Effect.mapError((error) =>
      formatError(`Not a valid JSON document: ${ParseResult.TreeFormatter.formatErrorSync(error)}`)
    )
  )

export const readTextFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(fs.readFileString(path).pipe(Effect.mapError(mapPlatformError(path))))
  })

export const readDependencyReport = (
  path: string
): Effect.Effect<DependencyReport, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readTextFile(path))
    const document = yield* _(parseJsonDocument(raw))
    const decoded = decodeDependencyReport(document)
    if (decoded._tag === "Left") {
      return yield* _(Effect.fail(decoded.left))
    }
    yield* _(Effect.logDebug(`loaded ${decoded.right.objects.size} object files from ${path}`))
    return decoded.right
  })
