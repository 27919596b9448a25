import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as ParseResult from "effect/ParseResult"
import * as S from "effect/Schema"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError } from "../core/errors.js"
import { mapPlatformError } from "./report-file.js"

// CHANGE: decode .slib-deps.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): "optional ./.slib-deps.json with report, json and failOnIncomplete"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    report: S.String,
    json: S.Boolean,
    failOnIncomplete: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.report === undefined ? {} : { report: config.report }),
      ...(config.json === undefined ? {} : { json: config.json }),
      ...(config.failOnIncomplete === undefined ? {} : { failOnIncomplete: config.failOnIncomplete })
    })),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(fs.exists(path).pipe(Effect.mapError(mapPlatformError(path))))
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(configError(`config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(fs.readFileString(path).pipe(Effect.mapError(mapPlatformError(path))))
    yield* _(Effect.logDebug(`using config file ${path}`))
    return yield* _(decodeConfig(contents))
  })
