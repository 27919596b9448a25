import * as Either from "effect/Either"

import { decodeDependencyReport } from "../../src/core/decode.js"
import type { JsonObject } from "../../src/core/json.js"
import type { DependencyReport } from "../../src/core/model.js"

export const analysisDocument = (content: JsonObject, libraryName = "libfixture.a"): JsonObject => ({
  slib_analysis: true,
  "Static library": libraryName,
  Content: content
})

export const reportFrom = (content: JsonObject, libraryName = "libfixture.a"): DependencyReport =>
  Either.getOrThrowWith(
    decodeDependencyReport(analysisDocument(content, libraryName)),
    (error) => new Error(error.message)
  )

export const leftOf = <A, E>(either: Either.Either<A, E>): E | undefined =>
  Either.isLeft(either) ? either.left : undefined

export const rightOf = <A, E>(either: Either.Either<A, E>): A | undefined =>
  Either.isRight(either) ? either.right : undefined
