import { describe, expect, it } from "@effect/vitest"
import { FileSystem } from "@effect/platform/FileSystem"
import { Effect } from "effect"

import { provideNodeContext, withTempDir } from "./test-helpers.js"

describe("withTempDir", () => {
  it.effect("removes the directory when the body fails", () =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const seen: Array<string> = []
      const error = yield* _(
        Effect.flip(
          withTempDir(({ tempDir, write }) =>
            Effect.gen(function*(_) {
              seen.push(tempDir)
              yield* _(write("lib.json", "{}"))
              return yield* _(Effect.fail("body failed"))
            })
          )
        )
      )
      expect(error).toBe("body failed")
      expect(seen).toHaveLength(1)
      for (const dir of seen) {
        expect(yield* _(fs.exists(dir))).toBe(false)
      }
    }).pipe(provideNodeContext))

  it.effect("removes the directory after a successful body", () =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const dir = yield* _(withTempDir(({ tempDir }) => Effect.succeed(tempDir)))
      expect(yield* _(fs.exists(dir))).toBe(false)
    }).pipe(provideNodeContext))
})
