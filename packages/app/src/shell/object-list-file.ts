import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { parseObjectList } from "../core/object-list.js"
import { readTextFile } from "./report-file.js"

// CHANGE: read the list of object files to verify
// WHY: one name per line in a separate text file
// QUOTE(TZ): "list of object files to verify (one per line in a separate txt file)"
// REF: req-object-list-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = parseObjectList(contents(p))
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, AppError, FileSystem>
// INVARIANT: names keep file order
// COMPLEXITY: O(n)

export const readObjectList = (
  path: string
): Effect.Effect<ReadonlyArray<string>, AppError, FileSystemService> =>
  readTextFile(path).pipe(
    Effect.map(parseObjectList),
    Effect.tap((names) => Effect.logDebug(`read ${names.length} object file names from ${path}`))
  )
