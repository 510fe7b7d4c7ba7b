import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { fileError, renderParseError } from "../core/errors.js"
import type { ParseOptions } from "../core/parser.js"
import { parseText } from "../core/parser.js"
import { summarizeValue } from "../core/stats.js"
import type { FileOutcome } from "../core/types.js"

// CHANGE: read one document from disk and parse it
// WHY: isolate IO from the pure reader; a syntax error is an outcome, not a failure
// FORMAT THEOREM: ∀p: read(p) = Right(o) → o._tag ∈ {"Parsed","Failed"}
// PURITY: SHELL
// EFFECT: Effect<FileOutcome, AppError, FileSystem>
// INVARIANT: only IO problems fail the effect
// COMPLEXITY: O(n) where n = file size

export const readDocument = (
  path: string,
  options: ParseOptions
): Effect.Effect<FileOutcome, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const text = yield* _(
      fs.readFileString(path, "utf-8").pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`parsing ${path} (${text.length} chars)`))
    const parsed = parseText(text, options)
    if (Either.isLeft(parsed)) {
      const error = renderParseError(parsed.left)
      yield* _(Effect.logDebug(`${path}: ${error}`))
      const failed: FileOutcome = { _tag: "Failed", file: path, error }
      return failed
    }
    const outcome: FileOutcome = { _tag: "Parsed", file: path, stats: summarizeValue(parsed.right) }
    return outcome
  })
