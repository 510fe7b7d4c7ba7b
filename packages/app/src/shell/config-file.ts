import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .json-tree-reader.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing default config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    files: S.Array(S.String),
    maxDepth: S.Number,
    json: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.files === undefined ? {} : { files: config.files }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
      ...(config.json === undefined ? {} : { json: config.json })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      yield* _(Effect.logDebug(`no config file at ${path}`))
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return yield* _(decodeConfig(contents))
  })
