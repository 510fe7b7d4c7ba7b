import * as Either from "effect/Either"

import type { CliArgs } from "./cli.js"
import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"
import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from "./parser.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved files list is non-empty and duplicate-free
// COMPLEXITY: O(n)/O(1)

export interface FileConfig {
  readonly files?: ReadonlyArray<string>
  readonly maxDepth?: number
  readonly json?: boolean
}

export interface ResolvedConfig {
  readonly files: ReadonlyArray<string>
  readonly maxDepth: number
  readonly json: boolean
}

const unique = (values: ReadonlyArray<string>): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const result: Array<string> = []
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value)
      result.push(value)
    }
  }
  return result
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-tree-reader.json.
 * @returns Resolved configuration, or ConfigError when no input file remains.
 *
 * @pure true
 * @invariant files length ≥ 1
 * @complexity O(n)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<ResolvedConfig, ConfigError> => {
  const files = unique([...(fileConfig?.files ?? []), ...cli.files])
  if (files.length === 0) {
    return Either.left(configError("No input files: pass --file or list files in the config file"))
  }
  const maxDepth = cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH
  if (!Number.isSafeInteger(maxDepth) || maxDepth < 1) {
    return Either.left(configError(`maxDepth must be a positive integer, got: ${maxDepth}`))
  }
  if (maxDepth > MAX_DEPTH_LIMIT) {
    return Either.left(configError(`maxDepth must not exceed ${MAX_DEPTH_LIMIT}, got: ${maxDepth}`))
  }
  return Either.right({
    files,
    maxDepth,
    json: cli.json || (fileConfig?.json ?? false)
  })
}
