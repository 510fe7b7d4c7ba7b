import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra for the reader and its CLI
// WHY: every failure is a typed value that callers match on instead of catching
// FORMAT THEOREM: ∀e ∈ ParseError: render(e) = `${e.line}:${e.column}: ${e.message}`
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ParseErrorKind =
  | "UnexpectedCharacter"
  | "ExpectedValue"
  | "ExpectedKey"
  | "MalformedNumber"
  | "DepthExceeded"

export interface ParseError {
  readonly _tag: "ParseError"
  readonly kind: ParseErrorKind
  readonly line: number
  readonly column: number
  readonly message: string
}

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError

export const parseError = (
  kind: ParseErrorKind,
  position: { readonly line: number; readonly column: number },
  message: string
): ParseError => ({
  _tag: "ParseError",
  kind,
  line: position.line,
  column: position.column,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render a parse error as `line:column: message`.
 *
 * @pure true
 * @complexity O(|message|)
 */
export const renderParseError = (error: ParseError): string => `${error.line}:${error.column}: ${error.message}`

export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "CliError" }, (value) => `Invalid arguments: ${value.message}`),
    Match.when({ _tag: "ConfigError" }, (value) => `Invalid config: ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `File error: ${value.message}`),
    Match.exhaustive
  )
