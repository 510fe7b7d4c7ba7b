import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { configError, fileError, formatAppError, parseError, renderParseError } from "../../src/core/errors.js"

describe("errors", () => {
  it.effect("renders parse errors as line:column: message", () =>
    Effect.sync(() => {
      const error = parseError("ExpectedKey", { line: 4, column: 2 }, "expected key")
      expect(renderParseError(error)).toBe("4:2: expected key")
    }))

  it.effect("formats application errors for stderr", () =>
    Effect.sync(() => {
      expect(formatAppError({ _tag: "CliError", message: "Unknown flag: --x" })).toBe(
        "Invalid arguments: Unknown flag: --x"
      )
      expect(formatAppError(configError("bad"))).toBe("Invalid config: bad")
      expect(formatAppError(fileError("missing"))).toBe("File error: missing")
    }))
})
