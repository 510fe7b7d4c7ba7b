#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: exit code 2 for usage, config and IO errors; 1 for syntax errors
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${formatAppError(error)}\n`)
      process.exitCode = 2
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
