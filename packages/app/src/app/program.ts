import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { buildReport, hasFailures, renderHumanReport, renderJsonReport } from "../core/report.js"
import type { Report } from "../core/types.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument } from "../shell/document.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: single entrypoint with typed errors and deterministic outputs
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n) where n = total input size

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (cli: CliArgs, report: Report, json: boolean): Effect.Effect<void> => {
  if (cli.silent) {
    return Effect.void
  }
  const payload = json ? renderJsonReport(report) : renderHumanReport(report, cli.command)
  return writeStdout(payload)
}

const checkFiles = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const resolved = yield* _(fromEither(resolveConfig(cli, configFile)))
    const outcomes = yield* _(
      Effect.forEach(resolved.files, (file) => readDocument(file, { maxDepth: resolved.maxDepth }), {
        concurrency: 1
      })
    )
    const report = buildReport(outcomes)
    yield* _(Effect.logDebug(`parsed=${report.totals.parsed} failed=${report.totals.failed}`))
    yield* _(emitReport(cli, report, resolved.json))
    return { report, exitCode: hasFailures(report) ? 1 : 0 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is 1 iff at least one file failed to parse
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      checkFiles(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })
