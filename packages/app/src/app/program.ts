import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"
import type * as Either from "effect/Either"
import * as Logger from "effect/Logger"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderError } from "../core/errors.js"
import type { CleanOutcome } from "../core/fixpoint.js"
import { runFixpoint } from "../core/fixpoint.js"
import { buildReport, renderHumanReport, renderJsonReport } from "../core/report.js"
import { serializeScalar } from "../core/tree.js"
import type { Report } from "../core/types.js"
import { expandArgFiles } from "../shell/arg-files.js"
import { loadConfigFile } from "../shell/config-file.js"
import { levelFromFlags, stderrLoggerLayer } from "../shell/logger.js"
import { readTreeFile, writeTreeFile } from "../shell/tree-file.js"

// CHANGE: orchestrate the cleaning run with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): n/a
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) = Right(r) → r.exitCode ∈ {0,2}; Left(e) → no output file is written
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

// CHANGE: place the cleaned copy beside the input unless an output is configured
// WHY: the source document is never overwritten by default
// QUOTE(TZ): n/a
// REF: req-output-path-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f: output(f) = join(dirname(f), "cleaned_" + basename(f)) when not configured
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: resolved output path is deterministic for fixed inputs
// COMPLEXITY: O(1)
const resolveOutputPath = (
  cli: CliArgs,
  config: ResolvedConfig,
  path: PathService
): string => config.output ?? path.join(path.dirname(cli.file), `cleaned_${path.basename(cli.file)}`)

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(`${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (report: Report, json: boolean, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  const payload = json ? renderJsonReport(report) : renderHumanReport(report)
  return writeStdout(payload)
}

const logPasses = (outcome: CleanOutcome): Effect.Effect<void> =>
  Effect.forEach(outcome.passes, (pass, index) =>
    Effect.logDebug(
      `pass ${index + 1}: orphaned [${pass.orphaned.map(serializeScalar).join(", ")}], ` +
        `occurrences ${pass.totalBefore} -> ${pass.totalAfter}`
    ), { discard: true })

const handleClean = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const config = resolveConfig(cli, fileConfig)
    const path = yield* _(Path)
    const output = resolveOutputPath(cli, config, path)
    yield* _(
      Effect.logDebug(
        `search=[${config.searchKeys.join(",")}] clean=[${config.cleanKeys.join(",")}] ` +
          `ignore=[${config.ignorePaths.join(",")}]`
      )
    )
    const tree = yield* _(readTreeFile(cli.file))
    const outcome = yield* _(fromEither(runFixpoint(tree, config)))
    yield* _(Effect.logDebug(`collected ${outcome.candidates.length} candidate values`))
    yield* _(logPasses(outcome))
    if (!cli.dryRun) {
      yield* _(writeTreeFile(output, outcome.tree))
    }
    const report = buildReport({ input: cli.file, output, written: !cli.dryRun }, outcome)
    yield* _(emitReport(report, cli.json, cli.silent))
    const exitCode = cli.failOnRemoval && report.removedValues.length > 0 ? 2 : 0
    return { report, exitCode }
  })

/**
 * Run the CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const rawArgs = yield* _(expandArgFiles(argv.slice(2)))
    const cli = yield* _(fromEither(parseCliArgs(rawArgs)))
    return yield* _(
      handleClean(cli).pipe(Logger.withMinimumLogLevel(levelFromFlags(cli)))
    )
  }).pipe(Effect.provide(stderrLoggerLayer))

/**
 * Report a failed run on stderr.
 *
 * @returns The process exit code for failures.
 *
 * @pure false
 * @complexity O(1)
 */
export const reportFailure = (error: AppError): Effect.Effect<number> =>
  writeStderr(renderError(error)).pipe(Effect.as(1))
