import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

import type { CliArgs, CliError } from "../core/cli.js"
import { parseCliArgs, usage } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError, JsonSyntaxError } from "../core/errors.js"
import { ExitCode, exitCodeFor, ioError } from "../core/errors.js"
import type { Value } from "../core/json.js"
import { parseText } from "../core/parser.js"
import { renderAppError, renderExcerpt, validMessage } from "../core/report.js"
import { serialize } from "../core/serialize.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readInputFile } from "../shell/input.js"
import type { Stdin } from "../shell/stdin.js"
import { readStdin } from "../shell/stdin.js"

// CHANGE: orchestrate the validator CLI with functional core + imperative shell
// WHY: a single entrypoint turns every failure into an exit code and output lines
// QUOTE(RFC 8259): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1,2,3,4}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, never, FileSystem | Stdin>
// INVARIANT: nothing is written with --quiet except usage errors
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: ExitCode
  readonly stdout: ReadonlyArray<string>
  readonly stderr: ReadonlyArray<string>
}

type ProgramEnv = FileSystemService | Stdin

interface CheckedInput {
  readonly text: string
  readonly config: ResolvedConfig
  readonly result: Either.Either<Value, JsonSyntaxError>
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))

const silent = (exitCode: ExitCode): ProgramResult => ({ exitCode, stdout: [], stderr: [] })

const usageFailure = (error: CliError): ProgramResult => ({
  exitCode: ExitCode.Arguments,
  stdout: [],
  stderr: [renderAppError(error)]
})

const readInput = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<string, AppError, ProgramEnv> =>
  cli.file === undefined ? readStdin(config.maxInputBytes) : readInputFile(cli.file, config.maxInputBytes)

const checkInput = (cli: CliArgs): Effect.Effect<CheckedInput, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    const text = yield* _(readInput(cli, config))
    const result = yield* _(
      Effect.try({
        try: () => parseText(text),
        catch: (error) => ioError(`Unexpected error: ${describeError(error)}`)
      })
    )
    yield* _(
      Effect.logDebug(
        Either.isRight(result) ? `parsed a ${result.right._tag} document` : `rejected: ${result.left.message}`
      )
    )
    return { text, config, result }
  })

const renderValid = (
  cli: CliArgs,
  config: ResolvedConfig,
  value: Value
): Effect.Effect<ProgramResult, AppError> => {
  if (cli.quiet) {
    return Effect.succeed(silent(ExitCode.Success))
  }
  if (!config.pretty) {
    return Effect.succeed({ exitCode: ExitCode.Success, stdout: [validMessage], stderr: [] })
  }
  return Effect.try({
    try: () => ({ exitCode: ExitCode.Success, stdout: [serialize(value, config.indent)], stderr: [] }),
    catch: (error) => ioError(`Error while pretty printing: ${describeError(error)}`)
  })
}

const renderInvalid = (cli: CliArgs, text: string, error: JsonSyntaxError): ProgramResult => {
  if (cli.quiet) {
    return silent(ExitCode.Syntax)
  }
  const excerpt = cli.verbose ? renderExcerpt(text, error.line, error.column) : []
  return { exitCode: ExitCode.Syntax, stdout: [], stderr: [renderAppError(error), ...excerpt] }
}

const renderFailure = (cli: CliArgs, error: AppError): ProgramResult =>
  cli.quiet
    ? silent(exitCodeFor(error))
    : { exitCode: exitCodeFor(error), stdout: [], stderr: [renderAppError(error)] }

const runValidation = (cli: CliArgs): Effect.Effect<ProgramResult, never, ProgramEnv> =>
  checkInput(cli).pipe(
    Effect.flatMap((checked): Effect.Effect<ProgramResult, AppError> =>
      Either.isRight(checked.result)
        ? renderValid(cli, checked.config, checked.result.right)
        : Effect.succeed(renderInvalid(cli, checked.text, checked.result.left))
    ),
    Effect.catchAll((error) => Effect.succeed(renderFailure(cli, error))),
    Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)
  )

/**
 * Run the validator CLI with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with exit code and the lines to print.
 *
 * @pure false
 * @effect FileSystem, Stdin
 * @invariant never fails; every AppError is folded into the result
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, ProgramEnv> =>
  Effect.gen(function*(_) {
    const parsed = parseCliArgs(argv)
    if (Either.isLeft(parsed)) {
      return usageFailure(parsed.left)
    }
    const cli = parsed.right
    if (cli.help) {
      return { exitCode: ExitCode.Success, stdout: [usage], stderr: [] }
    }
    return yield* _(runValidation(cli))
  })
