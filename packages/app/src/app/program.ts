import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import { makeAccessor } from "../core/accessor.js"
import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import { type AppError, unexpectedType } from "../core/errors.js"
import { onlyFieldsLike } from "../core/fields.js"
import type { NestedRecord, NestedValue } from "../core/json.js"
import { describeType, isNestedRecord, isSequence } from "../core/json.js"
import { render } from "../core/layout.js"
import { resolvePath } from "../core/path.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile } from "../shell/json-file.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "dense-json format | get | pick"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) = Right(r) → r.output = render(result(cmd))
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitOutput = (output: string, silent: boolean): Effect.Effect<void> => silent ? Effect.void : writeStdout(output)

const selectPath = (
  root: NestedValue,
  path: string,
  config: ResolvedConfig
): Effect.Effect<NestedValue, AppError> => {
  if (!config.indexStrings) {
    return fromEither(resolvePath(root, path))
  }
  return Effect.flatMap(fromEither(makeAccessor(root)), (accessor) => fromEither(accessor.resolve(path)))
}

const requireRecords = (root: NestedValue): Effect.Effect<ReadonlyArray<NestedRecord>, AppError> => {
  if (!isSequence(root)) {
    return Effect.fail(unexpectedType("pick", "list of dict", describeType(root)))
  }
  const records: Array<NestedRecord> = []
  for (const item of root) {
    if (!isNestedRecord(item)) {
      return Effect.fail(unexpectedType("pick", "list of dict", `list of ${describeType(item)}`))
    }
    records.push(item)
  }
  return Effect.succeed(records)
}

const selectValue = (
  cli: CliArgs,
  root: NestedValue,
  config: ResolvedConfig
): Effect.Effect<NestedValue, AppError> =>
  Match.value(cli.command).pipe(
    Match.when("format", () => Effect.succeed(root)),
    Match.when("get", () => selectPath(root, cli.path ?? "", config)),
    Match.when("pick", () => Effect.map(requireRecords(root), (records) => onlyFieldsLike(records, cli.terms))),
    Match.exhaustive
  )

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? defaultConfigPath
    const configFile = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const config = resolveConfig(cli, configFile)
    yield* _(Effect.logDebug(`config: ${configFile === undefined ? "defaults" : configPath}`))
    const root = yield* _(readJsonFile(cli.file))
    yield* _(Effect.logDebug(`loaded ${cli.file}, running ${cli.command}`))
    const selected = yield* _(selectValue(cli, root, config))
    const output = yield* _(fromEither(render(selected, { indent: config.indent })))
    yield* _(emitOutput(output, cli.silent))
    return { output }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant output is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      executeCommand(cli).pipe(
        Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)
      )
    )
  })
