#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"

import { StderrLoggerLive } from "../shell/logger.js"
import { StdinLive } from "../shell/stdin.js"
import { runCli } from "./program.js"

// CHANGE: wire the validator program into the Node runtime
// WHY: execute effects with platform services and map the result to the process exit code
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext | Stdin>
// INVARIANT: stdout lines are written before stderr lines
// COMPLEXITY: O(n)

const writeLines = (stream: NodeJS.WriteStream, lines: ReadonlyArray<string>): Effect.Effect<void> =>
  Effect.sync(() => {
    for (const line of lines) {
      stream.write(line.endsWith("\n") ? line : `${line}\n`)
    }
  })

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  yield* _(writeLines(process.stdout, result.stdout))
  yield* _(writeLines(process.stderr, result.stderr))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
})

NodeRuntime.runMain(
  Effect.provide(main, Layer.mergeAll(NodeContext.layer, StdinLive, StderrLoggerLive))
)
