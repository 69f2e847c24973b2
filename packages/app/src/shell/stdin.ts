import { NodeStream } from "@effect/platform-node"
import * as Chunk from "effect/Chunk"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Stream from "effect/Stream"

import type { AppError } from "../core/errors.js"
import { ioError } from "../core/errors.js"
import { decodeUtf8, ensureWithinLimit } from "./input.js"

// CHANGE: expose standard input as a replaceable stream of byte chunks
// WHY: the CLI filter reads stdin in production and canned chunks in tests
// QUOTE(RFC 8259): "An implementation may set limits on the size of texts that it accepts."
// REF: RFC 8259 §9
// SOURCE: n/a
// FORMAT THEOREM: readStdin = Right(s) → s ≠ "" ∧ bytes(s) ≤ limit
// PURITY: SHELL
// EFFECT: Effect<string, AppError, Stdin>
// INVARIANT: empty input is an IoError; reading stops at the first chunk past the limit
// COMPLEXITY: O(n)

export interface StdinService {
  readonly chunks: Stream.Stream<Uint8Array, AppError>
}

export class Stdin extends Context.Tag("Stdin")<Stdin, StdinService>() {}

export const StdinLive: Layer.Layer<Stdin> = Layer.succeed(
  Stdin,
  Stdin.of({
    chunks: NodeStream.fromReadable<AppError, Uint8Array>(
      () => process.stdin,
      (error) => ioError(`Cannot read standard input: ${String(error)}`)
    )
  })
)

const concatChunks = (chunks: Chunk.Chunk<Uint8Array>): Uint8Array => {
  const parts = Chunk.toReadonlyArray(chunks)
  const bytes = new Uint8Array(parts.reduce((total, part) => total + part.byteLength, 0))
  let offset = 0
  for (const part of parts) {
    bytes.set(part, offset)
    offset += part.byteLength
  }
  return bytes
}

/**
 * Collect a byte stream, failing as soon as the running total passes the limit.
 * The upstream is not pulled again after the failing chunk.
 */
export const collectWithinLimit = (
  chunks: Stream.Stream<Uint8Array, AppError>,
  limit: number | undefined,
  label: string
): Effect.Effect<Uint8Array, AppError> =>
  chunks.pipe(
    Stream.mapAccumEffect(0, (total, chunk) =>
      Effect.map(
        ensureWithinLimit(total + chunk.byteLength, limit, label),
        (next) => [next, chunk] as const
      )),
    Stream.runCollect,
    Effect.map(concatChunks)
  )

export const readStdin = (
  maxInputBytes: number | undefined
): Effect.Effect<string, AppError, Stdin> =>
  Effect.gen(function*(_) {
    const stdin = yield* _(Stdin)
    const bytes = yield* _(collectWithinLimit(stdin.chunks, maxInputBytes, "Input"))
    yield* _(Effect.logDebug(`read ${bytes.byteLength} bytes from stdin`))
    if (bytes.byteLength === 0) {
      return yield* _(Effect.fail(ioError("No input provided")))
    }
    return yield* _(decodeUtf8(bytes, "Input"))
  })
