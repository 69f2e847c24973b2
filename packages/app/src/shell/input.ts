import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError, ioError } from "../core/errors.js"

// CHANGE: read the complete input document as strict UTF-8
// WHY: the lexer works on in-memory text; access and encoding failures need distinct exit codes
// QUOTE(RFC 8259): "JSON text exchanged between systems that are not part of a closed ecosystem MUST be encoded using UTF-8"
// REF: RFC 8259 §8.1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(s) → utf8(bytes(p)) = s
// PURITY: SHELL
// EFFECT: Effect<string, AppError, FileSystem>
// INVARIANT: missing and unreadable files are FileError; everything else is IoError
// INVARIANT: with a size limit, an oversized file is rejected from its stat before it is read
// COMPLEXITY: O(n)

const mapReadError = (path: string) => (error: PlatformError): AppError => {
  if (error._tag === "SystemError" && error.reason === "NotFound") {
    return fileError("NotFound", path)
  }
  if (error._tag === "SystemError" && error.reason === "PermissionDenied") {
    return fileError("PermissionDenied", path)
  }
  return ioError(`Cannot read ${path}: ${error.message}`)
}

export const ensureWithinLimit = (
  size: number,
  limit: number | undefined,
  label: string
): Effect.Effect<number, AppError> =>
  limit !== undefined && size > limit
    ? Effect.fail(ioError(`${label} exceeds the maximum size of ${limit} bytes`))
    : Effect.succeed(size)

/**
 * Decode bytes as UTF-8, failing on any malformed sequence.
 * A leading byte order mark is dropped.
 */
export const decodeUtf8 = (bytes: Uint8Array, label: string): Effect.Effect<string, AppError> =>
  Effect.try({
    try: () => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
    catch: () => ioError(`${label} is not valid UTF-8`)
  })

export const readInputFile = (
  path: string,
  maxInputBytes: number | undefined
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const label = `File ${path}`
    if (maxInputBytes !== undefined) {
      const info = yield* _(fs.stat(path).pipe(Effect.mapError(mapReadError(path))))
      yield* _(ensureWithinLimit(Number(info.size), maxInputBytes, label))
    }
    const bytes = yield* _(fs.readFile(path).pipe(Effect.mapError(mapReadError(path))))
    yield* _(Effect.logDebug(`read ${bytes.byteLength} bytes from ${path}`))
    // The file may have grown between stat and read.
    yield* _(ensureWithinLimit(bytes.byteLength, maxInputBytes, label))
    return yield* _(decodeUtf8(bytes, label))
  })
