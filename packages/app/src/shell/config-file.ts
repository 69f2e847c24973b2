import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError, formatSyntaxError, ioError } from "../core/errors.js"
import { toPlain } from "../core/json.js"
import { parseText } from "../core/parser.js"

// CHANGE: decode the optional config file with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(RFC 8259): "Many implementations report the last name/value pair only."
// REF: RFC 8259 §4
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined; the file itself must be strict JSON
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    pretty: S.Boolean,
    indent: S.Number.pipe(S.int(), S.between(0, 10)),
    maxInputBytes: S.Number.pipe(S.int(), S.positive())
  })
)

const decodeConfig = (path: string, raw: string): Effect.Effect<FileConfig, AppError> => {
  const parsed = parseText(raw)
  if (Either.isLeft(parsed)) {
    return Effect.fail(configError(`Invalid config file ${path}: ${formatSyntaxError(parsed.left)}`))
  }
  return pipe(
    S.decodeUnknown(RawConfigSchema, { onExcessProperty: "error" })(toPlain(parsed.right)),
    Effect.map((config) => ({
      ...(config.pretty === undefined ? {} : { pretty: config.pretty }),
      ...(config.indent === undefined ? {} : { indent: config.indent }),
      ...(config.maxInputBytes === undefined ? {} : { maxInputBytes: config.maxInputBytes })
    })),
    Effect.mapError((error) =>
      configError(`Invalid config file ${path}: ${TreeFormatter.formatErrorSync(error)}`)
    )
  )
}

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => ioError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError("NotFound", path)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => ioError(String(error))))
    )
    const decoded = yield* _(decodeConfig(path, contents))
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return decoded
  })
