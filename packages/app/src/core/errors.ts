import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra of the lexer, parser and CLI
// WHY: every failure is a value with a stable tag, mapped once to an exit code
// QUOTE(RFC 8259): "A JSON parser MUST accept all texts that conform to the JSON grammar."
// REF: RFC 8259 §9
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: exitCodeFor(e) ∈ {1,2,3,4}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; syntax errors carry 1-indexed positions
// COMPLEXITY: O(1)/O(1)

export type LexError = {
  readonly _tag: "LexError"
  readonly message: string
  readonly line: number
  readonly column: number
}

export type ParseError = {
  readonly _tag: "ParseError"
  readonly message: string
  readonly line: number
  readonly column: number
}

export type JsonSyntaxError = LexError | ParseError

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = {
  readonly _tag: "FileError"
  readonly reason: "NotFound" | "PermissionDenied"
  readonly path: string
}
export type IoError = { readonly _tag: "IoError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | IoError
  | LexError
  | ParseError

export const ExitCode = {
  Success: 0,
  Syntax: 1,
  File: 2,
  Io: 3,
  Arguments: 4
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export const lexError = (message: string, line: number, column: number): LexError => ({
  _tag: "LexError",
  message,
  line,
  column
})

export const parseError = (message: string, line: number, column: number): ParseError => ({
  _tag: "ParseError",
  message,
  line,
  column
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (reason: FileError["reason"], path: string): FileError => ({
  _tag: "FileError",
  reason,
  path
})

export const ioError = (message: string): IoError => ({
  _tag: "IoError",
  message
})

export const isSyntaxError = (error: AppError): error is JsonSyntaxError =>
  error._tag === "LexError" || error._tag === "ParseError"

/**
 * Render a lexer or parser failure with its source position.
 *
 * @pure true
 * @invariant output starts with the failing stage and names line and column
 * @complexity O(1)
 */
export const formatSyntaxError = (error: JsonSyntaxError): string => {
  const stage = error._tag === "LexError" ? "Lexer" : "Parser"
  return `${stage} error at line ${error.line}, column ${error.column}: ${error.message}`
}

export const exitCodeFor = (error: AppError): ExitCode =>
  Match.value(error).pipe(
    Match.tag("LexError", () => ExitCode.Syntax),
    Match.tag("ParseError", () => ExitCode.Syntax),
    Match.tag("FileError", () => ExitCode.File),
    Match.tag("IoError", () => ExitCode.Io),
    Match.tag("CliError", () => ExitCode.Arguments),
    Match.tag("ConfigError", () => ExitCode.Arguments),
    Match.exhaustive
  )
