import { Match } from "effect"

import type { AppError } from "./errors.js"
import { formatSyntaxError } from "./errors.js"

// CHANGE: render validator outcomes as user-facing lines
// WHY: keep message wording pure and deterministic across stdin and file input
// QUOTE(RFC 8259): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀e: renderAppError(e) is a single line
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: syntax errors always start with "Invalid JSON: "
// COMPLEXITY: O(n)

export const validMessage = "JSON is valid."

/**
 * Render any application error as one stderr line.
 *
 * @pure true
 * @invariant output matches the exit code category of the error
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("LexError", (value) => `Invalid JSON: ${formatSyntaxError(value)}`),
    Match.tag("ParseError", (value) => `Invalid JSON: ${formatSyntaxError(value)}`),
    Match.tag("FileError", (value) =>
      value.reason === "NotFound"
        ? `Error: File not found: ${value.path}`
        : `Error: Permission denied: ${value.path}`),
    Match.tag("IoError", (value) => `Error: ${value.message}`),
    Match.tag("CliError", (value) => `Error: ${value.message}`),
    Match.tag("ConfigError", (value) => `Error: ${value.message}`),
    Match.exhaustive
  )

const stripCarriageReturn = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line)

/**
 * Render the source line of an error with a caret under its column.
 *
 * @param text - Full input text.
 * @param line - 1-indexed line.
 * @param column - 1-indexed column, counted in code points.
 * @returns Two lines: the numbered source line and the caret line.
 *
 * @pure true
 * @invariant tabs before the column are kept so the caret lines up
 * @complexity O(n)
 */
export const renderExcerpt = (
  text: string,
  line: number,
  column: number
): ReadonlyArray<string> => {
  const source = stripCarriageReturn(text.split("\n")[line - 1] ?? "")
  const label = String(line)
  const padding = Array.from(source)
    .slice(0, Math.max(0, column - 1))
    .map((char) => (char === "\t" ? "\t" : " "))
    .join("")
  return [
    `  ${label} | ${source}`,
    `  ${" ".repeat(label.length)} | ${padding}^`
  ]
}
