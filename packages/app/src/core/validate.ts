import * as Either from "effect/Either"

import { formatSyntaxError } from "./errors.js"
import { parseText } from "./parser.js"

// CHANGE: expose a pass/fail validation service over lexer + parser
// WHY: callers that only need a verdict get one value and never an exception
// QUOTE(RFC 8259): "A JSON parser transforms a JSON text into another representation."
// REF: RFC 8259 §9
// SOURCE: n/a
// FORMAT THEOREM: ∀s: validate(s).valid ⇔ parseText(s) is Right
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error is present iff valid is false
// COMPLEXITY: O(n)

export type ValidationResult =
  | { readonly valid: true; readonly error: undefined }
  | { readonly valid: false; readonly error: string }

/**
 * Validate a complete JSON text.
 *
 * @param text - Input text.
 * @returns `{ valid: true }` or `{ valid: false, error }` with the formatted first error.
 *
 * @pure true
 * @invariant stack exhaustion on deep nesting is reported as "Unexpected error: ..."
 * @complexity O(n)
 */
export const validate = (text: string): ValidationResult => {
  const attempt = Either.try({
    try: () => parseText(text),
    catch: (error) => `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
  })
  if (Either.isLeft(attempt)) {
    return { valid: false, error: attempt.left }
  }
  const parsed = attempt.right
  if (Either.isLeft(parsed)) {
    return { valid: false, error: formatSyntaxError(parsed.left) }
  }
  return { valid: true, error: undefined }
}
