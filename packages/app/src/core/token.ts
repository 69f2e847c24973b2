import { Match } from "effect"

// CHANGE: define the closed token vocabulary of the JSON lexer
// WHY: parser decisions are made on token kinds only, never on raw characters
// QUOTE(RFC 8259): "JSON text is a sequence of tokens. The set of tokens includes six structural characters, strings, numbers, and three literal names."
// REF: RFC 8259 §2
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀t ∈ Token: t.kind ∈ TokenKind ∧ t.line ≥ 1 ∧ t.column ≥ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: position fields mark the first character of the lexeme
// COMPLEXITY: O(1)/O(1)

export type TokenKind =
  | "LeftBrace"
  | "RightBrace"
  | "LeftBracket"
  | "RightBracket"
  | "Colon"
  | "Comma"
  | "String"
  | "Number"
  | "True"
  | "False"
  | "Null"
  | "EndOfInput"

export type TokenValue = string | number | bigint | boolean | null

export interface Token {
  readonly kind: TokenKind
  readonly value?: TokenValue
  readonly line: number
  readonly column: number
}

export const makeToken = (
  kind: TokenKind,
  line: number,
  column: number,
  value?: TokenValue
): Token => (value === undefined ? { kind, line, column } : { kind, value, line, column })

/**
 * Render a token kind for diagnostics.
 *
 * @pure true
 * @invariant punctuation is quoted, value kinds are named
 * @complexity O(1)
 */
export const describeTokenKind = (kind: TokenKind): string =>
  Match.value(kind).pipe(
    Match.when("LeftBrace", () => "'{'"),
    Match.when("RightBrace", () => "'}'"),
    Match.when("LeftBracket", () => "'['"),
    Match.when("RightBracket", () => "']'"),
    Match.when("Colon", () => "':'"),
    Match.when("Comma", () => "','"),
    Match.when("String", () => "string"),
    Match.when("Number", () => "number"),
    Match.when("True", () => "'true'"),
    Match.when("False", () => "'false'"),
    Match.when("Null", () => "'null'"),
    Match.when("EndOfInput", () => "end of input"),
    Match.exhaustive
  )
