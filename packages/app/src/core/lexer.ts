import * as Either from "effect/Either"

import type { LexError } from "./errors.js"
import { lexError } from "./errors.js"
import type { Token, TokenKind, TokenValue } from "./token.js"
import { makeToken } from "./token.js"

// CHANGE: implement a strict RFC 8259 lexer with exact source positions
// WHY: character-level grammar lives in one place; the parser only sees tokens
// QUOTE(RFC 8259): "All Unicode characters may be placed within the quotation marks, except for the characters that MUST be escaped"
// REF: RFC 8259 §2, §6, §7
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀s: tokenize(s) = Right(ts) → last(ts).kind = EndOfInput ∧ positions are non-decreasing
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only advance() moves the cursor; the first violation ends lexing
// COMPLEXITY: O(n) where n = input length

/**
 * Cursor over the input text. Owned by a single lexer and mutated only by
 * {@link advance}; `current` is the code point under the cursor.
 */
export interface LexerState {
  readonly text: string
  pos: number
  line: number
  column: number
  current: string | undefined
}

type LexResult<A> = Either.Either<A, LexError>

const punctuation: Readonly<Record<string, TokenKind>> = {
  "{": "LeftBrace",
  "}": "RightBrace",
  "[": "LeftBracket",
  "]": "RightBracket",
  ":": "Colon",
  ",": "Comma"
}

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const literals: ReadonlyArray<{ readonly word: string; readonly kind: TokenKind; readonly value: TokenValue }> = [
  { word: "true", kind: "True", value: true },
  { word: "false", kind: "False", value: false },
  { word: "null", kind: "Null", value: null }
]

const whitespace: ReadonlySet<string> = new Set([" ", "\t", "\r", "\n"])

const numberTerminators: ReadonlySet<string> = new Set([" ", "\t", "\r", "\n", ",", "]", "}"])

const isDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const isHexDigit = (char: string): boolean => /^[0-9a-fA-F]$/.test(char)

const isWordChar = (char: string): boolean => /^[A-Za-z0-9_]$/.test(char)

const codePointLabel = (code: number): string => `U+${code.toString(16).toUpperCase().padStart(4, "0")}`

/**
 * Render a character for a diagnostic: printable characters quoted,
 * control, format and separator characters as `U+XXXX`.
 */
export const describeChar = (char: string): string => {
  const code = char.codePointAt(0) ?? 0
  return /^[\p{C}\p{Z}]$/u.test(char) ? codePointLabel(code) : `'${char}'`
}

const codePointAt = (text: string, pos: number): string | undefined => {
  const code = text.codePointAt(pos)
  return code === undefined ? undefined : String.fromCodePoint(code)
}

export const makeLexer = (text: string): LexerState => ({
  text,
  pos: 0,
  line: 1,
  column: 1,
  current: codePointAt(text, 0)
})

const advance = (state: LexerState): void => {
  const consumed = state.current
  if (consumed === undefined) {
    return
  }
  state.pos += consumed.length
  if (consumed === "\n") {
    state.line += 1
    state.column = 1
  } else {
    state.column += 1
  }
  state.current = codePointAt(state.text, state.pos)
}

// Reads the cursor without carrying over narrowing from an earlier comparison.
const peek = (state: LexerState): string | undefined => state.current

const fail = (state: LexerState, message: string): LexResult<never> =>
  Either.left(lexError(message, state.line, state.column))

const skipWhitespace = (state: LexerState): void => {
  while (state.current !== undefined && whitespace.has(state.current)) {
    advance(state)
  }
}

const readUnicodeEscape = (state: LexerState): LexResult<string> => {
  advance(state)
  let digits = ""
  for (let index = 0; index < 4; index++) {
    const digit = state.current
    if (digit === undefined || !isHexDigit(digit)) {
      return fail(state, "Invalid Unicode escape sequence: expected 4 hex digits after '\\u'")
    }
    digits += digit
    advance(state)
  }
  // A surrogate pair written as two escapes joins into one code point once both halves are appended.
  return Either.right(String.fromCharCode(Number.parseInt(digits, 16)))
}

const readString = (state: LexerState): LexResult<Token> => {
  const line = state.line
  const column = state.column
  const unterminated = Either.left(lexError("Unterminated string", line, column))
  const chunks: Array<string> = []
  advance(state)
  for (;;) {
    const char = state.current
    if (char === undefined) {
      return unterminated
    }
    if (char === "\"") {
      advance(state)
      return Either.right(makeToken("String", line, column, chunks.join("")))
    }
    if (char === "\\") {
      advance(state)
      const escape = state.current
      if (escape === undefined) {
        return unterminated
      }
      const simple = simpleEscapes[escape]
      if (simple !== undefined) {
        chunks.push(simple)
        advance(state)
        continue
      }
      if (escape !== "u") {
        return fail(state, `Invalid escape sequence '\\${escape}'`)
      }
      const decoded = readUnicodeEscape(state)
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      chunks.push(decoded.right)
      continue
    }
    const code = char.codePointAt(0) ?? 0
    if (code < 0x20) {
      return fail(state, `String contains unescaped control character ${codePointLabel(code)}`)
    }
    chunks.push(char)
    advance(state)
  }
}

const skipDigits = (state: LexerState): void => {
  while (isDigit(state.current)) {
    advance(state)
  }
}

const decodeNumber = (
  literal: string,
  integral: boolean,
  line: number,
  column: number
): LexResult<Token> => {
  if (integral) {
    const big = BigInt(literal)
    const safe = big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER)
    return Either.right(makeToken("Number", line, column, safe ? Number(big) : big))
  }
  const value = Number(literal)
  if (!Number.isFinite(value)) {
    return Either.left(lexError(`Number out of range: ${literal}`, line, column))
  }
  return Either.right(makeToken("Number", line, column, value))
}

const readNumber = (state: LexerState): LexResult<Token> => {
  const line = state.line
  const column = state.column
  const start = state.pos
  if (state.current === "-") {
    advance(state)
    if (peek(state) === "." && isDigit(state.text[state.pos + 1])) {
      return fail(state, "Number cannot start with a decimal point")
    }
  }
  if (state.current === "0") {
    advance(state)
    if (isDigit(state.current)) {
      return fail(state, "Leading zeros are not allowed")
    }
  } else if (isDigit(state.current)) {
    skipDigits(state)
  } else {
    return fail(state, "Expected digit after '-'")
  }
  let integral = true
  if (state.current === ".") {
    integral = false
    advance(state)
    if (!isDigit(state.current)) {
      return fail(state, "Expected digit after decimal point")
    }
    skipDigits(state)
  }
  if (state.current === "e" || state.current === "E") {
    integral = false
    advance(state)
    const sign = peek(state)
    if (sign === "+" || sign === "-") {
      advance(state)
    }
    if (!isDigit(state.current)) {
      return fail(state, "Expected digit in exponent")
    }
    skipDigits(state)
  }
  const next = state.current
  if (next !== undefined && !numberTerminators.has(next)) {
    return fail(state, `Unexpected character ${describeChar(next)} after number`)
  }
  return decodeNumber(state.text.slice(start, state.pos), integral, line, column)
}

const readLiteral = (state: LexerState): LexResult<Token> => {
  const line = state.line
  const column = state.column
  const literal = literals.find((candidate) => state.text.startsWith(candidate.word, state.pos))
  if (literal === undefined) {
    const word = /^[A-Za-z0-9_]*/.exec(state.text.slice(state.pos))?.[0] ?? ""
    return fail(state, `Invalid literal '${word}'`)
  }
  for (let index = 0; index < literal.word.length; index++) {
    advance(state)
  }
  const following = state.current
  if (following !== undefined && isWordChar(following)) {
    return fail(state, `Unexpected character ${describeChar(following)} after '${literal.word}'`)
  }
  return Either.right(makeToken(literal.kind, line, column, literal.value))
}

/**
 * Produce the next token from the lexer state.
 *
 * @param state - Lexer owned by the caller.
 * @returns Either with the next Token or the first LexError.
 *
 * @pure false
 * @effect mutates state
 * @invariant after EndOfInput every call returns EndOfInput at the same position
 * @complexity O(k) where k = length of the lexeme
 */
export const nextToken = (state: LexerState): LexResult<Token> => {
  skipWhitespace(state)
  const char = state.current
  if (char === undefined) {
    return Either.right(makeToken("EndOfInput", state.line, state.column))
  }
  const structural = punctuation[char]
  if (structural !== undefined) {
    const token = makeToken(structural, state.line, state.column)
    advance(state)
    return Either.right(token)
  }
  if (char === "\"") {
    return readString(state)
  }
  if (char === "'") {
    return fail(state, "Single quotes not allowed for strings")
  }
  if (char === "-" || isDigit(char)) {
    return readNumber(state)
  }
  if (char === "." && isDigit(state.text[state.pos + 1])) {
    return fail(state, "Number cannot start with a decimal point")
  }
  if (char === "t" || char === "f" || char === "n") {
    return readLiteral(state)
  }
  return fail(state, `Unexpected character ${describeChar(char)}`)
}

/**
 * Tokenize a complete text.
 *
 * @param text - JSON text.
 * @returns Either with all tokens (ending in EndOfInput) or the first LexError.
 *
 * @pure true
 * @invariant result equals repeated nextToken calls on a fresh lexer
 * @complexity O(n)
 */
export const tokenize = (text: string): LexResult<ReadonlyArray<Token>> => {
  const state = makeLexer(text)
  const tokens: Array<Token> = []
  for (;;) {
    const next = nextToken(state)
    if (Either.isLeft(next)) {
      return Either.left(next.left)
    }
    tokens.push(next.right)
    if (next.right.kind === "EndOfInput") {
      return Either.right(tokens)
    }
  }
}
