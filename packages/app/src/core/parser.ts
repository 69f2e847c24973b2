import * as Either from "effect/Either"

import type { JsonSyntaxError, LexError } from "./errors.js"
import { parseError } from "./errors.js"
import type { Value } from "./json.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonObject, jsonString } from "./json.js"
import type { LexerState } from "./lexer.js"
import { makeLexer, nextToken } from "./lexer.js"
import type { Token, TokenKind } from "./token.js"
import { describeTokenKind } from "./token.js"

// CHANGE: build the value tree with an LL(1) recursive-descent parser
// WHY: one procedure per grammar rule keeps structural errors local and exact
// QUOTE(RFC 8259): "JSON-text = ws value ws"
// REF: RFC 8259 §2, §4, §5
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → s ⊨ json ∧ keys(v) are unique per object
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: exactly one lookahead token; the first error aborts the parse
// COMPLEXITY: O(n) where n = number of tokens; recursion depth = nesting depth

/**
 * Pull-based token supplier. Must keep returning EndOfInput once exhausted.
 */
export interface TokenSource {
  readonly next: () => Either.Either<Token, LexError>
}

type ParseResult<A> = Either.Either<A, JsonSyntaxError>

export const lexerSource = (lexer: LexerState): TokenSource => ({
  next: () => nextToken(lexer)
})

/**
 * Replay a tokenize() result. Past the end it repeats the last token, or an
 * EndOfInput at 1:1 when the sequence is empty.
 */
export const tokenSource = (tokens: ReadonlyArray<Token>): TokenSource => {
  let index = 0
  const fallback: Token = tokens[tokens.length - 1] ?? { kind: "EndOfInput", line: 1, column: 1 }
  return {
    next: () => {
      const token = tokens[index] ?? fallback
      index = Math.min(index + 1, tokens.length)
      return Either.right(token)
    }
  }
}

interface Parser {
  readonly source: TokenSource
  current: Token
}

// The lookahead changes inside advance(); reading it through a call keeps earlier checks from narrowing it.
const lookahead = (parser: Parser): Token => parser.current

const failAt = (token: Token, message: string): ParseResult<never> =>
  Either.left(parseError(message, token.line, token.column))

const advance = (parser: Parser): ParseResult<void> => {
  const next = parser.source.next()
  if (Either.isLeft(next)) {
    return Either.left(next.left)
  }
  parser.current = next.right
  return Either.right(undefined)
}

const eat = (parser: Parser, expected: TokenKind): ParseResult<Token> => {
  const token = parser.current
  if (token.kind !== expected) {
    return failAt(
      token,
      `Expected ${describeTokenKind(expected)}, got ${describeTokenKind(token.kind)}`
    )
  }
  return Either.map(advance(parser), () => token)
}

const scalarValue = (token: Token): Value | undefined => {
  const value = token.value
  switch (token.kind) {
    case "String":
      return typeof value === "string" ? jsonString(value) : undefined
    case "Number":
      return typeof value === "number" || typeof value === "bigint" ? jsonNumber(value) : undefined
    case "True":
      return jsonBool(true)
    case "False":
      return jsonBool(false)
    case "Null":
      return jsonNull
    default:
      return undefined
  }
}

const parseArray = (parser: Parser): ParseResult<Value> => {
  const opened = eat(parser, "LeftBracket")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const items: Array<Value> = []
  if (lookahead(parser).kind === "RightBracket") {
    return Either.map(advance(parser), () => jsonArray(items))
  }
  for (;;) {
    const item = parseValue(parser)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
    if (lookahead(parser).kind !== "Comma") {
      break
    }
    const comma = advance(parser)
    if (Either.isLeft(comma)) {
      return Either.left(comma.left)
    }
    if (lookahead(parser).kind === "RightBracket") {
      return failAt(lookahead(parser), "Trailing comma before ']'")
    }
  }
  return Either.map(eat(parser, "RightBracket"), () => jsonArray(items))
}

const parseMember = (
  parser: Parser,
  entries: Map<string, Value>
): ParseResult<void> => {
  const keyToken = parser.current
  if (keyToken.kind !== "String" || typeof keyToken.value !== "string") {
    return failAt(keyToken, `Object key must be a string, got ${describeTokenKind(keyToken.kind)}`)
  }
  const key = keyToken.value
  const afterKey = advance(parser)
  if (Either.isLeft(afterKey)) {
    return Either.left(afterKey.left)
  }
  const colon = eat(parser, "Colon")
  if (Either.isLeft(colon)) {
    return Either.left(colon.left)
  }
  const value = parseValue(parser)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  if (entries.has(key)) {
    return failAt(keyToken, `Duplicate key '${key}'`)
  }
  entries.set(key, value.right)
  return Either.right(undefined)
}

const parseObject = (parser: Parser): ParseResult<Value> => {
  const opened = eat(parser, "LeftBrace")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const entries = new Map<string, Value>()
  if (lookahead(parser).kind === "RightBrace") {
    return Either.map(advance(parser), () => jsonObject(entries))
  }
  for (;;) {
    const member = parseMember(parser, entries)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    if (lookahead(parser).kind !== "Comma") {
      break
    }
    const comma = advance(parser)
    if (Either.isLeft(comma)) {
      return Either.left(comma.left)
    }
    if (lookahead(parser).kind === "RightBrace") {
      return failAt(lookahead(parser), "Trailing comma before '}'")
    }
  }
  return Either.map(eat(parser, "RightBrace"), () => jsonObject(entries))
}

const parseValue = (parser: Parser): ParseResult<Value> => {
  const token = parser.current
  if (token.kind === "LeftBrace") {
    return parseObject(parser)
  }
  if (token.kind === "LeftBracket") {
    return parseArray(parser)
  }
  if (token.kind === "EndOfInput") {
    return failAt(token, "Unexpected end of input")
  }
  const scalar = scalarValue(token)
  if (scalar === undefined) {
    return failAt(token, `Expected a value, got ${describeTokenKind(token.kind)}`)
  }
  return Either.map(advance(parser), () => scalar)
}

/**
 * Parse one JSON document from a token source.
 *
 * @param source - Token supplier, usually {@link lexerSource}.
 * @returns Either with the value tree or the first lex/parse error.
 *
 * @pure false
 * @effect consumes the token source
 * @invariant nothing but EndOfInput may follow the top-level value
 * @complexity O(n); nesting is bounded only by the call stack
 */
export const parse = (source: TokenSource): ParseResult<Value> => {
  const first = source.next()
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  const parser: Parser = { source, current: first.right }
  const value = parseValue(parser)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  const rest = parser.current
  if (rest.kind !== "EndOfInput") {
    return failAt(rest, `Unexpected content after JSON value: ${describeTokenKind(rest.kind)}`)
  }
  return Either.right(value.right)
}

/**
 * Lex and parse a complete text.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseText = (text: string): ParseResult<Value> => parse(lexerSource(makeLexer(text)))
