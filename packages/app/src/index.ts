export { describeTokenKind } from "./core/token.js"
export type { Token, TokenKind, TokenValue } from "./core/token.js"
export { describeChar, makeLexer, nextToken, tokenize } from "./core/lexer.js"
export type { LexerState } from "./core/lexer.js"
export { lexerSource, parse, parseText, tokenSource } from "./core/parser.js"
export type { TokenSource } from "./core/parser.js"
export { validate } from "./core/validate.js"
export type { ValidationResult } from "./core/validate.js"
export { serialize } from "./core/serialize.js"
export {
  equalValues,
  jsonArray,
  jsonBool,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  toPlain
} from "./core/json.js"
export type { JsonNumber, Value, ValueTag } from "./core/json.js"
export { formatSyntaxError, lexError, parseError } from "./core/errors.js"
export type { JsonSyntaxError, LexError, ParseError } from "./core/errors.js"
