import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { JsonSyntaxError } from "../../src/core/errors.js"
import { lexError, parseError } from "../../src/core/errors.js"
import type { Value } from "../../src/core/json.js"
import { toPlain } from "../../src/core/json.js"
import { makeLexer, tokenize } from "../../src/core/lexer.js"
import { lexerSource, parse, parseText, tokenSource } from "../../src/core/parser.js"

const parsed = (text: string): Value =>
  Either.getOrThrowWith(parseText(text), (error) => new Error(`unexpected error: ${error.message}`))

const parseFailure = (text: string): JsonSyntaxError =>
  Either.getOrThrowWith(Either.flip(parseText(text)), () => new Error(`expected ${text} to be rejected`))

describe("parseText", () => {
  it.effect("builds nested values", () =>
    Effect.sync(() => {
      expect(toPlain(parsed(`{"a": [1, {"b": null}], "c": "d", "e": false}`))).toEqual({
        a: [1, { b: null }],
        c: "d",
        e: false
      })
    }))

  it.effect("accepts every scalar as a top-level value", () =>
    Effect.sync(() => {
      expect(parsed("null")).toEqual({ _tag: "Null" })
      expect(parsed("true")).toEqual({ _tag: "Bool", value: true })
      expect(parsed("  42  ")).toEqual({ _tag: "Number", value: 42 })
      expect(parsed(`"s"`)).toEqual({ _tag: "String", value: "s" })
    }))

  it.effect("accepts empty containers", () =>
    Effect.sync(() => {
      expect(parsed("[]")).toEqual({ _tag: "Array", items: [] })
      expect(parsed(" { } ")).toEqual({ _tag: "Object", entries: new Map() })
    }))

  it.effect("preserves object key order", () =>
    Effect.sync(() => {
      const value = parsed(`{"z": 1, "a": 2, "m": 3}`)
      expect(value._tag === "Object" ? [...value.entries.keys()] : []).toEqual(["z", "a", "m"])
    }))

  it.effect("keeps large integers as bigint", () =>
    Effect.sync(() => {
      expect(parsed("[9007199254740993]")).toEqual({
        _tag: "Array",
        items: [{ _tag: "Number", value: 9007199254740993n }]
      })
    }))

  it.effect("handles deep nesting", () =>
    Effect.sync(() => {
      const depth = 1000
      const value = parsed("[".repeat(depth) + "]".repeat(depth))
      let level = 0
      let next = value._tag === "Array" ? value.items[0] : undefined
      while (next !== undefined) {
        level += 1
        next = next._tag === "Array" ? next.items[0] : undefined
      }
      expect(level).toBe(depth - 1)
    }))
})

describe("structural errors", () => {
  it.effect("rejects trailing commas at the closing token", () =>
    Effect.sync(() => {
      expect(parseFailure(`{"a":1,}`)).toEqual(parseError("Trailing comma before '}'", 1, 8))
      expect(parseFailure("[1,]")).toEqual(parseError("Trailing comma before ']'", 1, 4))
    }))

  it.effect("reports duplicate keys at the repeated key", () =>
    Effect.sync(() => {
      expect(parseFailure(`{"a":1,"a":2}`)).toEqual(parseError("Duplicate key 'a'", 1, 8))
    }))

  it.effect("rejects duplicates in nested objects only within the same object", () =>
    Effect.sync(() => {
      expect(Either.isRight(parseText(`{"a": {"a": 1}, "b": {"a": 2}}`))).toBe(true)
      expect(parseFailure(`[{"k": 1}, {"k": 2, "k": 3}]`)).toEqual(parseError("Duplicate key 'k'", 1, 21))
    }))

  it.effect("requires string keys", () =>
    Effect.sync(() => {
      expect(parseFailure("{true: 1}")).toEqual(parseError("Object key must be a string, got 'true'", 1, 2))
    }))

  it.effect("names the expected and the found token", () =>
    Effect.sync(() => {
      expect(parseFailure(`{"a" 1}`)).toEqual(parseError("Expected ':', got number", 1, 6))
      expect(parseFailure("[1 2]")).toEqual(parseError("Expected ']', got number", 1, 4))
      expect(parseFailure(`{"a": 1 "b": 2}`)).toEqual(parseError("Expected '}', got string", 1, 9))
    }))

  it.effect("locates a missing value on a later line", () =>
    Effect.sync(() => {
      expect(parseFailure("{\n  \"a\": ,\n}")).toEqual(parseError("Expected a value, got ','", 2, 8))
    }))

  it.effect("rejects empty and truncated input", () =>
    Effect.sync(() => {
      expect(parseFailure("")).toEqual(parseError("Unexpected end of input", 1, 1))
      expect(parseFailure("   \n")).toEqual(parseError("Unexpected end of input", 2, 1))
      expect(parseFailure("[")).toEqual(parseError("Unexpected end of input", 1, 2))
      expect(parseFailure(`{"a":`)).toEqual(parseError("Unexpected end of input", 1, 6))
    }))

  it.effect("rejects content after the top-level value", () =>
    Effect.sync(() => {
      expect(parseFailure("{} {}")).toEqual(parseError("Unexpected content after JSON value: '{'", 1, 4))
      expect(parseFailure("1 2")).toEqual(parseError("Unexpected content after JSON value: number", 1, 3))
    }))

  it.effect("surfaces lexer errors met while parsing", () =>
    Effect.sync(() => {
      expect(parseFailure("[1, 01]")).toEqual(lexError("Leading zeros are not allowed", 1, 6))
      expect(parseFailure(`{"a":1} extra`)).toEqual(lexError("Unexpected character 'e'", 1, 9))
    }))
})

describe("token sources", () => {
  it.effect("parses a replayed token sequence like the text itself", () =>
    Effect.sync(() => {
      const text = `{"list": [1, 2.5, "x"], "flag": true}`
      const tokens = Either.getOrThrow(tokenize(text))
      expect(Either.getOrThrow(parse(tokenSource(tokens)))).toEqual(parsed(text))
    }))

  it.effect("reads from a lexer lazily", () =>
    Effect.sync(() => {
      const value = Either.getOrThrow(parse(lexerSource(makeLexer("[true, null]"))))
      expect(toPlain(value)).toEqual([true, null])
    }))

  it.effect("treats an empty token sequence as end of input", () =>
    Effect.sync(() => {
      const error = Either.getOrThrow(Either.flip(parse(tokenSource([]))))
      expect(error).toEqual(parseError("Unexpected end of input", 1, 1))
    }))
})
