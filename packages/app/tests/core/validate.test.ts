import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { equalValues, parseText, serialize, validate } from "../../src/index.js"

const documents: ReadonlyArray<string> = [
  "{}",
  "[]",
  "null",
  "  42  ",
  `{"name": "widget", "tags": ["a", "b"], "size": {"w": 1.5, "h": -2e3}}`,
  `[true, false, null, "\\u00e9\\n", 18446744073709551616]`,
  "[[[[{}]]]]",
  "1e20",
  "100000000000000000000.0",
  "[-2.5e17, 9007199254740993.0]"
]

describe("validate", () => {
  it.effect("accepts conforming documents", () =>
    Effect.sync(() => {
      for (const document of documents) {
        expect(validate(document)).toEqual({ valid: true, error: undefined })
      }
    }))

  it.effect("formats the first error with stage and position", () =>
    Effect.sync(() => {
      expect(validate(`{"a":1,"a":2}`)).toEqual({
        valid: false,
        error: "Parser error at line 1, column 8: Duplicate key 'a'"
      })
      expect(validate(`{"a":1,}`)).toEqual({
        valid: false,
        error: "Parser error at line 1, column 8: Trailing comma before '}'"
      })
      expect(validate("{\n  \"a\": ,\n}")).toEqual({
        valid: false,
        error: "Parser error at line 2, column 8: Expected a value, got ','"
      })
      expect(validate(`"\\q"`)).toEqual({
        valid: false,
        error: "Lexer error at line 1, column 3: Invalid escape sequence '\\q'"
      })
      expect(validate(`"\\u00"`)).toEqual({
        valid: false,
        error: "Lexer error at line 1, column 6: Invalid Unicode escape sequence: expected 4 hex digits after '\\u'"
      })
    }))

  it.effect("rejects malformed numbers", () =>
    Effect.sync(() => {
      for (const text of ["01", ".5", "1.", "1e", "-", "+1", "0x10", "NaN", "Infinity"]) {
        expect(validate(text).valid).toBe(false)
      }
    }))

  it.effect("rejects every unescaped control character inside strings", () =>
    Effect.sync(() => {
      for (let code = 0; code < 0x20; code++) {
        const hex = code.toString(16).toUpperCase().padStart(4, "0")
        expect(validate(`"a${String.fromCharCode(code)}b"`)).toEqual({
          valid: false,
          error: `Lexer error at line 1, column 3: String contains unescaped control character U+${hex}`
        })
      }
    }))

  it.effect("rejects trailing content and comments", () =>
    Effect.sync(() => {
      expect(validate(`{"a":1} extra`).valid).toBe(false)
      expect(validate("[1] // note").valid).toBe(false)
      expect(validate("/* note */ [1]").valid).toBe(false)
    }))

  it.effect("reports stack exhaustion as an unexpected error", () =>
    Effect.sync(() => {
      const depth = 200_000
      const result = validate("[".repeat(depth) + "]".repeat(depth))
      expect(result.valid).toBe(false)
      expect(result.error?.startsWith("Unexpected error: ")).toBe(true)
    }))
})

describe("serialize round trip", () => {
  it.effect("re-serialized documents validate and parse to an equal tree", () =>
    Effect.sync(() => {
      for (const document of documents) {
        const original = Either.getOrThrow(parseText(document))
        for (const indent of [0, 2, 4]) {
          const text = serialize(original, indent)
          expect(validate(text)).toEqual({ valid: true, error: undefined })
          expect(equalValues(Either.getOrThrow(parseText(text)), original)).toBe(true)
        }
      }
    }))
})
