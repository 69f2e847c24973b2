import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { equalValues, toPlain } from "../../src/core/json.js"
import { parseText } from "../../src/core/parser.js"

const tree = (text: string) => Either.getOrThrow(parseText(text))

describe("toPlain", () => {
  it.effect("defines __proto__ as an own key", () =>
    Effect.sync(() => {
      const plain = toPlain(tree(`{"__proto__": {"polluted": true}, "b": 1}`))
      expect(typeof plain === "object" && plain !== null ? Object.keys(plain) : []).toEqual(["__proto__", "b"])
      expect(Object.getPrototypeOf(plain)).toBe(Object.prototype)
    }))
})

describe("equalValues", () => {
  it.effect("ignores key order but not array order", () =>
    Effect.sync(() => {
      expect(equalValues(tree(`{"a": 1, "b": [1, 2]}`), tree(`{"b": [1, 2], "a": 1}`))).toBe(true)
      expect(equalValues(tree("[1, 2]"), tree("[2, 1]"))).toBe(false)
    }))

  it.effect("distinguishes tags and missing keys", () =>
    Effect.sync(() => {
      expect(equalValues(tree("null"), tree("false"))).toBe(false)
      expect(equalValues(tree(`{"a": 1}`), tree(`{"b": 1}`))).toBe(false)
      expect(equalValues(tree(`"1"`), tree("1"))).toBe(false)
    }))
})
