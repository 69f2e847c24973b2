import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { jsonArray, jsonNumber, jsonObject, jsonString } from "../../src/core/json.js"
import { parseText } from "../../src/core/parser.js"
import { serialize } from "../../src/core/serialize.js"

const reformat = (text: string, indent?: number): string => serialize(Either.getOrThrow(parseText(text)), indent)

describe("serialize", () => {
  it.effect("indents nested containers by two spaces by default", () =>
    Effect.sync(() => {
      expect(reformat(`{"a":[1,2,{}],"b":[],"c":"x\\ny"}`)).toBe(
        "{\n  \"a\": [\n    1,\n    2,\n    {}\n  ],\n  \"b\": [],\n  \"c\": \"x\\ny\"\n}"
      )
    }))

  it.effect("writes compact output with indent 0", () =>
    Effect.sync(() => {
      expect(reformat(`{ "a" : [ 1 , 2 , { } ] , "b" : [ ] }`, 0)).toBe(`{"a":[1,2,{}],"b":[]}`)
    }))

  it.effect("agrees with the platform serializer on plain documents", () =>
    Effect.sync(() => {
      const text = `{"id": 7, "name": "café", "flags": [true, false, null], "ratio": 0.125, "nested": {"list": [[], {}]}}`
      expect(reformat(text, 4)).toBe(JSON.stringify(JSON.parse(text), null, 4))
    }))

  it.effect("keeps key order and integer precision", () =>
    Effect.sync(() => {
      expect(reformat(`{"z": 12345678901234567890, "a": -0.25, "m": 1e21, "k": 1.0}`, 0)).toBe(
        `{"z":12345678901234567890,"a":-0.25,"m":1e+21,"k":1}`
      )
    }))

  it.effect("writes integral floats beyond the safe range with an exponent", () =>
    Effect.sync(() => {
      expect(reformat("[1e20, 100000000000000000000.0, -2.5e17, 9007199254740991.0]", 0)).toBe(
        "[1e+20,1e+20,-2.5e+17,9007199254740991]"
      )
    }))

  it.effect("escapes lone surrogates and control characters", () =>
    Effect.sync(() => {
      expect(reformat(`"\\ud800"`)).toBe(`"\\ud800"`)
      expect(reformat(`"tab\\there\\u0001"`)).toBe(`"tab\\there\\u0001"`)
    }))

  it.effect("serializes values built without parsing", () =>
    Effect.sync(() => {
      const value = jsonObject(new Map([["list", jsonArray([jsonNumber(1n), jsonString("two")])]]))
      expect(serialize(value, 1)).toBe("{\n \"list\": [\n  1,\n  \"two\"\n ]\n}")
    }))
})
