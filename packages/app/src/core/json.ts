// CHANGE: model parsed JSON as a closed tagged union instead of loose JS values
// WHY: consumers match exhaustively on _tag; integer precision and key order survive parsing
// QUOTE(RFC 8259): "An object is an unordered collection of zero or more name/value pairs"
// REF: RFC 8259 §3
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: v is finite and acyclic
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Object entries have unique keys in insertion order
// COMPLEXITY: O(1)/O(1)

export type JsonNumber = number | bigint

export type Value =
  | { readonly _tag: "Null" }
  | { readonly _tag: "Bool"; readonly value: boolean }
  | { readonly _tag: "Number"; readonly value: JsonNumber }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
  | { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }

export type ValueTag = Value["_tag"]

export const jsonNull: Value = { _tag: "Null" }

export const jsonBool = (value: boolean): Value => ({ _tag: "Bool", value })

export const jsonNumber = (value: JsonNumber): Value => ({ _tag: "Number", value })

export const jsonString = (value: string): Value => ({ _tag: "String", value })

export const jsonArray = (items: ReadonlyArray<Value>): Value => ({ _tag: "Array", items })

export const jsonObject = (entries: ReadonlyMap<string, Value>): Value => ({ _tag: "Object", entries })

/**
 * Convert a value tree into plain JavaScript data.
 *
 * Objects become plain records; a `__proto__` key is defined as an own
 * property rather than replacing the prototype. Big integers stay `bigint`.
 *
 * @pure true
 * @invariant key order of every object is preserved
 * @complexity O(n) where n = number of nodes
 */
export const toPlain = (value: Value): unknown => {
  switch (value._tag) {
    case "Null":
      return null
    case "Bool":
    case "Number":
    case "String":
      return value.value
    case "Array":
      return value.items.map(toPlain)
    case "Object": {
      const result: Record<string, unknown> = {}
      for (const [key, entry] of value.entries) {
        Object.defineProperty(result, key, {
          value: toPlain(entry),
          enumerable: true,
          writable: true,
          configurable: true
        })
      }
      return result
    }
  }
}

/**
 * Structural equality of two value trees, object key order ignored.
 *
 * @pure true
 * @complexity O(n)
 */
export const equalValues = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Bool":
      return right._tag === "Bool" && left.value === right.value
    case "Number":
      return right._tag === "Number" && left.value === right.value
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Array":
      return right._tag === "Array" &&
        left.items.length === right.items.length &&
        left.items.every((item, index) => {
          const other = right.items[index]
          return other !== undefined && equalValues(item, other)
        })
    case "Object": {
      if (right._tag !== "Object" || left.entries.size !== right.entries.size) {
        return false
      }
      for (const [key, entry] of left.entries) {
        const other = right.entries.get(key)
        if (other === undefined || !equalValues(entry, other)) {
          return false
        }
      }
      return true
    }
  }
}
