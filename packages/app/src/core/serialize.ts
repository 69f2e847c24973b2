import type { JsonNumber, Value } from "./json.js"

// CHANGE: re-serialize a parsed tree for --pretty output
// WHY: a conventional writer over the tagged tree; no source formatting is preserved
// QUOTE(RFC 8259): "Insignificant whitespace is allowed before or after any of the six structural characters."
// REF: RFC 8259 §2
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(serialize(v)) = Right(v') ∧ v' ≡ v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object keys are written in insertion order
// COMPLEXITY: O(n) where n = output length

// An integral float past the safe range is written with an exponent so it re-parses as a float, not a bigint.
const formatNumber = (value: JsonNumber): string => {
  if (typeof value === "bigint") {
    return value.toString()
  }
  return Number.isInteger(value) && !Number.isSafeInteger(value) ? value.toExponential() : String(value)
}

// JSON.stringify on a string only escapes; it also writes lone surrogates as \uXXXX.
const formatString = (value: string): string => JSON.stringify(value)

const writeValue = (value: Value, indent: string, depth: number): string => {
  switch (value._tag) {
    case "Null":
      return "null"
    case "Bool":
      return value.value ? "true" : "false"
    case "Number":
      return formatNumber(value.value)
    case "String":
      return formatString(value.value)
    case "Array": {
      if (value.items.length === 0) {
        return "[]"
      }
      const items = value.items.map((item) => writeValue(item, indent, depth + 1))
      return wrap("[", "]", items, indent, depth)
    }
    case "Object": {
      if (value.entries.size === 0) {
        return "{}"
      }
      const separator = indent.length === 0 ? ":" : ": "
      const members = [...value.entries].map(([key, entry]) =>
        `${formatString(key)}${separator}${writeValue(entry, indent, depth + 1)}`
      )
      return wrap("{", "}", members, indent, depth)
    }
  }
}

const wrap = (
  open: string,
  close: string,
  parts: ReadonlyArray<string>,
  indent: string,
  depth: number
): string => {
  if (indent.length === 0) {
    return `${open}${parts.join(",")}${close}`
  }
  const inner = indent.repeat(depth + 1)
  const outer = indent.repeat(depth)
  return `${open}\n${parts.map((part) => inner + part).join(",\n")}\n${outer}${close}`
}

/**
 * Serialize a value tree as JSON text.
 *
 * @param value - Parsed value.
 * @param indent - Spaces per nesting level; 0 writes compact output.
 * @returns JSON text without a trailing newline.
 *
 * @pure true
 * @invariant empty containers are written as [] and {}
 * @complexity O(n)
 */
export const serialize = (value: Value, indent = 2): string =>
  writeValue(value, " ".repeat(Math.max(0, Math.trunc(indent))), 0)
