import * as BigDecimal from "effect/BigDecimal"
import * as DateTime from "effect/DateTime"

// CHANGE: introduce the nested value domain shared by rendering and path lookup
// WHY: both flows read the same mapping/sequence trees and must agree on their shapes
// QUOTE(TZ): "render and lookup read the same nested value trees"
// REF: req-nested-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ NestedValue: x ∈ Scalar ∨ x ∈ NestedSequence ∨ x ∈ NestedMapping
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: NestedValue is closed under sequence/mapping nesting with scalar leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type JsonScalar = null | boolean | number | string

/** Scalars that have no JSON literal and are written as their canonical string. */
export type TextScalar = Date | DateTime.DateTime | BigDecimal.BigDecimal | bigint

export type Scalar = JsonScalar | TextScalar

export type NestedRecord = { readonly [key: string]: NestedValue }

export type NestedSequence = ReadonlyArray<NestedValue> | ReadonlySet<NestedValue>

export type NestedMapping = NestedRecord | ReadonlyMap<string, NestedValue>

export type NestedValue = Scalar | NestedSequence | NestedMapping

/** Containers an accessor can be rooted at. */
export type NestedContainer = ReadonlyArray<NestedValue> | NestedMapping

export const isPlainObject = (value: unknown): value is Readonly<Record<string, unknown>> => {
  if (typeof value !== "object" || value === null) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Check that a value is JSON without rebuilding it, so own "__proto__" keys stay fields.
 *
 * @pure true
 * @complexity O(n)
 */
export const isJson = (value: unknown): value is Json => {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return true
  }
  if (typeof value === "number") {
    return Number.isFinite(value)
  }
  if (Array.isArray(value)) {
    return value.every(isJson)
  }
  return isPlainObject(value) && Object.values(value).every(isJson)
}

export const isSequence = (value: NestedValue): value is ReadonlyArray<NestedValue> => Array.isArray(value)

export const isNestedRecord = (value: NestedValue): value is NestedRecord => isPlainObject(value)

export const isNestedMap = (value: NestedValue): value is ReadonlyMap<string, NestedValue> => value instanceof Map

export const isContainer = (value: NestedValue): value is NestedContainer =>
  isSequence(value) || isNestedRecord(value) || isNestedMap(value)

const constructorName = (value: object): string => {
  const ctor: unknown = value.constructor
  return typeof ctor === "function" && ctor.name.length > 0 ? ctor.name : "object"
}

/**
 * Name the runtime type of a value for error messages.
 *
 * Numbers are split into "integer" and "float"; arrays are "list" and plain
 * objects "dict", matching the wording of accessor errors.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeType = (value: unknown): string => {
  if (value === null) {
    return "null"
  }
  if (Array.isArray(value)) {
    return "list"
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float"
  }
  if (typeof value !== "object") {
    return typeof value
  }
  if (isPlainObject(value)) {
    return "dict"
  }
  if (BigDecimal.isBigDecimal(value)) {
    return "BigDecimal"
  }
  if (DateTime.isDateTime(value)) {
    return "DateTime"
  }
  return constructorName(value)
}
