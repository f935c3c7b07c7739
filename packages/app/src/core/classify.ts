import { Match } from "effect"
import * as BigDecimal from "effect/BigDecimal"
import * as DateTime from "effect/DateTime"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { JsonTypeError } from "./errors.js"
import { unsupportedType } from "./errors.js"
import { describeType, isPlainObject } from "./json.js"

// CHANGE: classify runtime values into a tagged node tree before layout
// WHY: layout must pattern-match exhaustively instead of inspecting runtime types per line
// QUOTE(TZ): "each value is an atom, a flat container or a nested container"
// REF: req-classifier-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: toNode(v) = Right(n) → ∀c ∈ children(n): c is a Node
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Scalar.literal is a valid JSON literal
// COMPLEXITY: O(n) where n = number of nodes

export type Node =
  | { readonly _tag: "Scalar"; readonly literal: string }
  | { readonly _tag: "Sequence"; readonly items: ReadonlyArray<Node> }
  | { readonly _tag: "Mapping"; readonly entries: ReadonlyArray<readonly [string, Node]> }

export type Shape = "Atomic" | "OnelinerCompound" | "ExpandableCompound"

const scalar = (literal: string): Node => ({ _tag: "Scalar", literal })

const quoted = (text: string): Node => scalar(JSON.stringify(text))

const encodeNumber = (value: number): string => Number.isFinite(value) ? JSON.stringify(value) : "null"

const encodeDate = (value: Date): Either.Either<Node, JsonTypeError> =>
  Number.isNaN(value.getTime()) ? Either.left(unsupportedType("Invalid Date")) : Either.right(quoted(value.toISOString()))

const encodeScalar = (value: unknown): Option.Option<Either.Either<Node, JsonTypeError>> => {
  if (value === null) {
    return Option.some(Either.right(scalar("null")))
  }
  if (typeof value === "boolean") {
    return Option.some(Either.right(scalar(value ? "true" : "false")))
  }
  if (typeof value === "number") {
    return Option.some(Either.right(scalar(encodeNumber(value))))
  }
  if (typeof value === "string") {
    return Option.some(Either.right(quoted(value)))
  }
  if (typeof value === "bigint") {
    return Option.some(Either.right(quoted(value.toString())))
  }
  if (value instanceof Date) {
    return Option.some(encodeDate(value))
  }
  if (BigDecimal.isBigDecimal(value)) {
    return Option.some(Either.right(quoted(BigDecimal.format(value))))
  }
  if (DateTime.isDateTime(value)) {
    return Option.some(Either.right(quoted(DateTime.formatIso(value))))
  }
  return Option.none()
}

const toItems = (values: Iterable<unknown>): Either.Either<Node, JsonTypeError> => {
  const items: Array<Node> = []
  for (const value of values) {
    const node = toNode(value)
    if (Either.isLeft(node)) {
      return Either.left(node.left)
    }
    items.push(node.right)
  }
  return Either.right({ _tag: "Sequence", items })
}

const toEntries = (pairs: Iterable<readonly [unknown, unknown]>): Either.Either<Node, JsonTypeError> => {
  const entries: Array<readonly [string, Node]> = []
  for (const [key, value] of pairs) {
    if (typeof key !== "string") {
      return Either.left(unsupportedType(`${describeType(key)} key`))
    }
    const node = toNode(value)
    if (Either.isLeft(node)) {
      return Either.left(node.left)
    }
    entries.push([key, node.right])
  }
  return Either.right({ _tag: "Mapping", entries })
}

/**
 * Convert a runtime value into a Node tree.
 *
 * Arrays and sets become sequences, plain objects and maps become mappings.
 * Dates, DateTimes, BigDecimals and bigints become quoted string scalars.
 *
 * @param value - Any value supplied by the caller.
 * @returns Node tree, or the JsonTypeError of the first unsupported value found.
 *
 * @pure true
 * @invariant the input is never mutated
 * @complexity O(n)
 */
export const toNode = (value: unknown): Either.Either<Node, JsonTypeError> => {
  const encoded = encodeScalar(value)
  if (Option.isSome(encoded)) {
    return encoded.value
  }
  if (Array.isArray(value) || value instanceof Set) {
    return toItems(value)
  }
  if (value instanceof Map) {
    return toEntries(value)
  }
  if (isPlainObject(value)) {
    return toEntries(Object.entries(value))
  }
  return Either.left(unsupportedType(describeType(value)))
}

const isAtomic = (node: Node): boolean => node._tag === "Scalar"

/**
 * Classify a node by its immediate children.
 *
 * @pure true
 * @invariant classify(n) = "Atomic" ⇔ n._tag = "Scalar"
 * @complexity O(k) where k = number of immediate children
 */
export const classify = (node: Node): Shape =>
  Match.value(node).pipe(
    Match.when({ _tag: "Scalar" }, (): Shape => "Atomic"),
    Match.when({ _tag: "Sequence" }, (value): Shape =>
      value.items.every(isAtomic) ? "OnelinerCompound" : "ExpandableCompound"),
    Match.when({ _tag: "Mapping" }, (value): Shape =>
      value.entries.every(([, child]) => isAtomic(child)) ? "OnelinerCompound" : "ExpandableCompound"),
    Match.exhaustive
  )

export const classifyValue = (value: unknown): Either.Either<Shape, JsonTypeError> =>
  Either.map(toNode(value), classify)
