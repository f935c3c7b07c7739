import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as BigDecimal from "effect/BigDecimal"
import * as Either from "effect/Either"

import { classify, classifyValue, toNode } from "../../src/core/classify.js"

describe("classifyValue", () => {
  it.effect("treats scalars and text scalars as atomic", () =>
    Effect.sync(() => {
      for (const value of [null, true, 0, 2.5, "s", 7n, new Date(0), BigDecimal.unsafeFromString("1.10")]) {
        expect(classifyValue(value)).toEqual(Either.right("Atomic"))
      }
    }))

  it.effect("separates one-liner and expandable compounds", () =>
    Effect.sync(() => {
      expect(classifyValue([1, "a", null])).toEqual(Either.right("OnelinerCompound"))
      expect(classifyValue({ a: 1, b: "x" })).toEqual(Either.right("OnelinerCompound"))
      expect(classifyValue([])).toEqual(Either.right("OnelinerCompound"))
      expect(classifyValue([1, []])).toEqual(Either.right("ExpandableCompound"))
      expect(classifyValue({ a: 1, b: { c: 2 } })).toEqual(Either.right("ExpandableCompound"))
    }))

  it.effect("is stable across repeated calls", () =>
    Effect.sync(() => {
      const node = toNode({ a: [1, 2], b: 3 })
      expect(Either.isRight(node)).toBe(true)
      if (Either.isRight(node)) {
        expect(classify(node.right)).toBe("ExpandableCompound")
        expect(classify(node.right)).toBe(classify(node.right))
      }
    }))

  it.effect("reports the offending type name", () =>
    Effect.sync(() => {
      const result = classifyValue({ a: Symbol("s") })
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.typeName).toBe("symbol")
      }
    }))
})

describe("toNode", () => {
  it.effect("keeps mapping key order and encodes scalar literals", () =>
    Effect.sync(() => {
      expect(toNode({ z: 1, a: "b" })).toEqual(
        Either.right({
          _tag: "Mapping",
          entries: [["z", { _tag: "Scalar", literal: "1" }], ["a", { _tag: "Scalar", literal: "\"b\"" }]]
        })
      )
    }))

  it.effect("does not mutate the input", () =>
    Effect.sync(() => {
      const value = { a: [1, { b: 2 }] }
      toNode(value)
      expect(value).toEqual({ a: [1, { b: 2 }] })
    }))
})
