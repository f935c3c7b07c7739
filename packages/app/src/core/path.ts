import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { toNode } from "./classify.js"
import type { PathError } from "./errors.js"
import { pathError } from "./errors.js"
import type { NestedValue } from "./json.js"
import { describeType, isNestedMap, isNestedRecord, isSequence } from "./json.js"
import { renderInline } from "./layout.js"

// CHANGE: resolve slash-delimited routes into nested values
// WHY: read API-shaped data with "data/0/name" instead of chained indexing
// QUOTE(TZ): "get data/0/name reads index 0 of data, then key name"
// REF: req-path-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r,p: walk(r,p) = Left(e) → e.remainder = segments(p)[i..].join("/") ∧ e.value = cursor_i
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a digit segment indexes only arrays (and strings when the policy allows)
// COMPLEXITY: O(s) where s = number of segments

export interface WalkPolicy {
  /** Let digit segments index into string cursors by code point. */
  readonly indexStrings: boolean
}

export const strictPolicy: WalkPolicy = { indexStrings: false }

export const stringIndexingPolicy: WalkPolicy = { indexStrings: true }

const indexPattern = /^[0-9]+$/

export const splitPath = (path: string): ReadonlyArray<string> => path.split("/")

const itemAt = <A>(items: ReadonlyArray<A>, index: number): Option.Option<A> => {
  if (index >= items.length) {
    return Option.none()
  }
  const item = items[index]
  return item === undefined ? Option.none() : Option.some(item)
}

const lookupKey = (cursor: NestedValue, key: string): Option.Option<NestedValue> => {
  if (isNestedMap(cursor)) {
    const value = cursor.get(key)
    return value === undefined ? Option.none() : Option.some(value)
  }
  if (isNestedRecord(cursor) && Object.hasOwn(cursor, key)) {
    const value = cursor[key]
    return value === undefined ? Option.none() : Option.some(value)
  }
  return Option.none()
}

const stepInto = (cursor: NestedValue, segment: string, policy: WalkPolicy): Option.Option<NestedValue> => {
  if (indexPattern.test(segment)) {
    const index = Number(segment)
    if (isSequence(cursor)) {
      return itemAt(cursor, index)
    }
    if (policy.indexStrings && typeof cursor === "string") {
      return itemAt(Array.from(cursor), index)
    }
  }
  return lookupKey(cursor, segment)
}

const describeValue = (value: NestedValue): string =>
  Either.match(toNode(value), {
    onLeft: () => `<${describeType(value)}>`,
    onRight: renderInline
  })

const failAt = (segments: ReadonlyArray<string>, index: number, cursor: NestedValue): PathError =>
  pathError(segments.slice(index).join("/"), cursor, describeValue(cursor))

/**
 * Walk a nested value along a path under the given policy.
 *
 * @param root - Starting cursor.
 * @param path - Segments separated by "/"; the empty path never resolves.
 * @param policy - Whether digit segments may index strings.
 * @returns The value reached, or a PathError with the unresolved remainder and failing cursor.
 *
 * @pure true
 * @invariant the input is never mutated
 * @complexity O(s)
 */
export const walkPath = (
  root: NestedValue,
  path: string,
  policy: WalkPolicy
): Either.Either<NestedValue, PathError> => {
  const segments = splitPath(path)
  if (path.length === 0) {
    return Either.left(failAt(segments, 0, root))
  }
  let cursor = root
  for (const [index, segment] of segments.entries()) {
    const next = stepInto(cursor, segment, policy)
    if (Option.isNone(next)) {
      return Either.left(failAt(segments, index, cursor))
    }
    cursor = next.value
  }
  return Either.right(cursor)
}

/**
 * Resolve a path without indexing into strings.
 *
 * @example resolvePath({ data: [{ name: "Alice" }] }, "data/0/name") // Right("Alice")
 */
export const resolvePath = (root: NestedValue, path: string): Either.Either<NestedValue, PathError> =>
  walkPath(root, path, strictPolicy)
