import * as Either from "effect/Either"

import type { AttributeError, JsonTypeError, PathError } from "./errors.js"
import { attributeError, unexpectedType } from "./errors.js"
import type { NestedContainer, NestedValue } from "./json.js"
import { describeType, isContainer, isNestedMap, isNestedRecord } from "./json.js"
import { stringIndexingPolicy, walkPath } from "./path.js"

// CHANGE: expose one-level field reads and path reads over one retained root
// WHY: callers want record-style access for the first level and routes for deeper reads
// QUOTE(TZ): "wrap a document once, then read fields or paths from it"
// REF: req-accessor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,k: a.get(k) = Right(v) → v = root[k]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: root is a list, a dict or a Map; returned children are never wrapped
// COMPLEXITY: O(1) construction

export interface Accessor {
  readonly root: NestedContainer
  readonly get: (name: string) => Either.Either<NestedValue, AttributeError>
  readonly resolve: (path: string) => Either.Either<NestedValue, PathError>
}

const readField = (root: NestedContainer, name: string): Either.Either<NestedValue, AttributeError> => {
  if (isNestedMap(root)) {
    const value = root.get(name)
    return value === undefined ? Either.left(attributeError(name)) : Either.right(value)
  }
  if (isNestedRecord(root) && Object.hasOwn(root, name)) {
    const value = root[name]
    return value === undefined ? Either.left(attributeError(name)) : Either.right(value)
  }
  return Either.left(attributeError(name))
}

/**
 * Wrap a list or mapping for field and path reads.
 *
 * `resolve` differs from `resolvePath` in one respect: digit segments also
 * index into string cursors ("name/0" on "Alice" yields "A").
 *
 * @param root - List, plain object or Map.
 * @returns Accessor, or a JsonTypeError for scalar roots.
 *
 * @pure true
 * @invariant the root is retained as-is and never copied or mutated
 * @complexity O(1)
 */
export const makeAccessor = (root: NestedValue): Either.Either<Accessor, JsonTypeError> => {
  if (!isContainer(root)) {
    return Either.left(unexpectedType("Accessor", "list or dict", describeType(root)))
  }
  const container: NestedContainer = root
  return Either.right({
    root: container,
    get: (name) => readField(container, name),
    resolve: (path) => walkPath(container, path, stringIndexingPolicy)
  })
}
