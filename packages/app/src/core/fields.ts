import type { NestedRecord } from "./json.js"

// CHANGE: add a key filter over lists of records
// WHY: reduce API result lists to the fields a caller cares about before rendering
// QUOTE(TZ): n/a
// REF: req-fields-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d ∈ result: d ≠ {} ∧ ∀k ∈ keys(d): ∃t ∈ terms: t ⊆ k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: document and key order follow the input
// COMPLEXITY: O(n * k * t)

const matchesAny = (key: string, terms: ReadonlyArray<string>): boolean => terms.some((term) => key.includes(term))

/**
 * Keep only the fields whose key contains one of the terms, dropping documents left empty.
 *
 * @example onlyFieldsLike([{ a: 1, b: 2 }, { d: 3 }], ["b"]) // [{ b: 2 }]
 *
 * @pure true
 * @complexity O(n * k * t)
 */
export const onlyFieldsLike = (
  documents: ReadonlyArray<NestedRecord>,
  terms: ReadonlyArray<string>
): ReadonlyArray<NestedRecord> => {
  const result: Array<NestedRecord> = []
  for (const document of documents) {
    // fromEntries defines own keys, so "__proto__" survives as a field
    const fields: NestedRecord = Object.fromEntries(
      Object.entries(document).filter(([key]) => matchesAny(key, terms))
    )
    if (Object.keys(fields).length > 0) {
      result.push(fields)
    }
  }
  return result
}
