import { Match } from "effect"
import * as Either from "effect/Either"

import type { Node } from "./classify.js"
import { classify, toNode } from "./classify.js"
import type { JsonTypeError } from "./errors.js"

// CHANGE: render nested values as JSON denser than a fixed-indent printer
// WHY: containers of atomic values read better on one line while staying valid JSON
// QUOTE(TZ): "flat containers stay on one line, nested ones expand"
// REF: req-layout-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: classify(n) ≠ "ExpandableCompound" → "\n" ∉ layout(n)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every nesting level adds exactly one indent unit
// COMPLEXITY: O(n * d) where n = nodes, d = depth

export interface LayoutOptions {
  readonly indent?: number
}

export const defaultIndent = 4

/** Widest indent unit the CLI and config file accept. */
export const maxIndent = 16

const encodeKey = (key: string): string => JSON.stringify(key)

/**
 * Render a node on a single line with ", " and ": " separators.
 *
 * @pure true
 * @invariant output contains no line breaks
 * @complexity O(n)
 */
export const renderInline = (node: Node): string =>
  Match.value(node).pipe(
    Match.when({ _tag: "Scalar" }, (value) => value.literal),
    Match.when({ _tag: "Sequence" }, (value) => `[${value.items.map(renderInline).join(", ")}]`),
    Match.when(
      { _tag: "Mapping" },
      (value) => `{${value.entries.map(([key, child]) => `${encodeKey(key)}: ${renderInline(child)}`).join(", ")}}`
    ),
    Match.exhaustive
  )

const layoutExpanded = (node: Node, prefix: string, lead: string, unit: string): string => {
  const next = prefix + unit
  return Match.value(node).pipe(
    Match.when({ _tag: "Scalar" }, (value) => lead + value.literal),
    Match.when({ _tag: "Sequence" }, (value) =>
      [
        `${lead}[`,
        value.items.map((child) => layout(child, next, false, unit)).join(",\n"),
        `${prefix}]`
      ].join("\n")),
    Match.when({ _tag: "Mapping" }, (value) =>
      [
        `${lead}{`,
        value.entries.map(([key, child]) => `${next}${encodeKey(key)}: ${layout(child, next, true, unit)}`).join(",\n"),
        `${prefix}}`
      ].join("\n")),
    Match.exhaustive
  )
}

/**
 * Lay out a node, deciding per node between one line and one child per line.
 *
 * @param node - Node to render.
 * @param prefix - Indentation of the line the node's closing bracket sits on.
 * @param isInlineElement - True when the node follows a `"key": ` or is the top-level value,
 *   so the opening bracket carries no prefix.
 * @param unit - Text added to the prefix per nesting level.
 *
 * @pure true
 * @invariant children of an expanded node are laid out at prefix + unit
 * @complexity O(n * d)
 */
export const layout = (node: Node, prefix: string, isInlineElement: boolean, unit: string): string => {
  const lead = isInlineElement ? "" : prefix
  if (classify(node) !== "ExpandableCompound") {
    return lead + renderInline(node)
  }
  return layoutExpanded(node, prefix, lead, unit)
}

/**
 * Render a value as dense JSON text.
 *
 * @param value - Nested value built from scalars, sequences and mappings.
 * @param options - Indent width, 4 spaces by default.
 * @returns Rendered text, or the JsonTypeError of an unsupported value; no partial output.
 *
 * @pure true
 * @invariant JSON.parse(render(v)) deep-equals v for plain JSON values
 * @complexity O(n * d)
 */
export const render = (value: unknown, options: LayoutOptions = {}): Either.Either<string, JsonTypeError> =>
  Either.map(toNode(value), (node) => layout(node, "", true, " ".repeat(options.indent ?? defaultIndent)))
