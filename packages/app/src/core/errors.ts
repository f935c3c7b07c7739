import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { NestedValue } from "./json.js"

// CHANGE: unify error algebra for rendering, path lookup and the CLI tool
// WHY: provide typed failures that callers can match exhaustively
// QUOTE(TZ): "path and type failures are typed values, never thrown"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type JsonTypeError = {
  readonly _tag: "JsonTypeError"
  readonly typeName: string
  readonly message: string
}
export type PathError = {
  readonly _tag: "PathError"
  readonly remainder: string
  readonly value: NestedValue
  readonly message: string
}
export type AttributeError = { readonly _tag: "AttributeError"; readonly name: string; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFileError = { readonly _tag: "ParseError"; readonly file: string; readonly error: string }

export type AppError =
  | CliError
  | JsonTypeError
  | PathError
  | AttributeError
  | ConfigError
  | FileError
  | ParseFileError

export const unsupportedType = (typeName: string): JsonTypeError => ({
  _tag: "JsonTypeError",
  typeName,
  message: `Unsupported type: ${typeName}`
})

export const unexpectedType = (context: string, expected: string, typeName: string): JsonTypeError => ({
  _tag: "JsonTypeError",
  typeName,
  message: `${context}: expected ${expected}, got '${typeName}'`
})

/**
 * @param remainder - Unresolved segments joined with "/".
 * @param value - Cursor the walk stopped at.
 * @param rendered - One-line text of `value` for the message.
 */
export const pathError = (remainder: string, value: NestedValue, rendered: string): PathError => ({
  _tag: "PathError",
  remainder,
  value,
  message: `Invalid path '${remainder}' for remaining object ${rendered}`
})

export const attributeError = (name: string): AttributeError => ({
  _tag: "AttributeError",
  name,
  message: `attribute not found: ${name}`
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFileError = (file: string, error: string): ParseFileError => ({
  _tag: "ParseError",
  file,
  error
})

/**
 * Render any AppError as a single diagnostic line.
 *
 * @pure true
 * @invariant output starts with the error tag
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "ParseError" }, (value) => `ParseError: ${value.file}: ${value.error}`),
    Match.orElse((value) => `${value._tag}: ${value.message}`)
  )
