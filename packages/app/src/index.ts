export { type Accessor, makeAccessor } from "./core/accessor.js"
export { classify, classifyValue, type Node, type Shape, toNode } from "./core/classify.js"
export type { AttributeError, JsonTypeError, PathError } from "./core/errors.js"
export { onlyFieldsLike } from "./core/fields.js"
export type {
  Json,
  NestedContainer,
  NestedMapping,
  NestedRecord,
  NestedSequence,
  NestedValue,
  Scalar,
  TextScalar
} from "./core/json.js"
export { defaultIndent, layout, type LayoutOptions, render, renderInline } from "./core/layout.js"
export { resolvePath, splitPath, stringIndexingPolicy, strictPolicy, walkPath, type WalkPolicy } from "./core/path.js"
