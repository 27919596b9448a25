// CHANGE: introduce a JSON domain type for the decoded analysis document
// WHY: narrow the raw JSON.parse result without rebuilding its objects
// QUOTE(TZ): "a parsed document equivalent to the following JSON shape"
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isFiniteJson(x) → isFiniteJson(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type UnknownObject = { readonly [key: string]: unknown }

export const isJsonObject = (value: unknown): value is UnknownObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isJsonArray = (value: unknown): value is ReadonlyArray<unknown> => Array.isArray(value)

// own keys only: "__proto__" from JSON.parse is an ordinary own property
export const hasKey = (value: UnknownObject, key: string): boolean => Object.hasOwn(value, key)

export const ownValue = (value: UnknownObject, key: string): unknown => hasKey(value, key) ? value[key] : undefined
