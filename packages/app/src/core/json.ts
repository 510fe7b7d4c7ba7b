// CHANGE: plain JavaScript projection of a parsed value tree
// WHY: callers that only need data (not tags) get ordinary arrays and records
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

export type JsonRecord = { readonly [key: string]: Json }
