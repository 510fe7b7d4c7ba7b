import { Match } from "effect"
import * as Option from "effect/Option"

import type { Json } from "./json.js"

// CHANGE: model decoded JSON as a closed tagged union
// WHY: every consumer switches exhaustively on _tag instead of probing typeof
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Null, Boolean, Number, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object keys are unique; each node has exactly one owner
// COMPLEXITY: O(1)/O(1)

export interface NullValue {
  readonly _tag: "Null"
}

export interface BooleanValue {
  readonly _tag: "Boolean"
  readonly value: boolean
}

export interface NumberValue {
  readonly _tag: "Number"
  readonly value: number
}

export interface StringValue {
  readonly _tag: "String"
  readonly value: string
}

export interface ArrayValue {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<Value>
}

export interface ObjectValue {
  readonly _tag: "Object"
  readonly entries: ReadonlyMap<string, Value>
}

export type Value =
  | NullValue
  | BooleanValue
  | NumberValue
  | StringValue
  | ArrayValue
  | ObjectValue

export type ValueTag = Value["_tag"]

export const nullValue: NullValue = { _tag: "Null" }

export const booleanValue = (value: boolean): BooleanValue => ({ _tag: "Boolean", value })

export const numberValue = (value: number): NumberValue => ({ _tag: "Number", value })

export const stringValue = (value: string): StringValue => ({ _tag: "String", value })

export const arrayValue = (items: ReadonlyArray<Value>): ArrayValue => ({ _tag: "Array", items })

export const objectValue = (entries: ReadonlyMap<string, Value>): ObjectValue => ({
  _tag: "Object",
  entries
})

export const isNullValue = (value: Value): value is NullValue => value._tag === "Null"

export const isBooleanValue = (value: Value): value is BooleanValue => value._tag === "Boolean"

export const isNumberValue = (value: Value): value is NumberValue => value._tag === "Number"

export const isStringValue = (value: Value): value is StringValue => value._tag === "String"

export const isArrayValue = (value: Value): value is ArrayValue => value._tag === "Array"

export const isObjectValue = (value: Value): value is ObjectValue => value._tag === "Object"

/**
 * Look up a member of an object value.
 *
 * @pure true
 * @complexity O(1)
 */
export const getField = (object: ObjectValue, key: string): Option.Option<Value> =>
  Option.fromNullable(object.entries.get(key))

/**
 * Look up an element of an array value; negative or out-of-range indexes yield None.
 *
 * @pure true
 * @complexity O(1)
 */
export const getIndex = (array: ArrayValue, index: number): Option.Option<Value> =>
  Option.fromNullable(array.items[index])

/**
 * Project a value tree onto plain JavaScript data.
 *
 * @param value - Parsed value.
 * @returns Json with arrays for Array values and own-property records for Object values.
 *
 * @pure true
 * @invariant toJson preserves keys, element order and scalar values
 * @complexity O(n) where n = number of nodes
 */
export const toJson = (value: Value): Json =>
  Match.value(value).pipe(
    Match.when({ _tag: "Null" }, (): Json => null),
    Match.when({ _tag: "Boolean" }, (node): Json => node.value),
    Match.when({ _tag: "Number" }, (node): Json => node.value),
    Match.when({ _tag: "String" }, (node): Json => node.value),
    Match.when({ _tag: "Array" }, (node): Json => node.items.map((item) => toJson(item))),
    Match.when(
      { _tag: "Object" },
      (node): Json => Object.fromEntries([...node.entries].map(([key, item]) => [key, toJson(item)]))
    ),
    Match.exhaustive
  )
