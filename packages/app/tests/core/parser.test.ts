import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ParseError } from "../../src/core/errors.js"
import { renderParseError } from "../../src/core/errors.js"
import {
  isDigit,
  parseArray,
  parseBoolean,
  parseNull,
  parseNumber,
  parseText,
  parseValue
} from "../../src/core/parser.js"
import { makeTextProducer } from "../../src/core/producer.js"
import type { Value } from "../../src/core/value.js"
import { getField, toJson } from "../../src/core/value.js"

const parseJson = (text: string) => toJson(Either.getOrThrow(parseText(text)))

const failureOf = <A>(result: Either.Either<A, ParseError>): ParseError => Either.getOrThrow(Either.flip(result))

const numberOf = (text: string): number => Either.getOrThrow(parseNumber(makeTextProducer(text)))

const memberOf = (text: string, key: string): Option.Option<Value> =>
  getField(Either.getOrThrow(parseText(text)), key)

describe("parseText documents", () => {
  it.effect("builds a tree mirroring the document", () =>
    Effect.sync(() => {
      const json = parseJson(
        `{"name": "reader", "tags": ["a", "b"], "nested": {"ok": true, "none": null}, "n": 3.25}`
      )
      expect(json).toEqual({
        name: "reader",
        tags: ["a", "b"],
        nested: { ok: true, none: null },
        n: 3.25
      })
    }))

  it.effect("skips whitespace between tokens", () =>
    Effect.sync(() => {
      expect(parseJson("\n  { \"a\" : [ 1 , 2 ] , \"b\" : { } }  \n")).toEqual({ a: [1, 2], b: {} })
    }))

  it.effect("keeps the last value of a duplicated key", () =>
    Effect.sync(() => {
      const root = Either.getOrThrow(parseText(`{"a":1,"a":2}`))
      expect(root.entries.size).toBe(1)
      expect(Option.getOrThrow(getField(root, "a"))).toEqual({ _tag: "Number", value: 2 })
    }))

  it.effect("parses empty containers", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseText("{}")).entries.size).toBe(0)
      expect(parseJson(`{"list":[]}`)).toEqual({ list: [] })
    }))

  it.effect("parses keywords", () =>
    Effect.sync(() => {
      expect(parseJson(`{"t":true,"f":false,"n":null}`)).toEqual({ t: true, f: false, n: null })
    }))

  it.effect("ignores content after the root object", () =>
    Effect.sync(() => {
      expect(parseJson(`{"a":1} trailing`)).toEqual({ a: 1 })
    }))

  it.effect("is deterministic for the same input", () =>
    Effect.sync(() => {
      const text = `{"a":[1,{"b":"c"}],"d":-2}`
      expect(parseJson(text)).toEqual(parseJson(text))
    }))
})

describe("string tokens", () => {
  it.effect("appends the character after a backslash verbatim", () =>
    Effect.sync(() => {
      expect(parseJson(`{"s":"\\n"}`)).toEqual({ s: "n" })
      expect(parseJson(`{"s":"a\\"b"}`)).toEqual({ s: "a\"b" })
      expect(parseJson(`{"s":"x\\\\y"}`)).toEqual({ s: "x\\y" })
      expect(parseJson(`{"s":"\\u0041"}`)).toEqual({ s: "u0041" })
    }))

  it.effect("keeps whitespace inside strings and keys", () =>
    Effect.sync(() => {
      expect(parseJson(`{" k ":"  a  b "}`)).toEqual({ " k ": "  a  b " })
    }))

  it.effect("keeps non-ASCII characters", () =>
    Effect.sync(() => {
      expect(parseJson(`{"emoji":"😀","word":"héllo"}`)).toEqual({ emoji: "😀", word: "héllo" })
    }))

  it.effect("fails on an unterminated string", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"s":"abc`))).toEqual({
        _tag: "ParseError",
        kind: "UnexpectedCharacter",
        line: 1,
        column: 10,
        message: `unexpected character: expected '"' (code=34), got end of input`
      })
    }))
})

describe("number tokens", () => {
  it.effect("applies sign, fraction and exponent", () =>
    Effect.sync(() => {
      expect(numberOf("-0.5e2")).toBe(-50)
      expect(numberOf("0")).toBe(0)
      expect(numberOf("1.5")).toBe(1.5)
      expect(numberOf("1E+2")).toBe(100)
      expect(numberOf("2e-1")).toBe(0.2)
      expect(numberOf("120")).toBe(120)
    }))

  it.effect("keeps the sign of negative zero", () =>
    Effect.sync(() => {
      expect(Object.is(numberOf("-0"), -0)).toBe(true)
    }))

  it.effect("reads an exponent without digits as zero", () =>
    Effect.sync(() => {
      expect(parseJson(`{"n":3e}`)).toEqual({ n: 3 })
      expect(parseJson(`{"n":4E+}`)).toEqual({ n: 4 })
    }))

  it.effect("does not continue a number across whitespace", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"n":1 2}`))).toEqual({
        _tag: "ParseError",
        kind: "UnexpectedCharacter",
        line: 1,
        column: 8,
        message: "unexpected character: expected '}' (code=125), got '2' (code=50)"
      })
    }))

  it.effect("leaves a digit after a leading zero unread", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"a":01}`))).toEqual({
        _tag: "ParseError",
        kind: "UnexpectedCharacter",
        line: 1,
        column: 7,
        message: "unexpected character: expected '}' (code=125), got '1' (code=49)"
      })
    }))

  it.effect("requires digits after a minus sign", () =>
    Effect.sync(() => {
      expect(failureOf(parseNumber(makeTextProducer("-x")))).toEqual({
        _tag: "ParseError",
        kind: "MalformedNumber",
        line: 1,
        column: 2,
        message: `expected number until_eof="x"`
      })
    }))

  it.effect("requires digits after the decimal point", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"n":1.}`))).toEqual({
        _tag: "ParseError",
        kind: "MalformedNumber",
        line: 1,
        column: 8,
        message: `expected number until_eof="}"`
      })
    }))
})

describe("keywords", () => {
  it.effect("matches keywords character by character", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"t":trux}`))).toEqual({
        _tag: "ParseError",
        kind: "UnexpectedCharacter",
        line: 1,
        column: 9,
        message: "unexpected character: expected 'e' (code=101), got 'x' (code=120)"
      })
    }))

  it.effect("does not skip whitespace inside a keyword", () =>
    Effect.sync(() => {
      const error = failureOf(parseText(`{"t":tru e}`))
      expect(error.message).toBe("unexpected character: expected 'e' (code=101), got ' ' (code=32)")
      expect(error.column).toBe(9)
    }))

  it.effect("rejects a wrong lookahead for boolean and null", () =>
    Effect.sync(() => {
      expect(failureOf(parseBoolean(makeTextProducer("x")))).toEqual({
        _tag: "ParseError",
        kind: "ExpectedValue",
        line: 1,
        column: 1,
        message: `expected boolean until_eof="x"`
      })
      expect(failureOf(parseNull(makeTextProducer("nul"))).message).toBe(
        "unexpected character: expected 'l' (code=108), got end of input"
      )
      expect(Either.getOrThrow(parseBoolean(makeTextProducer("false")))).toBe(false)
      expect(Either.getOrThrow(parseNull(makeTextProducer("null")))).toBeNull()
    }))
})

describe("structural errors", () => {
  it.effect("rejects a trailing comma in an array", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"a":[1,2,]}`))).toEqual({
        _tag: "ParseError",
        kind: "ExpectedValue",
        line: 1,
        column: 11,
        message: `expected value until_eof="]}"`
      })
      expect(failureOf(parseArray(makeTextProducer("[1,2,]")))).toEqual({
        _tag: "ParseError",
        kind: "ExpectedValue",
        line: 1,
        column: 6,
        message: `expected value until_eof="]"`
      })
    }))

  it.effect("rejects a trailing comma in an object", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"a":1,}`))).toEqual({
        _tag: "ParseError",
        kind: "ExpectedKey",
        line: 1,
        column: 8,
        message: `expected key until_eof="}"`
      })
    }))

  it.effect("requires string keys", () =>
    Effect.sync(() => {
      expect(failureOf(parseText("{1:2}"))).toEqual({
        _tag: "ParseError",
        kind: "ExpectedKey",
        line: 1,
        column: 2,
        message: `expected key until_eof="1:2}"`
      })
    }))

  it.effect("requires a colon after a key", () =>
    Effect.sync(() => {
      expect(renderParseError(failureOf(parseText(`{"a" 1}`)))).toBe(
        "1:6: unexpected character: expected ':' (code=58), got '1' (code=49)"
      )
    }))

  it.effect("rejects unknown value starts", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"a":@}`))).toEqual({
        _tag: "ParseError",
        kind: "ExpectedValue",
        line: 1,
        column: 6,
        message: `expected value until_eof="@}"`
      })
    }))

  it.effect("reports positions on later lines", () =>
    Effect.sync(() => {
      const error = failureOf(parseText("{\n  \"a\": 1,\n  \"b\": ?\n}"))
      expect(renderParseError(error)).toBe(`3:8: expected value until_eof="?}"`)
    }))
})

describe("document root", () => {
  it.effect("rejects a non-object root", () =>
    Effect.sync(() => {
      expect(renderParseError(failureOf(parseText("42")))).toBe(
        "1:1: unexpected character: expected '{' (code=123), got '4' (code=52)"
      )
      expect(failureOf(parseText("\n\n  [1]"))).toEqual({
        _tag: "ParseError",
        kind: "UnexpectedCharacter",
        line: 3,
        column: 3,
        message: "unexpected character: expected '{' (code=123), got '[' (code=91)"
      })
    }))

  it.effect("rejects empty input", () =>
    Effect.sync(() => {
      expect(renderParseError(failureOf(parseText("")))).toBe(
        "1:1: unexpected character: expected '{' (code=123), got end of input"
      )
    }))
})

describe("nesting limit", () => {
  it.effect("fails once containers nest deeper than maxDepth", () =>
    Effect.sync(() => {
      expect(failureOf(parseText(`{"a":{"b":{}}}`, { maxDepth: 2 }))).toEqual({
        _tag: "ParseError",
        kind: "DepthExceeded",
        line: 1,
        column: 11,
        message: "maximum nesting depth exceeded (2)"
      })
      expect(failureOf(parseText(`{"a":[[1]]}`, { maxDepth: 2 })).column).toBe(7)
      expect(parseJson(`{"a":{"b":{}}}`)).toEqual({ a: { b: {} } })
      expect(Either.isRight(parseText(`{"a":{"b":{}}}`, { maxDepth: 3 }))).toBe(true)
    }))

  it.effect("stops deep arrays at the default limit", () =>
    Effect.sync(() => {
      const text = `{"a":${"[".repeat(600)}${"]".repeat(600)}}`
      expect(failureOf(parseText(text))).toEqual({
        _tag: "ParseError",
        kind: "DepthExceeded",
        line: 1,
        column: 517,
        message: "maximum nesting depth exceeded (512)"
      })
    }))

  it.effect("clamps a requested depth above the ceiling", () =>
    Effect.sync(() => {
      const text = `{"a":${"[".repeat(50000)}${"]".repeat(50000)}}`
      expect(failureOf(parseText(text, { maxDepth: 1_000_000 }))).toEqual({
        _tag: "ParseError",
        kind: "DepthExceeded",
        line: 1,
        column: 2053,
        message: "maximum nesting depth exceeded (2048)"
      })
    }))

  it.effect("leaves whitespace skipping on after a standalone token", () =>
    Effect.sync(() => {
      const producer = makeTextProducer("1  x")
      expect(Either.getOrThrow(parseNumber(producer))).toBe(1)
      expect(producer.peek()).toBe("x")
      expect(producer.column()).toBe(4)
    }))
})

describe("parseValue", () => {
  it.effect("dispatches on the lookahead character", () =>
    Effect.sync(() => {
      const read = (text: string) => toJson(Either.getOrThrow(parseValue(makeTextProducer(text))))
      expect(read(`"x"`)).toBe("x")
      expect(read("[true,null]")).toEqual([true, null])
      expect(read(`{"k":-1}`)).toEqual({ k: -1 })
      expect(read("7")).toBe(7)
      expect(failureOf(parseValue(makeTextProducer("?"))).kind).toBe("ExpectedValue")
    }))

  it.effect("exposes members through getField", () =>
    Effect.sync(() => {
      expect(Option.getOrThrow(memberOf(`{"a":"b"}`, "a"))).toEqual({ _tag: "String", value: "b" })
      expect(Option.isNone(memberOf(`{"a":"b"}`, "z"))).toBe(true)
    }))
})

describe("isDigit", () => {
  it.effect("accepts ASCII decimal digits only", () =>
    Effect.sync(() => {
      expect(["0", "5", "9"].map(isDigit)).toEqual([true, true, true])
      expect(["a", "", "12", "٣", undefined].map(isDigit)).toEqual([false, false, false, false, false])
    }))
})
