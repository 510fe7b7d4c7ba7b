import * as Either from "effect/Either"

import type { ParseError, ParseErrorKind } from "./errors.js"
import { parseError } from "./errors.js"
import type { Producer } from "./producer.js"
import { makeTextProducer } from "./producer.js"
import type { ArrayValue, ObjectValue, Value } from "./value.js"
import { arrayValue, booleanValue, nullValue, numberValue, objectValue, stringValue } from "./value.js"

// CHANGE: recursive-descent JSON reader over a character producer
// WHY: one grammar rule per value kind, selected by a single lookahead character
// FORMAT THEOREM: ∀d ∈ JsonObjectDocuments: parse(d) = Right(tree) ∧ shape(tree) = shape(d)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a rule either returns a complete value or a Left; no partial trees escape
// COMPLEXITY: O(n) where n = input length
// ERRORS: diagnostic failures report where the mismatch was seen, then carry the rest of the input

export interface ParseOptions {
  /** Max container nesting, root object included (default 512, clamped to MAX_DEPTH_LIMIT). */
  readonly maxDepth?: number
}

export const DEFAULT_MAX_DEPTH = 512

// Ceiling for any requested maxDepth; each level is two stack frames.
export const MAX_DEPTH_LIMIT = 2048

interface ReaderContext {
  readonly producer: Producer
  readonly maxDepth: number
}

type Rule<A> = Either.Either<A, ParseError>

const makeContext = (producer: Producer, options: ParseOptions): ReaderContext => ({
  producer,
  maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT)
})

const done: Rule<void> = Either.right(undefined)

/**
 * ASCII decimal digit test; no locale involved.
 *
 * @pure true
 * @complexity O(1)
 */
export const isDigit = (char: string | undefined): boolean =>
  char !== undefined && char.length === 1 && char >= "0" && char <= "9"

const positionOf = (producer: Producer): { readonly line: number; readonly column: number } => ({
  line: producer.line(),
  column: producer.column()
})

const describeChar = (char: string | undefined): string =>
  char === undefined ? "end of input" : `'${char}' (code=${char.codePointAt(0) ?? 0})`

const has = (producer: Producer, char: string): boolean => producer.peek() === char

const mayHave = (producer: Producer, char: string): boolean => {
  if (producer.peek() === char) {
    producer.next()
    return true
  }
  return false
}

const take = (producer: Producer): string => producer.next() ?? ""

const drain = (producer: Producer): string => {
  let rest = ""
  while (!producer.atEnd()) {
    rest += take(producer)
  }
  return rest
}

const fail = <A>(producer: Producer, kind: ParseErrorKind, message: string): Rule<A> => {
  const at = positionOf(producer)
  const rest = drain(producer)
  return Either.left(parseError(kind, at, `${message} until_eof="${rest}"`))
}

const expects = (producer: Producer, char: string): Rule<void> => {
  const at = positionOf(producer)
  const got = producer.next()
  if (got !== char) {
    return Either.left(
      parseError(
        "UnexpectedCharacter",
        at,
        `unexpected character: expected ${describeChar(char)}, got ${describeChar(got)}`
      )
    )
  }
  return done
}

const matchKeyword = (producer: Producer, keyword: string): Rule<void> => {
  for (const char of keyword) {
    const matched = expects(producer, char)
    if (Either.isLeft(matched)) {
      return matched
    }
  }
  return done
}

const checkDepth = (context: ReaderContext, depth: number): Rule<void> => {
  if (depth > context.maxDepth) {
    return Either.left(
      parseError(
        "DepthExceeded",
        positionOf(context.producer),
        `maximum nesting depth exceeded (${context.maxDepth})`
      )
    )
  }
  return done
}

const stringRule = (producer: Producer): Rule<string> => {
  const opened = expects(producer, "\"")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  producer.skipWhitespace(false)
  let text = ""
  while (!has(producer, "\"")) {
    // A backslash only marks the following character as literal.
    mayHave(producer, "\\")
    const char = producer.next()
    if (char === undefined) {
      break
    }
    text += char
  }
  const closed = expects(producer, "\"")
  if (Either.isLeft(closed)) {
    return Either.left(closed.left)
  }
  producer.skipWhitespace(true)
  return Either.right(text)
}

const numberRule = (producer: Producer): Rule<number> => {
  producer.skipWhitespace(false)
  const negative = mayHave(producer, "-")
  let digits = ""
  if (has(producer, "0")) {
    digits += take(producer)
  } else {
    if (!isDigit(producer.peek())) {
      return fail(producer, "MalformedNumber", "expected number")
    }
    while (isDigit(producer.peek())) {
      digits += take(producer)
    }
  }
  if (has(producer, ".")) {
    digits += take(producer)
    if (!isDigit(producer.peek())) {
      return fail(producer, "MalformedNumber", "expected number")
    }
    while (isDigit(producer.peek())) {
      digits += take(producer)
    }
  }
  let magnitude = Number(digits)
  if (has(producer, "e") || has(producer, "E")) {
    producer.next()
    const sign = has(producer, "-") || has(producer, "+") ? take(producer) : "+"
    let exponentDigits = ""
    while (isDigit(producer.peek())) {
      exponentDigits += take(producer)
    }
    // An empty exponent is read as zero.
    const exponent = exponentDigits === "" ? 0 : Number(exponentDigits)
    magnitude = magnitude * Math.pow(10, sign === "-" ? -exponent : exponent)
  }
  producer.skipWhitespace(true)
  return Either.right(negative ? -magnitude : magnitude)
}

const keywordRule = <A>(producer: Producer, keyword: string, result: A): Rule<A> => {
  producer.skipWhitespace(false)
  const matched = matchKeyword(producer, keyword)
  if (Either.isLeft(matched)) {
    return Either.left(matched.left)
  }
  producer.skipWhitespace(true)
  return Either.right(result)
}

const booleanRule = (producer: Producer): Rule<boolean> => {
  if (has(producer, "t")) {
    return keywordRule(producer, "true", true)
  }
  if (has(producer, "f")) {
    return keywordRule(producer, "false", false)
  }
  return fail(producer, "ExpectedValue", "expected boolean")
}

const nullRule = (producer: Producer): Rule<null> => {
  if (has(producer, "n")) {
    return keywordRule(producer, "null", null)
  }
  return fail(producer, "ExpectedValue", "expected null")
}

const arrayRule = (context: ReaderContext, depth: number): Rule<ArrayValue> => {
  const { producer } = context
  const allowed = checkDepth(context, depth)
  if (Either.isLeft(allowed)) {
    return Either.left(allowed.left)
  }
  const opened = expects(producer, "[")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const items: Array<Value> = []
  if (mayHave(producer, "]")) {
    return Either.right(arrayValue(items))
  }
  for (;;) {
    const item = valueRule(context, depth)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
    if (!mayHave(producer, ",")) {
      break
    }
  }
  const closed = expects(producer, "]")
  if (Either.isLeft(closed)) {
    return Either.left(closed.left)
  }
  return Either.right(arrayValue(items))
}

const objectRule = (context: ReaderContext, depth: number): Rule<ObjectValue> => {
  const { producer } = context
  const allowed = checkDepth(context, depth)
  if (Either.isLeft(allowed)) {
    return Either.left(allowed.left)
  }
  const opened = expects(producer, "{")
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const entries = new Map<string, Value>()
  if (mayHave(producer, "}")) {
    return Either.right(objectValue(entries))
  }
  for (;;) {
    if (!has(producer, "\"")) {
      return fail(producer, "ExpectedKey", "expected key")
    }
    const key = stringRule(producer)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const colon = expects(producer, ":")
    if (Either.isLeft(colon)) {
      return Either.left(colon.left)
    }
    const member = valueRule(context, depth)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    // Later duplicates overwrite earlier ones.
    entries.set(key.right, member.right)
    if (!mayHave(producer, ",")) {
      break
    }
  }
  const closed = expects(producer, "}")
  if (Either.isLeft(closed)) {
    return Either.left(closed.left)
  }
  return Either.right(objectValue(entries))
}

const valueRule = (context: ReaderContext, depth: number): Rule<Value> => {
  const { producer } = context
  const char = producer.peek()
  if (char === "\"") {
    return Either.map(stringRule(producer), stringValue)
  }
  if (char === "[") {
    return arrayRule(context, depth + 1)
  }
  if (char === "{") {
    return objectRule(context, depth + 1)
  }
  if (char === "t" || char === "f") {
    return Either.map(booleanRule(producer), booleanValue)
  }
  if (char === "n") {
    return Either.map(nullRule(producer), () => nullValue)
  }
  if (char === "-" || isDigit(char)) {
    return Either.map(numberRule(producer), numberValue)
  }
  return fail(producer, "ExpectedValue", "expected value")
}

/**
 * Parse one string token; the backslash escapes the next raw character verbatim.
 *
 * @param producer - Source positioned at the opening quote.
 * @returns Either with the string contents or a ParseError.
 *
 * @pure false
 * @effect consumes characters from producer
 * @effect switches whitespace skipping on after the closing quote
 * @invariant `\n` in the source yields the letter n, not a newline
 * @complexity O(n)
 */
export const parseString = (producer: Producer): Either.Either<string, ParseError> => stringRule(producer)

/**
 * Parse a number token. The exponent is applied as a separate power-of-ten multiplication.
 *
 * @param producer - Source positioned at `-` or the first digit.
 * @returns Either with the number or a MalformedNumber ParseError.
 *
 * @pure false
 * @effect consumes characters from producer; whitespace skipping is on when it returns Right
 * @invariant leading `0` is never followed by further integer digits
 * @complexity O(n)
 */
export const parseNumber = (producer: Producer): Either.Either<number, ParseError> => numberRule(producer)

export const parseBoolean = (producer: Producer): Either.Either<boolean, ParseError> => booleanRule(producer)

export const parseNull = (producer: Producer): Either.Either<null, ParseError> => nullRule(producer)

export const parseArray = (
  producer: Producer,
  options: ParseOptions = {}
): Either.Either<ArrayValue, ParseError> => arrayRule(makeContext(producer, options), 1)

export const parseObject = (
  producer: Producer,
  options: ParseOptions = {}
): Either.Either<ObjectValue, ParseError> => objectRule(makeContext(producer, options), 1)

/**
 * Parse any value, dispatching on one character of lookahead.
 *
 * @pure false
 * @effect consumes characters from producer
 * @complexity O(n)
 */
export const parseValue = (
  producer: Producer,
  options: ParseOptions = {}
): Either.Either<Value, ParseError> => valueRule(makeContext(producer, options), 0)

/**
 * Parse a document. The root must be an object; anything after its closing brace is left unread.
 *
 * @param producer - Character source for the whole document.
 * @param options - Nesting limit.
 * @returns Either with the root ObjectValue or the first ParseError.
 *
 * @pure false
 * @effect consumes characters from producer
 * @invariant Left carries the position of the offending character
 * @complexity O(n)
 */
export const parse = (
  producer: Producer,
  options: ParseOptions = {}
): Either.Either<ObjectValue, ParseError> => {
  producer.skipWhitespace(true)
  return objectRule(makeContext(producer, options), 1)
}

export const parseText = (
  text: string,
  options: ParseOptions = {}
): Either.Either<ObjectValue, ParseError> => parse(makeTextProducer(text), options)
