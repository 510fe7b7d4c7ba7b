export type { Json, JsonRecord } from "./core/json.js"
export type { AppError, ParseError, ParseErrorKind } from "./core/errors.js"
export { formatAppError, renderParseError } from "./core/errors.js"
export type { ParseOptions } from "./core/parser.js"
export {
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  isDigit,
  parse,
  parseArray,
  parseBoolean,
  parseNull,
  parseNumber,
  parseObject,
  parseString,
  parseText,
  parseValue
} from "./core/parser.js"
export type { Producer } from "./core/producer.js"
export { isWhitespace, makeTextProducer } from "./core/producer.js"
export { summarizeValue } from "./core/stats.js"
export type { ValueStats } from "./core/types.js"
export type {
  ArrayValue,
  BooleanValue,
  NullValue,
  NumberValue,
  ObjectValue,
  StringValue,
  Value,
  ValueTag
} from "./core/value.js"
export {
  arrayValue,
  booleanValue,
  getField,
  getIndex,
  isArrayValue,
  isBooleanValue,
  isNullValue,
  isNumberValue,
  isObjectValue,
  isStringValue,
  nullValue,
  numberValue,
  objectValue,
  stringValue,
  toJson
} from "./core/value.js"
