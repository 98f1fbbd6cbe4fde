export {
  type IntegerValue,
  type ByteStringValue,
  type ListValue,
  type MapValue,
  type NativeValue,
  Value,
  integer,
  byteString,
  list,
  map,
  from,
  fromRecord,
  renderText,
  toStringMap,
  isInteger,
  isByteString,
  isList,
  isMap,
} from "./value.ts";
export { ValueMap, type ReadonlyValueMap } from "./value-map.ts";
export { equals, hashValue } from "./equality.ts";
export {
  decode,
  decodeOne,
  decodeStep,
  Decoder,
  EndOfContainer,
  type DecodeResult,
} from "./decoder.ts";
export { encode, encodeToString } from "./encoder.ts";
export { ByteCursor, ChunkCursor, type ByteSource } from "./cursor.ts";
export {
  type DecodeOptions,
  type EncodeOptions,
  type IntegerRange,
  defaultDecodeOptions,
  defaultEncodeOptions,
} from "./options.ts";
export {
  type BencodeErrorKind,
  BencodeError,
  IoError,
  EofError,
  ParseError,
  LimitExceededError,
  InvalidLeadByteError,
  MissingMapValueError,
  UnexpectedTerminatorError,
  TrailingDataError,
  TypeMismatchError,
  InvalidOptionError,
} from "./errors.ts";
export type { Result } from "./types.ts";
