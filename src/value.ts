import { isUtf8 } from "node:buffer";
import { encode } from "./encoder.ts";
import { equals, hashValue } from "./equality.ts";
import { TypeMismatchError } from "./errors.ts";
import { type IntegerRange, integerBounds } from "./options.ts";
import { decoder, encoder } from "./text.ts";
import { err, ok, type Result } from "./types.ts";
import { type ReadonlyValueMap, ValueMap } from "./value-map.ts";

export interface IntegerValue {
  readonly kind: "Integer";
  readonly value: number;
}

export interface ByteStringValue {
  readonly kind: "ByteString";
  /**
   * Owned by the value and never written to. Mutating it in place breaks
   * equality and hashing for any map that already holds the value; build a new
   * value with {@link byteString} instead.
   */
  readonly bytes: Uint8Array;
}

export interface ListValue {
  readonly kind: "List";
  readonly items: readonly Value[];
}

export interface MapValue {
  readonly kind: "Map";
  readonly entries: ReadonlyValueMap;
}

export type Value = IntegerValue | ByteStringValue | ListValue | MapValue;

/**
 * Plain JavaScript data accepted by {@link from}.
 */
export type NativeValue =
  | number
  | string
  | Uint8Array
  | readonly NativeValue[]
  | ReadonlyMap<NativeValue, NativeValue>
  | { readonly [key: string]: NativeValue };

/**
 * Integers are checked against the same bounds the decoder applies, so a tree
 * built here decodes back under matching `integerRange` options. Pass `"safe"`
 * for values wider than 32 bits.
 */
export function integer(
  n: number,
  range: IntegerRange = "int32",
): IntegerValue {
  if (!Number.isSafeInteger(n)) {
    throw new TypeMismatchError("a safe integer", String(n));
  }
  const { min, max } = integerBounds[range];
  if (n < min || n > max) {
    throw new TypeMismatchError(`an integer in the ${range} range`, String(n));
  }
  return { kind: "Integer", value: n === 0 ? 0 : n };
}

export function byteString(s: string | Uint8Array): ByteStringValue {
  return {
    kind: "ByteString",
    bytes: typeof s === "string" ? encoder.encode(s) : Uint8Array.from(s),
  };
}

export function list(items: Iterable<Value>): ListValue {
  return { kind: "List", items: Object.freeze([...items]) };
}

export function map(entries: Iterable<readonly [Value, Value]>): MapValue {
  return { kind: "Map", entries: new ValueMap(entries) };
}

export function from(native: NativeValue): Value {
  if (typeof native === "number") {
    return integer(native);
  }
  if (typeof native === "string" || native instanceof Uint8Array) {
    return byteString(native);
  }
  if (isNativeList(native)) {
    return list(native.map(from));
  }
  if (isNativeMap(native)) {
    return map([...native].map(([k, v]) => [from(k), from(v)] as const));
  }
  return map(
    Object.entries(native).map(([k, v]) => [byteString(k), from(v)] as const),
  );
}

/**
 * Builds a map of byte strings from a flat string record.
 */
export function fromRecord(
  record: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
): MapValue {
  const entries = isStringMap(record) ? [...record] : Object.entries(record);
  return map(
    entries.map(([k, v]) => [byteString(k), byteString(v)] as const),
  );
}

/**
 * Debug rendering: `[a, b]` for lists, `{key value ...}` for maps, raw text
 * for scalars. Not canonical and not meant to be parsed back.
 */
export function renderText(value: Value): string {
  switch (value.kind) {
    case "Integer":
      return String(value.value);
    case "ByteString":
      return decoder.decode(value.bytes);
    case "List":
      return `[${value.items.map(renderText).join(", ")}]`;
    case "Map": {
      const parts = [...value.entries].map(
        ([k, v]) => `${renderText(k)} ${renderText(v)}`,
      );
      return `{${parts.join(" ")}}`;
    }
  }
}

/**
 * Flattens a map into text keys and values. Lists and maps are rendered with
 * {@link renderText}; a top-level byte string that is not UTF-8 fails.
 */
export function toStringMap(
  value: Value,
): Result<Map<string, string>, TypeMismatchError> {
  if (value.kind !== "Map") {
    return err(new TypeMismatchError("Map", describe(value)));
  }
  const result = new Map<string, string>();
  for (const [k, v] of value.entries) {
    const key = stringText(k);
    if (key === undefined) {
      return err(new TypeMismatchError("a string-like key", describe(k)));
    }
    const text = stringText(v);
    if (text === undefined) {
      return err(
        new TypeMismatchError(
          `a string-like value for key "${key}"`,
          describe(v),
        ),
      );
    }
    result.set(key, text);
  }
  return ok(result);
}

export function isInteger(value: Value): value is IntegerValue {
  return value.kind === "Integer";
}

export function isByteString(value: Value): value is ByteStringValue {
  return value.kind === "ByteString";
}

export function isList(value: Value): value is ListValue {
  return value.kind === "List";
}

export function isMap(value: Value): value is MapValue {
  return value.kind === "Map";
}

export const Value = {
  integer,
  string: byteString,
  list,
  map,
  from,
  fromRecord,
  equals,
  hash: hashValue,
  renderText,
  toStringMap,
  toCanonicalBytes: encode,
  isInteger,
  isByteString,
  isList,
  isMap,
} as const;

function stringText(value: Value): string | undefined {
  if (value.kind === "ByteString") {
    return isUtf8(value.bytes) ? decoder.decode(value.bytes) : undefined;
  }
  return renderText(value);
}

function describe(value: Value): string {
  if (value.kind === "ByteString" && !isUtf8(value.bytes)) {
    return "ByteString (not valid UTF-8)";
  }
  return value.kind;
}

function isNativeList(native: NativeValue): native is readonly NativeValue[] {
  return Array.isArray(native);
}

function isNativeMap(
  native: NativeValue,
): native is ReadonlyMap<NativeValue, NativeValue> {
  return native instanceof Map;
}

function isStringMap(
  record: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
): record is ReadonlyMap<string, string> {
  return record instanceof Map;
}
