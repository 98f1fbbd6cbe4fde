import { ByteCursor, type ByteSource } from "./cursor.ts";
import {
  type BencodeError,
  EofError,
  InvalidLeadByteError,
  IoError,
  LimitExceededError,
  MissingMapValueError,
  ParseError,
  TrailingDataError,
  UnexpectedTerminatorError,
} from "./errors.ts";
import { log } from "./log.ts";
import {
  type DecodeOptions,
  integerBounds,
  resolveDecodeOptions,
} from "./options.ts";
import { err, ok, type Result } from "./types.ts";
import { integer, list, type Value } from "./value.ts";
import { ValueMap } from "./value-map.ts";

/**
 * Returned by {@link decodeStep} when it reads the `e` that closes a list or
 * map instead of a value.
 */
export const EndOfContainer: unique symbol = Symbol("EndOfContainer");
export type EndOfContainer = typeof EndOfContainer;

export type DecodeResult<T = Value> = Result<T, BencodeError>;

const INTEGER = 0x69; // i
const LIST = 0x6c; // l
const DICTIONARY = 0x64; // d
const END = 0x65; // e
const COLON = 0x3a; // :
const ZERO = 0x30;
const NINE = 0x39;

// Longest integer literal read before giving up on finding its `e`.
const MAX_INTEGER_LITERAL = 32;

class Parser {
  private readonly source: ByteSource;
  private readonly options: Required<DecodeOptions>;

  public constructor(source: ByteSource, options: Required<DecodeOptions>) {
    this.source = source;
    this.options = options;
  }

  public readByte(): DecodeResult<number | undefined> {
    try {
      return ok(this.source.readByte());
    } catch (e) {
      return err(new IoError(e));
    }
  }

  public step(depth: number): DecodeResult<Value | EndOfContainer> {
    const lead = this.readByte();
    if (lead.kind === "Err") {
      return lead;
    }
    if (lead.value === undefined) {
      return err(new EofError(depth ? "a value or 'e'" : "a value"));
    }
    return this.dispatch(lead.value, depth);
  }

  public dispatch(
    lead: number,
    depth: number,
  ): DecodeResult<Value | EndOfContainer> {
    switch (lead) {
      case INTEGER:
        return this.integer();
      case LIST:
        return this.list(depth + 1);
      case DICTIONARY:
        return this.dictionary(depth + 1);
      case END:
        return ok<EndOfContainer>(EndOfContainer);
      case ZERO:
        return this.emptyString();
    }
    if (lead > ZERO && lead <= NINE) {
      return this.byteString(lead - ZERO);
    }
    return err(new InvalidLeadByteError(lead));
  }

  private read(length: number): DecodeResult<Uint8Array> {
    try {
      return ok(this.source.read(length));
    } catch (e) {
      return err(new IoError(e));
    }
  }

  private integer(): DecodeResult<Value> {
    let literal = "";
    for (;;) {
      const next = this.readByte();
      if (next.kind === "Err") {
        return next;
      }
      if (next.value === undefined) {
        return err(new EofError("'e' closing an integer"));
      }
      if (next.value === END) {
        break;
      }
      if (literal.length >= MAX_INTEGER_LITERAL) {
        return this.limitExceeded(
          "integer literal length",
          MAX_INTEGER_LITERAL,
        );
      }
      literal += String.fromCharCode(next.value);
    }
    if (!/^-?[0-9]+$/.test(literal)) {
      return err(
        new ParseError(`invalid integer literal ${JSON.stringify(literal)}`),
      );
    }
    const n = Number(literal);
    const { min, max } = integerBounds[this.options.integerRange];
    if (n < min || n > max) {
      return err(
        new ParseError(
          `integer ${literal} is outside the ${this.options.integerRange} range`,
        ),
      );
    }
    return ok(integer(n, this.options.integerRange));
  }

  private emptyString(): DecodeResult<Value> {
    const next = this.readByte();
    if (next.kind === "Err") {
      return next;
    }
    if (next.value === undefined) {
      return err(new EofError("':' after string length"));
    }
    if (next.value !== COLON) {
      return err(new ParseError("string length has a leading zero"));
    }
    return ok<Value>({ kind: "ByteString", bytes: new Uint8Array(0) });
  }

  private byteString(firstDigit: number): DecodeResult<Value> {
    const { maxStringLength } = this.options;
    let length = firstDigit;
    for (;;) {
      if (length > maxStringLength) {
        return this.limitExceeded("string length", maxStringLength);
      }
      const next = this.readByte();
      if (next.kind === "Err") {
        return next;
      }
      if (next.value === undefined) {
        return err(new EofError("':' after string length"));
      }
      if (next.value === COLON) {
        break;
      }
      if (next.value < ZERO || next.value > NINE) {
        const found = String.fromCharCode(next.value);
        return err(
          new ParseError(`invalid character in string length: '${found}'`),
        );
      }
      length = length * 10 + (next.value - ZERO);
    }
    const bytes = this.read(length);
    if (bytes.kind === "Err") {
      return bytes;
    }
    if (bytes.value.length < length) {
      return err(
        new EofError(`${length} string bytes, found ${bytes.value.length}`),
      );
    }
    return ok<Value>({ kind: "ByteString", bytes: bytes.value });
  }

  private list(depth: number): DecodeResult<Value> {
    if (depth > this.options.maxDepth) {
      return this.limitExceeded("nesting depth", this.options.maxDepth);
    }
    const items: Value[] = [];
    for (;;) {
      const next = this.step(depth);
      if (next.kind === "Err") {
        return next;
      }
      const item = next.value;
      if (item === EndOfContainer) {
        return ok(list(items));
      }
      items.push(item);
    }
  }

  private dictionary(depth: number): DecodeResult<Value> {
    if (depth > this.options.maxDepth) {
      return this.limitExceeded("nesting depth", this.options.maxDepth);
    }
    const entries = new ValueMap();
    for (;;) {
      const keyStep = this.step(depth);
      if (keyStep.kind === "Err") {
        return keyStep;
      }
      const key = keyStep.value;
      if (key === EndOfContainer) {
        return ok<Value>({ kind: "Map", entries });
      }
      const valueStep = this.step(depth);
      if (valueStep.kind === "Err") {
        return valueStep;
      }
      const value = valueStep.value;
      if (value === EndOfContainer) {
        return err(new MissingMapValueError());
      }
      entries.set(key, value);
    }
  }

  private limitExceeded(limit: string, maximum: number): DecodeResult<never> {
    log("%s exceeded (maximum %d)", limit, maximum);
    return err(new LimitExceededError(limit, maximum));
  }
}

/**
 * Consumes exactly one encoded value, or the `e` closing the enclosing
 * container, from `source`.
 */
export function decodeStep(
  source: ByteSource,
  options?: DecodeOptions,
): DecodeResult<Value | EndOfContainer> {
  const parser = new Parser(source, resolveDecodeOptions(options));
  return logFailure(source, parser.step(0));
}

/**
 * Decodes one top-level value. An empty source is an {@link EofError}; a bare
 * `e` is an {@link UnexpectedTerminatorError}.
 */
export function decodeOne(
  source: ByteSource | Uint8Array | string,
  options?: DecodeOptions,
): DecodeResult {
  const cursor = isInput(source) ? new ByteCursor(source) : source;
  const result = decodeStep(cursor, options);
  if (result.kind === "Err") {
    return result;
  }
  const value = result.value;
  if (value === EndOfContainer) {
    return err(new UnexpectedTerminatorError());
  }
  return ok(value);
}

/**
 * Decodes `input`, which must hold exactly one value.
 *
 * @throws {BencodeError} if the input is malformed or has trailing bytes
 */
export function decode(
  input: Uint8Array | string,
  options?: DecodeOptions,
): Value {
  const cursor = new ByteCursor(input);
  const result = decodeOne(cursor, options);
  if (result.kind === "Err") {
    throw result.error;
  }
  if (cursor.remaining) {
    throw new TrailingDataError(cursor.remaining);
  }
  return result.value;
}

/**
 * Reads consecutive top-level values from one source.
 *
 * @example
 * for (const value of new Decoder(new ByteCursor("i1e3:fooli2ee"))) {
 *   console.log(renderText(value));
 * }
 */
export class Decoder implements Iterable<Value> {
  private readonly source: ByteSource;
  private readonly parser: Parser;
  private failure: BencodeError | undefined;

  public constructor(source: ByteSource, options?: DecodeOptions) {
    this.source = source;
    this.parser = new Parser(source, resolveDecodeOptions(options));
  }

  /**
   * The next value, or `undefined` once the source ends cleanly between
   * values. After an error the decoder is stuck and keeps returning it.
   */
  public next(): DecodeResult<Value | undefined> {
    if (this.failure) {
      return err(this.failure);
    }
    const result = this.readValue();
    if (result.kind === "Err") {
      this.failure = result.error;
    }
    return logFailure(this.source, result);
  }

  public *[Symbol.iterator](): Iterator<Value> {
    for (;;) {
      const result = this.next();
      if (result.kind === "Err") {
        throw result.error;
      }
      if (result.value === undefined) {
        return;
      }
      yield result.value;
    }
  }

  private readValue(): DecodeResult<Value | undefined> {
    const lead = this.parser.readByte();
    if (lead.kind === "Err") {
      return lead;
    }
    if (lead.value === undefined) {
      return ok(undefined);
    }
    const result = this.parser.dispatch(lead.value, 0);
    if (result.kind === "Err") {
      return result;
    }
    const value = result.value;
    if (value === EndOfContainer) {
      return err(new UnexpectedTerminatorError());
    }
    return ok(value);
  }
}

function logFailure<T>(
  source: ByteSource,
  result: DecodeResult<T>,
): DecodeResult<T> {
  if (result.kind === "Err") {
    log(
      "decode failed at byte %s: %s",
      source.position ?? "?",
      result.error.message,
    );
  }
  return result;
}

function isInput(
  source: ByteSource | Uint8Array | string,
): source is Uint8Array | string {
  return typeof source === "string" || source instanceof Uint8Array;
}
