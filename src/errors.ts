export type BencodeErrorKind = "Io" | "Eof" | "Parse" | "Error" | "LimitExceeded";

export abstract class BencodeError extends Error {
  public abstract readonly kind: BencodeErrorKind;

  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * The underlying byte source failed.
 */
export class IoError extends BencodeError {
  public readonly kind = "Io";

  public constructor(cause: unknown) {
    super(
      `Byte source failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

/**
 * Input ended where a value or a delimiter was still expected.
 */
export class EofError extends BencodeError {
  public readonly kind = "Eof";

  public constructor(expected: string) {
    super(`Unexpected end of input, expected ${expected}`);
  }
}

/**
 * A numeric field (integer value or string length) is not valid decimal.
 */
export class ParseError extends BencodeError {
  public readonly kind = "Parse";

  public constructor(reason: string) {
    super(`Parse error: ${reason}`);
  }
}

export class LimitExceededError extends BencodeError {
  public readonly kind = "LimitExceeded";
  public readonly limit: string;
  public readonly maximum: number;

  public constructor(limit: string, maximum: number) {
    super(`Limit exceeded: ${limit} is capped at ${maximum}`);
    this.limit = limit;
    this.maximum = maximum;
  }
}

export class InvalidLeadByteError extends BencodeError {
  public readonly kind = "Error";
  public readonly byte: number;

  public constructor(byte: number) {
    super(`Invalid character: ${describeByte(byte)}`);
    this.byte = byte;
  }
}

export class MissingMapValueError extends BencodeError {
  public readonly kind = "Error";

  public constructor() {
    super("Map is missing value for key");
  }
}

export class UnexpectedTerminatorError extends BencodeError {
  public readonly kind = "Error";

  public constructor() {
    super("Unexpected end-of-container marker outside of a list or map");
  }
}

export class TrailingDataError extends BencodeError {
  public readonly kind = "Error";

  public constructor(remaining: number) {
    super(`Unexpected ${remaining} trailing byte(s) after value`);
  }
}

export class TypeMismatchError extends BencodeError {
  public readonly kind = "Error";

  public constructor(expected: string, actual: string) {
    super(`Type mismatch: expected ${expected}, got ${actual}`);
  }
}

export class InvalidOptionError extends BencodeError {
  public readonly kind = "Error";

  public constructor(option: string, reason: string) {
    super(`Invalid option ${option}: ${reason}`);
  }
}

function describeByte(byte: number): string {
  if (byte >= 0x20 && byte < 0x7f) {
    return `'${String.fromCharCode(byte)}'`;
  }
  return `0x${byte.toString(16).padStart(2, "0")}`;
}
