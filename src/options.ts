import { InvalidOptionError } from "./errors.ts";

export type IntegerRange = "int32" | "safe";

export interface DecodeOptions {
  /**
   * Deepest container nesting accepted; 0 admits no lists or maps at all.
   */
  readonly maxDepth?: number;
  /**
   * Largest declared byte-string length accepted, checked before the payload
   * is read.
   */
  readonly maxStringLength?: number;
  /**
   * `int32` rejects integers outside the signed 32-bit range, `safe` widens
   * that to `Number.MIN_SAFE_INTEGER..Number.MAX_SAFE_INTEGER`.
   */
  readonly integerRange?: IntegerRange;
}

export interface EncodeOptions {
  /**
   * Emit map entries in byte-wise key order. When false, entries are written
   * in insertion order.
   */
  readonly sortKeys?: boolean;
}

export const defaultDecodeOptions: Required<DecodeOptions> = Object.freeze({
  maxDepth: 256,
  maxStringLength: 16 * 1024 * 1024,
  integerRange: "int32",
});

export const defaultEncodeOptions: Required<EncodeOptions> = Object.freeze({
  sortKeys: true,
});

export const integerBounds = {
  int32: { min: -0x80000000, max: 0x7fffffff },
  safe: { min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER },
} as const satisfies Record<IntegerRange, { min: number; max: number }>;

export function resolveDecodeOptions(
  options: DecodeOptions = {},
): Required<DecodeOptions> {
  const resolved: Required<DecodeOptions> = {
    maxDepth: options.maxDepth ?? defaultDecodeOptions.maxDepth,
    maxStringLength:
      options.maxStringLength ?? defaultDecodeOptions.maxStringLength,
    integerRange: options.integerRange ?? defaultDecodeOptions.integerRange,
  };
  assertCount("maxDepth", resolved.maxDepth);
  assertCount("maxStringLength", resolved.maxStringLength);
  if (!Object.hasOwn(integerBounds, resolved.integerRange)) {
    throw new InvalidOptionError(
      "integerRange",
      `expected "int32" or "safe", got ${JSON.stringify(resolved.integerRange)}`,
    );
  }
  return resolved;
}

export function resolveEncodeOptions(
  options: EncodeOptions = {},
): Required<EncodeOptions> {
  return {
    sortKeys: options.sortKeys ?? defaultEncodeOptions.sortKeys,
  };
}

function assertCount(option: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidOptionError(
      option,
      `expected a non-negative integer, got ${value}`,
    );
  }
}
