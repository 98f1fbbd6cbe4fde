import type { Value } from "./value.ts";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Structural equality: lists compare element-wise in order, maps by key set
 * and per-key value regardless of entry order.
 */
export function equals(a: Value, b: Value): boolean {
  if (a === b) {
    return true;
  }
  switch (a.kind) {
    case "Integer":
      return b.kind === "Integer" && a.value === b.value;
    case "ByteString":
      return b.kind === "ByteString" && isEqualBytes(a.bytes, b.bytes);
    case "List": {
      if (b.kind !== "List" || a.items.length !== b.items.length) {
        return false;
      }
      const other = b.items;
      return a.items.every((it, i) => equals(it, other[i]));
    }
    case "Map": {
      if (b.kind !== "Map" || a.entries.size !== b.entries.size) {
        return false;
      }
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !equals(value, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

/**
 * 32-bit FNV-1a hash consistent with {@link equals}. Map entries are hashed
 * individually and summed, so entry order does not affect the result.
 */
export function hashValue(value: Value): number {
  switch (value.kind) {
    case "Integer":
      return mixBytes(mixByte(FNV_OFFSET_BASIS, 0x69), asciiOf(value.value));
    case "ByteString":
      return mixBytes(mixByte(FNV_OFFSET_BASIS, 0x73), value.bytes);
    case "List": {
      let hash = mixByte(FNV_OFFSET_BASIS, 0x6c);
      for (const item of value.items) {
        hash = mixWord(hash, hashValue(item));
      }
      return hash;
    }
    case "Map": {
      let seed = 1;
      for (const [key, val] of value.entries) {
        const entry = mixWord(
          mixWord(FNV_OFFSET_BASIS, hashValue(key)),
          hashValue(val),
        );
        seed = (seed + entry) >>> 0;
      }
      return mixWord(mixByte(FNV_OFFSET_BASIS, 0x64), seed);
    }
  }
}

export function isEqualBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((it, i) => it === b[i]);
}

function asciiOf(n: number): Uint8Array {
  const text = String(n);
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i);
  }
  return bytes;
}

function mixByte(hash: number, byte: number): number {
  return Math.imul(hash ^ byte, FNV_PRIME) >>> 0;
}

function mixBytes(hash: number, bytes: Uint8Array): number {
  let h = hash;
  for (const byte of bytes) {
    h = mixByte(h, byte);
  }
  return h;
}

function mixWord(hash: number, word: number): number {
  let h = hash;
  for (let shift = 24; shift >= 0; shift -= 8) {
    h = mixByte(h, (word >>> shift) & 0xff);
  }
  return h;
}
