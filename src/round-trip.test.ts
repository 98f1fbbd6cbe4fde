import { suite, test } from "node:test";
import { ok } from "node:assert/strict";
import { decode } from "./decoder.ts";
import { encode } from "./encoder.ts";
import { equals } from "./equality.ts";
import {
  byteString,
  integer,
  list,
  map,
  renderText,
  type Value,
} from "./value.ts";

// mulberry32: a small seeded generator so every run sees the same values.
function generator(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };
}

function randomBytes(next: () => number, maxLength: number): Uint8Array {
  const bytes = new Uint8Array(next() % (maxLength + 1));
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = next() & 0xff;
  }
  return bytes;
}

function randomTree(next: () => number, depth: number): Value {
  const choice = depth === 0 ? next() % 2 : next() % 4;
  switch (choice) {
    case 0:
      return integer(next() | 0);
    case 1:
      return byteString(randomBytes(next, 16));
    case 2: {
      const items: Value[] = [];
      for (let n = next() % 5; n > 0; n--) {
        items.push(randomTree(next, depth - 1));
      }
      return list(items);
    }
    default: {
      const entries: [Value, Value][] = [];
      for (let n = next() % 5; n > 0; n--) {
        const key =
          next() % 8 === 0
            ? randomTree(next, 0)
            : byteString(randomBytes(next, 8));
        entries.push([key, randomTree(next, depth - 1)]);
      }
      return map(entries);
    }
  }
}

function assertRoundTrip(value: Value): void {
  const decoded = decode(encode(value));
  ok(equals(decoded, value), renderText(value));
}

await suite(import.meta.filename, async () => {
  await test("int32 integers", async () => {
    const next = generator(0x5eed);
    const values = [0, 1, -1, 2_147_483_647, -2_147_483_648];
    for (let i = 0; i < 1000; i++) {
      values.push(next() | 0);
    }
    for (const n of values) {
      const value = integer(n);
      ok(equals(decode(encode(value)), value), String(n));
    }
  });

  await test("byte strings up to 64 bytes", async () => {
    const next = generator(0xb17e5);
    const values: Uint8Array[] = [
      new Uint8Array(0),
      Uint8Array.of(0xff),
      Uint8Array.of(0xc3, 0x28),
      Uint8Array.of(0x65, 0x3a, 0x69),
    ];
    for (let i = 0; i < 500; i++) {
      values.push(randomBytes(next, 64));
    }
    for (const bytes of values) {
      const value = byteString(bytes);
      ok(equals(decode(encode(value)), value), String(bytes));
    }
  });

  await test("nested trees", async () => {
    const next = generator(0x7ee5);
    for (let i = 0; i < 300; i++) {
      assertRoundTrip(randomTree(next, 4));
    }
  });
});
