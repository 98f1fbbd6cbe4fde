import { suite, test } from "node:test";
import { deepStrictEqual, ok, strictEqual } from "node:assert/strict";
import { decode } from "./decoder.ts";
import { encode, encodeToString } from "./encoder.ts";
import { equals } from "./equality.ts";
import { encoder } from "./text.ts";
import { renderText, Value } from "./value.ts";

await suite(import.meta.filename, async () => {
  await suite("canonical literals", async () => {
    const cases: [Value, string][] = [
      [Value.integer(1), "i1e"],
      [Value.integer(-999), "i-999e"],
      [Value.integer(0), "i0e"],
      [Value.string("foo"), "3:foo"],
      [Value.string(""), "0:"],
      [Value.string("1234567890\n"), "11:1234567890\n"],
      [Value.from([1, 2, 3]), "li1ei2ei3ee"],
      [Value.from([1, "foo", 3]), "li1e3:fooi3ee"],
      [Value.list([]), "le"],
      [Value.fromRecord({ bar: "baz" }), "d3:bar3:baze"],
      [Value.map([]), "de"],
      [Value.from({ foo: { bar: "baz" } }), "d3:food3:bar3:bazee"],
    ];
    for (const [value, expected] of cases) {
      await test(expected, async () => {
        deepStrictEqual(encode(value), encoder.encode(expected));
        strictEqual(encodeToString(value), expected);
      });
    }
  });

  await test("string length counts bytes, not characters", async () => {
    strictEqual(encodeToString(Value.string("héllo")), "6:héllo");
  });

  await test("raw bytes are written untouched", async () => {
    deepStrictEqual(
      encode(Value.string(Uint8Array.of(0xff, 0x00, 0x65))),
      Uint8Array.of(0x33, 0x3a, 0xff, 0x00, 0x65),
    );
  });

  await test("toCanonicalBytes is encode", async () => {
    deepStrictEqual(
      Value.toCanonicalBytes(Value.from({ a: [1] })),
      encoder.encode("d1:ali1eee"),
    );
  });

  await suite("key order", async () => {
    const unordered = Value.map([
      [Value.string("zeta"), Value.integer(2)],
      [Value.string("alpha"), Value.integer(1)],
    ]);

    await test("sorted by default", async () => {
      strictEqual(encodeToString(unordered), "d5:alphai1e4:zetai2ee");
    });

    await test("insertion order when sorting is off", async () => {
      strictEqual(
        encodeToString(unordered, { sortKeys: false }),
        "d4:zetai2e5:alphai1ee",
      );
    });

    await test("byte-wise comparison", async () => {
      const value = Value.from({ b: 1, B: 2, aa: 3, a: 4 });
      strictEqual(encodeToString(value), "d1:Bi2e1:ai4e2:aai3e1:bi1ee");
    });

    await test("non-string keys follow string keys", async () => {
      const value = Value.map([
        [Value.integer(1), Value.string("y")],
        [Value.string("z"), Value.string("x")],
      ]);
      strictEqual(encodeToString(value), "d1:z1:xi1e1:ye");
    });

    await test("nested maps", async () => {
      const value = Value.map([
        [
          Value.string("outer"),
          Value.map([
            [Value.string("y"), Value.integer(1)],
            [Value.string("x"), Value.integer(2)],
          ]),
        ],
      ]);
      strictEqual(encodeToString(value), "d5:outerd1:xi2e1:yi1eee");
      strictEqual(
        encodeToString(value, { sortKeys: false }),
        "d5:outerd1:yi1e1:xi2eee",
      );
    });
  });

  await suite("round trip", async () => {
    const values: Value[] = [
      Value.integer(2_147_483_647),
      Value.integer(-2_147_483_648),
      Value.string(Uint8Array.of(0x80, 0xfe, 0xff)),
      Value.string("e:l:d:i"),
      Value.from({
        info: { name: "sample", length: 1024, pieces: [1, 2, 3] },
        list: [[], {}, ["nested", ["deeper"]]],
      }),
      Value.map([
        [Value.list([Value.integer(1)]), Value.string("list key")],
        [Value.integer(-5), Value.from({})],
      ]),
    ];
    for (const value of values) {
      await test(renderText(value), async () => {
        const decoded = decode(encode(value));
        ok(equals(decoded, value));
        deepStrictEqual(encode(decoded), encode(value));
      });
    }

    await test("decode then encode reorders keys canonically", async () => {
      strictEqual(
        encodeToString(decode("d1:bi1e1:ai2ee")),
        "d1:ai2e1:bi1ee",
      );
    });
  });
});
