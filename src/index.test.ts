import { suite, test } from "node:test";
import { ok, strictEqual } from "node:assert/strict";
import * as bencode from "./index.ts";

await suite(import.meta.filename, async () => {
  await test("round trip through the package entry point", async () => {
    const value = bencode.Value.from({ op: "eval", code: "(+ 1 2)" });
    const bytes = bencode.encode(value);
    strictEqual(bencode.encodeToString(value), "d4:code7:(+ 1 2)2:op4:evale");
    ok(bencode.equals(bencode.decode(bytes), value));
  });

  await test("errors are exported for matching", async () => {
    const result = bencode.decodeOne("d3:fooe");
    ok(result.kind === "Err");
    ok(result.error instanceof bencode.MissingMapValueError);
    ok(result.error instanceof bencode.BencodeError);
  });
});
