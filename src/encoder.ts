import { Buffer } from "node:buffer";
import { type EncodeOptions, resolveEncodeOptions } from "./options.ts";
import { decoder, encoder } from "./text.ts";
import type { Value } from "./value.ts";
import type { ReadonlyValueMap } from "./value-map.ts";

const INTEGER = 0x69; // i
const LIST = 0x6c; // l
const DICTIONARY = 0x64; // d
const END = 0x65; // e
const COLON = 0x3a; // :

/**
 * Accumulates output chunks and joins them once at the end.
 */
class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  public byte(byte: number): void {
    this.bytes(Uint8Array.of(byte));
  }

  public ascii(text: string): void {
    this.bytes(encoder.encode(text));
  }

  public bytes(bytes: Uint8Array): void {
    this.chunks.push(bytes);
    this.length += bytes.length;
  }

  public finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

/**
 * Canonical bencode of `value`. Map entries are written in byte-wise key order
 * unless `sortKeys` is turned off.
 */
export function encode(value: Value, options?: EncodeOptions): Uint8Array {
  const { sortKeys } = resolveEncodeOptions(options);
  const writer = new ByteWriter();
  write(writer, value, sortKeys);
  return writer.finish();
}

/**
 * {@link encode}, decoded as (lossy) UTF-8 text.
 */
export function encodeToString(value: Value, options?: EncodeOptions): string {
  return decoder.decode(encode(value, options));
}

function write(writer: ByteWriter, value: Value, sortKeys: boolean): void {
  switch (value.kind) {
    case "Integer":
      writer.byte(INTEGER);
      writer.ascii(String(value.value));
      writer.byte(END);
      return;
    case "ByteString":
      writer.ascii(String(value.bytes.length));
      writer.byte(COLON);
      writer.bytes(value.bytes);
      return;
    case "List":
      writer.byte(LIST);
      for (const item of value.items) {
        write(writer, item, sortKeys);
      }
      writer.byte(END);
      return;
    case "Map": {
      const entries = sortKeys
        ? sortedEntries(value.entries)
        : [...value.entries];
      writer.byte(DICTIONARY);
      for (const [key, val] of entries) {
        write(writer, key, sortKeys);
        write(writer, val, sortKeys);
      }
      writer.byte(END);
      return;
    }
  }
}

/**
 * Byte-string keys sort by their raw bytes; any other key sorts after them,
 * by its own encoding.
 */
function sortedEntries(
  entries: ReadonlyValueMap,
): (readonly [Value, Value])[] {
  return [...entries]
    .map((entry) => {
      const [key] = entry;
      return key.kind === "ByteString"
        ? { entry, isString: true, sortKey: key.bytes }
        : { entry, isString: false, sortKey: encode(key) };
    })
    .sort((a, b) => {
      if (a.isString !== b.isString) {
        return a.isString ? -1 : 1;
      }
      return Buffer.compare(a.sortKey, b.sortKey);
    })
    .map(({ entry }) => entry);
}
