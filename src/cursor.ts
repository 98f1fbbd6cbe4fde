import { encoder } from "./text.ts";

/**
 * A synchronous, forward-only source of bytes.
 */
export interface ByteSource {
  /**
   * Returns the next byte, or `undefined` once the source is exhausted.
   */
  readByte(): number | undefined;

  /**
   * Reads up to `length` bytes. The result is shorter than requested only if
   * the source ran out.
   */
  read(length: number): Uint8Array;

  /**
   * Number of bytes consumed so far, where the source keeps count.
   */
  readonly position?: number;
}

/**
 * Reads from one in-memory buffer. Strings are UTF-8 encoded first.
 */
export class ByteCursor implements ByteSource {
  private readonly data: Uint8Array;
  private offset = 0;

  public constructor(data: Uint8Array | string) {
    this.data = typeof data === "string" ? encoder.encode(data) : data;
  }

  public get position(): number {
    return this.offset;
  }

  public get remaining(): number {
    return this.data.length - this.offset;
  }

  public readByte(): number | undefined {
    if (this.offset >= this.data.length) {
      return undefined;
    }
    return this.data[this.offset++];
  }

  public read(length: number): Uint8Array {
    const end = Math.min(this.offset + length, this.data.length);
    const bytes = this.data.slice(this.offset, end);
    this.offset = end;
    return bytes;
  }
}

/**
 * Reads from a sequence of chunks, pulling the next chunk only when the
 * current one is used up. Empty chunks are skipped.
 */
export class ChunkCursor implements ByteSource {
  private readonly chunks: Iterator<Uint8Array>;
  private current: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private consumed = 0;
  private exhausted = false;

  public constructor(chunks: Iterable<Uint8Array>) {
    this.chunks = chunks[Symbol.iterator]();
  }

  public get position(): number {
    return this.consumed;
  }

  public readByte(): number | undefined {
    if (!this.fill()) {
      return undefined;
    }
    this.consumed++;
    return this.current[this.offset++];
  }

  public read(length: number): Uint8Array {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length && this.fill()) {
      const take = Math.min(length - filled, this.current.length - this.offset);
      out.set(this.current.subarray(this.offset, this.offset + take), filled);
      this.offset += take;
      filled += take;
    }
    this.consumed += filled;
    return filled === length ? out : out.slice(0, filled);
  }

  private fill(): boolean {
    while (this.offset >= this.current.length) {
      if (this.exhausted) {
        return false;
      }
      const next = this.chunks.next();
      if (next.done) {
        this.exhausted = true;
        return false;
      }
      this.current = next.value;
      this.offset = 0;
    }
    return true;
  }
}
