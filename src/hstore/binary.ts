// src/hstore/binary.ts
import { HstoreError } from "./errors.js";

// ignoreBOM keeps a leading U+FEFF in the decoded text
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export class BinaryReader {
  private offset = 0;

  public constructor(private readonly buf: Buffer) {}

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public readI32BE(): number {
    this.ensure(4);
    const v = this.buf.readInt32BE(this.offset);
    this.offset += 4;
    return v;
  }

  public readBytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) throw new RangeError(`Invalid read length: ${n}`);
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  /** Reads `n` bytes and decodes them as strict UTF-8. */
  public readUtf8(n: number): string {
    const at = this.offset;
    const bytes = this.readBytes(n);
    try {
      return utf8.decode(bytes);
    } catch {
      throw new HstoreError("InvalidUtf8", `invalid utf8 in ${n} bytes at offset ${at}`);
    }
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new HstoreError(
        "TruncatedBuffer",
        `unexpected end of buffer at offset ${this.offset}: need ${n} bytes, have ${this.remaining()}`,
      );
    }
  }
}

/** Handle to four reserved bytes, patched once their value is known. */
export type I32Slot = Readonly<{ chunk: number }>;

export class BinaryWriter {
  private readonly chunks: Buffer[] = [];

  public writeI32BE(v: number): void {
    this.chunks.push(i32be(v));
  }

  /** Writes `len(s)` then the UTF-8 bytes of `s`. */
  public writeLengthPrefixed(s: string): void {
    const b = Buffer.from(s, "utf8");
    this.writeI32BE(b.length);
    this.chunks.push(b);
  }

  public reserveI32BE(): I32Slot {
    this.chunks.push(Buffer.alloc(4));
    return { chunk: this.chunks.length - 1 };
  }

  public patchI32BE(slot: I32Slot, v: number): void {
    const target = this.chunks[slot.chunk];
    if (target === undefined || target.length !== 4) {
      throw new Error(`Invalid reserved slot: ${slot.chunk}`);
    }
    target.writeInt32BE(checkI32(v), 0);
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

function checkI32(v: number): number {
  if (!Number.isInteger(v) || v < -0x80000000 || v > 0x7fffffff) {
    throw new RangeError(`I32 out of range: ${v}`);
  }
  return v;
}

function i32be(v: number): Buffer {
  const b = Buffer.alloc(4);
  b.writeInt32BE(checkI32(v), 0);
  return b;
}
