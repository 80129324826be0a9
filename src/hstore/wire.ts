// src/hstore/wire.ts
//
// PostgreSQL hstore binary send/recv format, all integers i32 big-endian:
//   count, then count x (key_len, key, value_len, value)
// value_len < 0 is a NULL value with no bytes following.
import { BinaryReader, BinaryWriter } from "./binary.js";
import { HstoreError } from "./errors.js";
import type { WarnFn } from "./errors.js";
import { Hstore } from "./hstore.js";

export interface ByteSink {
  write(bytes: Uint8Array): void;
}

export function decodeHstore(bytes: Uint8Array, warn: WarnFn = () => {}): Hstore {
  const r = new BinaryReader(Buffer.from(bytes));

  const count = r.readI32BE();
  if (count < 0) throw new HstoreError("InvalidEntryCount", `invalid entry count: ${count}`);

  const out = new Hstore();
  for (let i = 0; i < count; i++) {
    const keyLen = r.readI32BE();
    if (keyLen < 0) {
      throw new HstoreError("InvalidKeyLength", `invalid key length ${keyLen} in entry ${i}`);
    }
    const key = r.readUtf8(keyLen);

    const valueLen = r.readI32BE();
    if (valueLen < 0) {
      warn(`dropped null value for key ${JSON.stringify(key)}`);
      continue;
    }
    out.insert(key, r.readUtf8(valueLen));
  }

  if (r.remaining() > 0) {
    throw new HstoreError(
      "InvalidBufferSize",
      `invalid buffer size: ${r.remaining()} bytes left after ${count} entries`,
    );
  }
  return out;
}

/**
 * Encodes `map` and hands the bytes to `sink` when one is given. Errors thrown
 * by the sink propagate unchanged.
 */
export function encodeHstore(map: Hstore, sink?: ByteSink): Buffer {
  const w = new BinaryWriter();
  const countSlot = w.reserveI32BE();

  let count = 0;
  for (const [key, value] of map) {
    w.writeLengthPrefixed(key);
    w.writeLengthPrefixed(value);
    count++;
  }
  w.patchI32BE(countSlot, count);

  const bytes = w.toBuffer();
  sink?.write(bytes);
  return bytes;
}
