// src/hstore/tool.ts
import path from "node:path";
import { readFile, writeFile } from "node:fs/promises";

import type { WarnFn } from "./errors.js";
import type { Hstore } from "./hstore.js";
import { parseHstoreJson } from "./hstoreJson.js";
import { parseHstoreText } from "./text.js";
import { decodeHstore } from "./wire.js";

export type InputFormat = "json" | "wire" | "text";

export type LoadOptions = Readonly<{
  format?: InputFormat;
  hex?: boolean; // wire input given as hex text
}>;

export function parseInputFormat(s: string): InputFormat {
  const f = s.trim().toLowerCase();
  if (f === "json") return "json";
  if (f === "wire" || f === "bin" || f === "binary") return "wire";
  if (f === "text" || f === "txt") return "text";
  throw new Error(`Unknown input format '${s}'. Expected: json|wire|text`);
}

export function inferInputFormat(p: string): InputFormat {
  const ext = path.extname(p).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".txt") return "text";
  return "wire";
}

/** Accepts psql's bytea output (`\x0000...`) or bare hex; whitespace is ignored. */
export function parseHexBytes(text: string): Buffer {
  let s = text.replace(/\s+/g, "");
  if (s.startsWith("\\x") || s.startsWith("0x")) s = s.slice(2);
  if (!/^[0-9a-fA-F]*$/.test(s)) throw new Error("Invalid hex input: unexpected character");
  if (s.length % 2 !== 0) throw new Error(`Invalid hex input: odd digit count ${s.length}`);
  return Buffer.from(s, "hex");
}

export function formatHexBytes(bytes: Uint8Array): string {
  return `\\x${Buffer.from(bytes).toString("hex")}`;
}

export async function loadHstore(
  inputPath: string,
  opts: LoadOptions = {},
  warn: WarnFn = () => {},
): Promise<Hstore> {
  const format = opts.format ?? inferInputFormat(inputPath);

  switch (format) {
    case "json": {
      const text = await readFile(inputPath, "utf8");
      const parsed: unknown = JSON.parse(text);
      return parseHstoreJson(parsed, warn);
    }
    case "text":
      return parseHstoreText(await readFile(inputPath, "utf8"), warn);
    case "wire": {
      const bytes = opts.hex
        ? parseHexBytes(await readFile(inputPath, "utf8"))
        : await readFile(inputPath);
      return decodeHstore(bytes, warn);
    }
  }
}

/** Writes to `output`, or to stdout when it is undefined. */
export async function emit(data: string | Uint8Array, output: string | undefined): Promise<void> {
  if (output !== undefined) {
    await writeFile(output, data);
    return;
  }
  process.stdout.write(data);
}
