import type { WarnFn } from "./errors.js";
import { Hstore } from "./hstore.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** JSON object of string values; `null` values are dropped the way wire nulls are. */
export function parseHstoreJson(input: unknown, warn: WarnFn = () => {}): Hstore {
  if (!isRecord(input)) throw new Error("Invalid JSON: expected object");

  const out = new Hstore();
  for (const [key, value] of Object.entries(input)) {
    if (value === null) {
      warn(`dropped null value for key ${JSON.stringify(key)}`);
      continue;
    }
    if (typeof value !== "string") {
      throw new Error(`Invalid ${JSON.stringify(key)}: expected string or null, got ${typeof value}`);
    }
    out.insert(key, value);
  }
  return out;
}

// Written pair by pair: a plain object would list integer-like keys first.
export function stringifyHstoreJson(map: Hstore): string {
  const sorted = [...map].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (sorted.length === 0) return "{}\n";
  const lines = sorted.map(([k, v]) => `  ${JSON.stringify(k)}: ${JSON.stringify(v)}`);
  return "{\n" + lines.join(",\n") + "\n}\n";
}
