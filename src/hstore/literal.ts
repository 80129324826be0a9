// src/hstore/literal.ts
import { HstoreError } from "./errors.js";
import type { Hstore } from "./hstore.js";

const CAST = "::hstore";

/**
 * Inline literal `'k1=>v1,k2=>v2'::hstore`.
 *
 * Keys and values are written as-is, so content holding `'`, `,`, `"` or `=>`
 * produces a broken (or unsafe) literal; use {@link renderQuotedHstoreLiteral}
 * for arbitrary text. An empty map has no rendering here.
 */
export function renderHstoreLiteral(map: Hstore): string {
  if (map.isEmpty()) throw new HstoreError("EmptyLiteral", "cannot render an empty hstore literal");

  const parts: string[] = [];
  for (const [k, v] of map) parts.push(`${k}=>${v}`);
  return `'${parts.join(",")}'${CAST}`;
}

export function quoteHstoreToken(s: string): string {
  return `"${s.replace(/(["\\])/g, "\\$1")}"`;
}

/** Inline literal with hstore-level and SQL-level quoting applied; `''::hstore` when empty. */
export function renderQuotedHstoreLiteral(map: Hstore): string {
  const parts: string[] = [];
  for (const [k, v] of map) parts.push(`${quoteHstoreToken(k)}=>${quoteHstoreToken(v)}`);
  const body = parts.join(",").replace(/'/g, "''");
  return `'${body}'${CAST}`;
}
