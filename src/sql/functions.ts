// src/sql/functions.ts
//
// Server-side hstore functions. Each factory fixes the SQL name and the
// argument/result types; the database does the work.
import type { QueryBuilder, SqlExpression, SqlType } from "./query.js";
import { asHstore, asText, asTextArray } from "./query.js";
import type { HstoreLike, TextArrayLike, TextLike } from "./query.js";

export class FunctionCall<T extends SqlType> implements SqlExpression<T> {
  public readonly isAggregate = false;

  public constructor(
    public readonly sqlName: string,
    public readonly sqlType: T,
    public readonly args: ReadonlyArray<SqlExpression>,
  ) {}

  public walk(qb: QueryBuilder): void {
    qb.pushSql(`${this.sqlName}(`);
    this.args.forEach((arg, i) => {
      if (i > 0) qb.pushSql(", ");
      arg.walk(qb);
    });
    qb.pushSql(")");
  }
}

/** hstore(text[]): from an array of alternating keys and values. */
export function hstoreFromArray(arr: TextArrayLike): FunctionCall<"hstore"> {
  return new FunctionCall("hstore", "hstore", [asTextArray(arr)]);
}

/** hstore_to_array(hstore): alternating keys and values. */
export function hstoreToArray(h: HstoreLike): FunctionCall<"text[]"> {
  return new FunctionCall("hstore_to_array", "text[]", [asHstore(h)]);
}

/** hstore(text[], text[]): from separate key and value arrays. */
export function hstoreFromKvArray(keys: TextArrayLike, values: TextArrayLike): FunctionCall<"hstore"> {
  return new FunctionCall("hstore", "hstore", [asTextArray(keys), asTextArray(values)]);
}

/** hstore(text, text): single-item hstore. */
export function hstoreFromKv(key: TextLike, value: TextLike): FunctionCall<"hstore"> {
  return new FunctionCall("hstore", "hstore", [asText(key), asText(value)]);
}

export function hstoreToKeys(h: HstoreLike): FunctionCall<"text[]"> {
  return new FunctionCall("akeys", "text[]", [asHstore(h)]);
}

export function hstoreToValues(h: HstoreLike): FunctionCall<"text[]"> {
  return new FunctionCall("avals", "text[]", [asHstore(h)]);
}

/** Subset containing only `keys`. */
export function hstoreSlice(h: HstoreLike, keys: TextArrayLike): FunctionCall<"hstore"> {
  return new FunctionCall("slice", "hstore", [asHstore(h), asTextArray(keys)]);
}

export function hstoreExist(h: HstoreLike, key: TextLike): FunctionCall<"boolean"> {
  return new FunctionCall("exist", "boolean", [asHstore(h), asText(key)]);
}

/** True when `key` is present with a non-NULL value. */
export function hstoreDefined(h: HstoreLike, key: TextLike): FunctionCall<"boolean"> {
  return new FunctionCall("defined", "boolean", [asHstore(h), asText(key)]);
}

export function hstoreDeleteKey(h: HstoreLike, key: TextLike): FunctionCall<"hstore"> {
  return new FunctionCall("delete", "hstore", [asHstore(h), asText(key)]);
}

export function hstoreDeleteArray(h: HstoreLike, keys: TextArrayLike): FunctionCall<"hstore"> {
  return new FunctionCall("delete", "hstore", [asHstore(h), asTextArray(keys)]);
}

/** Deletes the pairs of `h` that also appear (same key and value) in `other`. */
export function hstoreDeleteMatching(h: HstoreLike, other: HstoreLike): FunctionCall<"hstore"> {
  return new FunctionCall("delete", "hstore", [asHstore(h), asHstore(other)]);
}
