// src/sql/query.ts
import { Hstore } from "../hstore/hstore.js";
import { renderHstoreLiteral } from "../hstore/literal.js";
import { encodeHstore } from "../hstore/wire.js";

export type SqlType = "hstore" | "text" | "text[]" | "boolean";

/** hstore parameters are bound as their binary wire encoding. */
export type SqlParam = Buffer | string | ReadonlyArray<string>;

export type SqlFragment = Readonly<{
  text: string;
  values: ReadonlyArray<SqlParam>;
}>;

export class QueryBuilder {
  private text = "";
  private readonly values: SqlParam[] = [];

  public pushSql(sql: string): void {
    this.text += sql;
  }

  public pushBind(param: SqlParam): void {
    this.values.push(param);
    this.text += `$${this.values.length}`;
  }

  public pushIdentifier(name: string): void {
    this.text += `"${name.replace(/"/g, '""')}"`;
  }

  public finish(): SqlFragment {
    return { text: this.text, values: [...this.values] };
  }
}

/**
 * Something that renders into SQL with a known result type. Nothing in this
 * package aggregates, so every expression is valid with or without GROUP BY.
 */
export interface SqlExpression<T extends SqlType = SqlType> {
  readonly sqlType: T;
  readonly isAggregate: false;
  walk(qb: QueryBuilder): void;
}

export function toSql(expr: SqlExpression): SqlFragment {
  const qb = new QueryBuilder();
  expr.walk(qb);
  return qb.finish();
}

class Column<T extends SqlType> implements SqlExpression<T> {
  public readonly isAggregate = false;

  public constructor(
    public readonly sqlType: T,
    public readonly name: string,
    public readonly table: string | undefined,
  ) {}

  public walk(qb: QueryBuilder): void {
    if (this.table !== undefined) {
      qb.pushIdentifier(this.table);
      qb.pushSql(".");
    }
    qb.pushIdentifier(this.name);
  }
}

class Bound<T extends SqlType> implements SqlExpression<T> {
  public readonly isAggregate = false;

  public constructor(
    public readonly sqlType: T,
    private readonly param: SqlParam,
  ) {}

  public walk(qb: QueryBuilder): void {
    qb.pushBind(this.param);
  }
}

class HstoreLiteral implements SqlExpression<"hstore"> {
  public readonly sqlType = "hstore";
  public readonly isAggregate = false;

  public constructor(private readonly map: Hstore) {}

  public walk(qb: QueryBuilder): void {
    qb.pushSql(renderHstoreLiteral(this.map));
  }
}

export function hstoreColumn(name: string, table?: string): SqlExpression<"hstore"> {
  return new Column("hstore", name, table);
}

export function textColumn(name: string, table?: string): SqlExpression<"text"> {
  return new Column("text", name, table);
}

export function hstoreParam(map: Hstore): SqlExpression<"hstore"> {
  return new Bound("hstore", encodeHstore(map));
}

export function textParam(value: string): SqlExpression<"text"> {
  return new Bound("text", value);
}

export function textArrayParam(values: ReadonlyArray<string>): SqlExpression<"text[]"> {
  return new Bound("text[]", [...values]);
}

/** Inlines the map as `'k=>v,...'::hstore`; throws on an empty map. */
export function hstoreLiteral(map: Hstore): SqlExpression<"hstore"> {
  return new HstoreLiteral(map.clone());
}

export type TextLike = SqlExpression<"text"> | string;
export type TextArrayLike = SqlExpression<"text[]"> | ReadonlyArray<string>;
export type HstoreLike = SqlExpression<"hstore"> | Hstore;

export function asText(v: TextLike): SqlExpression<"text"> {
  return typeof v === "string" ? textParam(v) : v;
}

export function asTextArray(v: TextArrayLike): SqlExpression<"text[]"> {
  return isExpression(v) ? v : textArrayParam(v);
}

export function asHstore(v: HstoreLike): SqlExpression<"hstore"> {
  return v instanceof Hstore ? hstoreParam(v) : v;
}

function isExpression<T extends SqlType>(
  v: SqlExpression<T> | ReadonlyArray<string>,
): v is SqlExpression<T> {
  return !Array.isArray(v);
}
