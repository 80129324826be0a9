// src/sql/operators.ts
import type { QueryBuilder, SqlExpression, SqlType } from "./query.js";
import { asHstore, asText, asTextArray } from "./query.js";
import type { HstoreLike, TextArrayLike, TextLike } from "./query.js";

export type InfixOp = "->" | "||" | "?" | "?&" | "?|" | "@>" | "<@" | "-";
export type PrefixOp = "%%";

export class InfixOperator<T extends SqlType> implements SqlExpression<T> {
  public readonly isAggregate = false;

  public constructor(
    public readonly operator: InfixOp,
    public readonly sqlType: T,
    public readonly left: SqlExpression,
    public readonly right: SqlExpression,
  ) {}

  public walk(qb: QueryBuilder): void {
    qb.pushSql("(");
    this.left.walk(qb);
    qb.pushSql(` ${this.operator} `);
    this.right.walk(qb);
    qb.pushSql(")");
  }
}

export class PrefixOperator<T extends SqlType> implements SqlExpression<T> {
  public readonly isAggregate = false;

  public constructor(
    public readonly operator: PrefixOp,
    public readonly sqlType: T,
    public readonly operand: SqlExpression,
  ) {}

  public walk(qb: QueryBuilder): void {
    qb.pushSql(`(${this.operator} `);
    this.operand.walk(qb);
    qb.pushSql(")");
  }
}

/**
 * Operator builders over an hstore-typed expression, e.g.
 * `hstoreOps(hstoreColumn("settings")).getValue("theme")` renders
 * `("settings" -> $1)`.
 */
export class HstoreOps {
  public readonly expr: SqlExpression<"hstore">;

  public constructor(expr: HstoreLike) {
    this.expr = asHstore(expr);
  }

  /** `->` with a key: the value, or NULL when absent. */
  public getValue(key: TextLike): InfixOperator<"text"> {
    return new InfixOperator("->", "text", this.expr, asText(key));
  }

  /** `->` with a key array: the values, NULL for absent keys. */
  public getArray(keys: TextArrayLike): InfixOperator<"text[]"> {
    return new InfixOperator("->", "text[]", this.expr, asTextArray(keys));
  }

  public concat(other: HstoreLike): InfixOperator<"hstore"> {
    return new InfixOperator("||", "hstore", this.expr, asHstore(other));
  }

  public hasKey(key: TextLike): InfixOperator<"boolean"> {
    return new InfixOperator("?", "boolean", this.expr, asText(key));
  }

  public hasAllKeys(keys: TextArrayLike): InfixOperator<"boolean"> {
    return new InfixOperator("?&", "boolean", this.expr, asTextArray(keys));
  }

  public hasAnyKeys(keys: TextArrayLike): InfixOperator<"boolean"> {
    return new InfixOperator("?|", "boolean", this.expr, asTextArray(keys));
  }

  /** `@>`: this contains `other`. */
  public contains(other: HstoreLike): InfixOperator<"boolean"> {
    return new InfixOperator("@>", "boolean", this.expr, asHstore(other));
  }

  /** `<@`: this is contained by `other`. */
  public isContainedBy(other: HstoreLike): InfixOperator<"boolean"> {
    return new InfixOperator("<@", "boolean", this.expr, asHstore(other));
  }

  public removeKey(key: TextLike): InfixOperator<"hstore"> {
    return new InfixOperator("-", "hstore", this.expr, asText(key));
  }

  public removeKeys(keys: TextArrayLike): InfixOperator<"hstore"> {
    return new InfixOperator("-", "hstore", this.expr, asTextArray(keys));
  }

  /** `-` with an hstore: drops the pairs also present in `other`. */
  public difference(other: HstoreLike): InfixOperator<"hstore"> {
    return new InfixOperator("-", "hstore", this.expr, asHstore(other));
  }

  /** `%%`: alternating keys and values. */
  public toFlatArray(): PrefixOperator<"text[]"> {
    return new PrefixOperator("%%", "text[]", this.expr);
  }
}

export function hstoreOps(expr: HstoreLike): HstoreOps {
  return new HstoreOps(expr);
}
