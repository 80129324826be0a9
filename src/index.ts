export { Hstore, HstoreEntry } from "./hstore/hstore.js";
export type { HstoreInit, HstorePair, ValueCell } from "./hstore/hstore.js";
export { HstoreError, isHstoreError } from "./hstore/errors.js";
export type { HstoreErrorCode, WarnFn } from "./hstore/errors.js";
export { decodeHstore, encodeHstore } from "./hstore/wire.js";
export type { ByteSink } from "./hstore/wire.js";
export { quoteHstoreToken, renderHstoreLiteral, renderQuotedHstoreLiteral } from "./hstore/literal.js";
export { parseHstoreText } from "./hstore/text.js";
export { parseHstoreJson, stringifyHstoreJson } from "./hstore/hstoreJson.js";

export {
  QueryBuilder,
  asHstore,
  asText,
  asTextArray,
  hstoreColumn,
  hstoreLiteral,
  hstoreParam,
  textArrayParam,
  textColumn,
  textParam,
  toSql,
} from "./sql/query.js";
export type {
  HstoreLike,
  SqlExpression,
  SqlFragment,
  SqlParam,
  SqlType,
  TextArrayLike,
  TextLike,
} from "./sql/query.js";
export * from "./sql/functions.js";
export { HstoreOps, InfixOperator, PrefixOperator, hstoreOps } from "./sql/operators.js";
export type { InfixOp, PrefixOp } from "./sql/operators.js";
