import { describe, expect, it } from "vitest";

import { Hstore } from "../src/hstore/hstore.js";
import { encodeHstore } from "../src/hstore/wire.js";
import {
  hstoreDefined,
  hstoreDeleteArray,
  hstoreDeleteKey,
  hstoreDeleteMatching,
  hstoreExist,
  hstoreFromArray,
  hstoreFromKv,
  hstoreFromKvArray,
  hstoreSlice,
  hstoreToArray,
  hstoreToKeys,
  hstoreToValues,
} from "../src/sql/functions.js";
import { hstoreOps } from "../src/sql/operators.js";
import { hstoreColumn, hstoreLiteral, hstoreParam, textColumn, toSql } from "../src/sql/query.js";

const settings = hstoreColumn("settings");

describe("hstore operators", () => {
  it("binds a text key for ->", () => {
    const expr = hstoreOps(settings).getValue("theme");
    expect(expr.sqlType).toBe("text");
    expect(toSql(expr)).toEqual({ text: '("settings" -> $1)', values: ["theme"] });
  });

  it("binds a key array for -> and the key operators", () => {
    const ops = hstoreOps(settings);
    expect(toSql(ops.getArray(["a", "b"]))).toEqual({ text: '("settings" -> $1)', values: [["a", "b"]] });
    expect(toSql(ops.hasAllKeys(["a"])).text).toBe('("settings" ?& $1)');
    expect(toSql(ops.hasAnyKeys(["a"])).text).toBe('("settings" ?| $1)');
    expect(toSql(ops.removeKeys(["a"])).text).toBe('("settings" - $1)');
  });

  it("binds hstore operands as wire bytes", () => {
    const m = Hstore.fromMap({ a: "b" });
    const frag = toSql(hstoreOps(hstoreColumn("s", "users")).contains(m));

    expect(frag.text).toBe('("users"."s" @> $1)');
    expect(frag.values).toEqual([encodeHstore(m)]);
  });

  it("renders every operator", () => {
    const ops = hstoreOps(settings);
    const other = hstoreColumn("other");
    expect(toSql(ops.concat(other)).text).toBe('("settings" || "other")');
    expect(toSql(ops.hasKey(textColumn("k"))).text).toBe('("settings" ? "k")');
    expect(toSql(ops.isContainedBy(other)).text).toBe('("settings" <@ "other")');
    expect(toSql(ops.removeKey("a")).text).toBe('("settings" - $1)');
    expect(toSql(ops.difference(other)).text).toBe('("settings" - "other")');
    expect(toSql(ops.toFlatArray()).text).toBe('(%% "settings")');
  });

  it("numbers parameters left to right through nested expressions", () => {
    const inner = hstoreOps(settings).removeKey("drop");
    const frag = toSql(hstoreOps(inner).getValue("keep"));
    expect(frag).toEqual({ text: '(("settings" - $1) -> $2)', values: ["drop", "keep"] });
  });

  it("accepts a map on the left", () => {
    const m = Hstore.fromMap({ k: "v" });
    const frag = toSql(hstoreOps(m).hasKey("k"));
    expect(frag).toEqual({ text: "($1 ? $2)", values: [encodeHstore(m), "k"] });
  });
});

describe("hstore functions", () => {
  it("uses the server-side function names", () => {
    const h = settings;
    expect(toSql(hstoreFromArray(["a", "1"])).text).toBe("hstore($1)");
    expect(toSql(hstoreToArray(h)).text).toBe('hstore_to_array("settings")');
    expect(toSql(hstoreFromKvArray(["a"], ["1"])).text).toBe("hstore($1, $2)");
    expect(toSql(hstoreFromKv("a", "1"))).toEqual({ text: "hstore($1, $2)", values: ["a", "1"] });
    expect(toSql(hstoreToKeys(h)).text).toBe('akeys("settings")');
    expect(toSql(hstoreToValues(h)).text).toBe('avals("settings")');
    expect(toSql(hstoreSlice(h, ["a", "b"]))).toEqual({ text: 'slice("settings", $1)', values: [["a", "b"]] });
    expect(toSql(hstoreExist(h, "a")).text).toBe('exist("settings", $1)');
    expect(toSql(hstoreDefined(h, "a")).text).toBe('defined("settings", $1)');
    expect(toSql(hstoreDeleteKey(h, "a")).text).toBe('delete("settings", $1)');
    expect(toSql(hstoreDeleteArray(h, ["a"])).text).toBe('delete("settings", $1)');
    expect(toSql(hstoreDeleteMatching(h, hstoreColumn("o"))).text).toBe('delete("settings", "o")');
  });

  it("carries result types and never aggregates", () => {
    const exist = hstoreExist(settings, "a");
    expect(exist.sqlType).toBe("boolean");
    expect(exist.isAggregate).toBe(false);
    expect(hstoreToKeys(settings).sqlType).toBe("text[]");
    expect(hstoreSlice(settings, []).sqlType).toBe("hstore");
  });

  it("nests with operators and inline literals", () => {
    const lit = hstoreLiteral(Hstore.fromMap({ x: "1" }));
    const frag = toSql(hstoreToKeys(hstoreOps(settings).concat(lit)));
    expect(frag).toEqual({ text: `akeys(("settings" || 'x=>1'::hstore))`, values: [] });
  });
});

describe("leaf expressions", () => {
  it("escapes identifiers", () => {
    expect(toSql(hstoreColumn('we"ird')).text).toBe('"we""ird"');
  });

  it("snapshots the map an inline literal was built from", () => {
    const m = Hstore.fromMap({ a: "1" });
    const lit = hstoreLiteral(m);
    m.insert("a", "2");
    expect(toSql(lit).text).toBe("'a=>1'::hstore");
  });

  it("inline literal of an empty map fails when rendered", () => {
    expect(() => toSql(hstoreLiteral(new Hstore()))).toThrow("cannot render an empty hstore literal");
  });

  it("hstoreParam binds the encoded map", () => {
    const m = Hstore.fromMap({ k: "v" });
    expect(toSql(hstoreParam(m))).toEqual({ text: "$1", values: [encodeHstore(m)] });
  });
});
