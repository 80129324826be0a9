import { describe, expect, it } from "vitest";

import { Hstore } from "../src/hstore/hstore.js";
import { parseHstoreJson, stringifyHstoreJson } from "../src/hstore/hstoreJson.js";

describe("hstore JSON form", () => {
  it("parses string values and drops nulls", () => {
    const warnings: string[] = [];
    const m = parseHstoreJson({ a: "1", b: null }, (w) => warnings.push(w));

    expect(m.toRecord()).toEqual({ a: "1" });
    expect(warnings).toEqual(['dropped null value for key "b"']);
  });

  it("rejects non-objects and non-string values", () => {
    expect(() => parseHstoreJson([])).toThrow("Invalid JSON: expected object");
    expect(() => parseHstoreJson("x")).toThrow("Invalid JSON: expected object");
    expect(() => parseHstoreJson({ a: 1 })).toThrow('Invalid "a": expected string or null, got number');
  });

  it("stringifies with sorted keys", () => {
    const m = Hstore.fromEntries([
      ["b", "2"],
      ["a", "1"],
    ]);
    expect(stringifyHstoreJson(m)).toBe('{\n  "a": "1",\n  "b": "2"\n}\n');
  });

  it("keeps sorted order for integer-like keys", () => {
    const m = Hstore.fromEntries([
      ["b", "x"],
      ["10", "y"],
      ["2", "z"],
    ]);
    expect(stringifyHstoreJson(m)).toBe('{\n  "10": "y",\n  "2": "z",\n  "b": "x"\n}\n');
  });

  it("stringifies an empty map", () => {
    expect(stringifyHstoreJson(new Hstore())).toBe("{}\n");
  });

  it("reads back what it writes", () => {
    const m = Hstore.fromMap({ z: "last", a: "first", "with \"quote\"": "\n" });
    const parsed: unknown = JSON.parse(stringifyHstoreJson(m));
    expect(parseHstoreJson(parsed).equals(m)).toBe(true);
  });
});
